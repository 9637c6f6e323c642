/**
 * Heartbeat supervision
 * Layer: action
 *
 * Required ports:
 *   - checks.file
 *   - supervisor.watch
 *   - supervisor.terminate
 *
 * Registers one file check per configured heartbeat and supervises them for
 * `duration_seconds`, or runs a single pass when the duration is 0.
 * SIGTERM/SIGINT end supervision early with a healthy result.
 */

import type { Config, SummaryCheckRow, SummaryData, SupervisionOutcome, WatchdogLogger } from './types';
import { FileHeartbeatCheck } from './checks/file-check';
import { Supervisor } from './supervisor';
import { actionsLogger } from './logger';
import { sleep } from './utils';
import { assertTimerSeconds } from './config';

/**
 * Dependency injection interface for superviseHeartbeats.
 * Production defaults are used when not provided by tests.
 */
export interface SuperviseDeps {
  /** Registers a signal handler and returns its unregister function */
  registerSignal: (event: NodeJS.Signals, handler: () => void) => () => void;
  now: () => number;
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  logger: WatchdogLogger;
}

export const defaultSuperviseDeps: SuperviseDeps = {
  registerSignal: (event, handler) => {
    process.on(event, handler);
    return () => {
      process.off(event, handler);
    };
  },
  now: () => Date.now(),
  sleep,
  logger: actionsLogger,
};

export async function superviseHeartbeats(
  config: Config,
  deps: SuperviseDeps = defaultSuperviseDeps,
): Promise<SummaryData> {
  assertTimerSeconds('duration-seconds', config.duration_seconds);

  const startedMs = deps.now();
  const supervisor = new Supervisor({ sleep: deps.sleep, logger: deps.logger });

  const checks = config.heartbeats.map(
    (hb) =>
      new FileHeartbeatCheck(hb.name, hb.path, hb.window_seconds * 1000, {
        now: deps.now,
        touchOnCreate: config.touch_on_start,
      }),
  );
  for (const check of checks) {
    supervisor.add(check);
  }

  let outcome: SupervisionOutcome;
  if (config.duration_seconds === 0) {
    const pass = supervisor.checkAll();
    outcome = pass.success ? { success: true, passes: 1 } : { ...pass, passes: 0 };
  } else {
    outcome = await watchFor(supervisor, config, deps);
  }

  const expired = new Set(outcome.success ? [] : outcome.error.names);
  const rows: SummaryCheckRow[] = config.heartbeats.map((hb) => ({
    name: hb.name,
    path: hb.path,
    window_seconds: hb.window_seconds,
    status: expired.has(hb.name) ? 'expired' : 'alive',
  }));

  return {
    outcome,
    checks: rows,
    duration_seconds: Math.floor((deps.now() - startedMs) / 1000),
  };
}

async function watchFor(
  supervisor: Supervisor,
  config: Config,
  deps: SuperviseDeps,
): Promise<SupervisionOutcome> {
  const stop = (): void => supervisor.terminate();
  const unregister = [deps.registerSignal('SIGTERM', stop), deps.registerSignal('SIGINT', stop)];
  const deadline = setTimeout(stop, config.duration_seconds * 1000);

  const onPass = config.diagnostics
    ? (passes: number): void => {
        deps.logger.info(`Watchdog: pass ${passes} ok (${supervisor.registry.names().join(', ')})`);
      }
    : undefined;

  try {
    return await supervisor.watch(config.period_seconds * 1000, { onPass });
  } finally {
    clearTimeout(deadline);
    for (const fn of unregister) fn();
  }
}
