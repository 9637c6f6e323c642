/**
 * Supervisor
 * Layer: core
 *
 * Provided ports:
 *   - supervisor.watch
 *   - supervisor.terminate
 *
 * Runs Registry.checkAll on a fixed period until terminated or until a pass
 * finds an expired check (fail-fast, no retry).
 *
 * State machine: Idle -> Watching -> { Stopped | Failed }
 *
 * The stop flag is an AbortController. The wait between passes listens on
 * its signal, so terminate() ends a pending wait at once instead of after
 * the period elapses.
 */

import type { CheckAllOutcome, LivenessCheck, WatchdogLogger, WatchOutcome } from './types';
import { MAX_TIMER_MS } from './types';
import { Registry } from './registry';
import { InvalidConfigurationError, WatchdogError } from './errors';
import { actionsLogger } from './logger';
import { formatMs, sleep } from './utils';

/**
 * Dependency injection interface for Supervisor.
 * Production defaults are used when not provided by tests.
 */
export interface SupervisorDeps {
  /** Interruptible wait; must resolve early once `signal` aborts */
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  logger: WatchdogLogger;
}

const defaultDeps: SupervisorDeps = {
  sleep,
  logger: actionsLogger,
};

export interface SupervisorOptions extends Partial<SupervisorDeps> {
  /** Existing registry to supervise; a fresh one is created otherwise */
  registry?: Registry;
}

export interface WatchOptions {
  /** Aborting ends this watch call like terminate(), without terminating the supervisor */
  signal?: AbortSignal;
  /** Called after every pass that found all checks alive */
  onPass?: (passes: number) => void;
}

export class Supervisor {
  readonly registry: Registry;
  private readonly deps: SupervisorDeps;
  private readonly stop = new AbortController();
  private running = false;

  constructor(options: SupervisorOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.deps = {
      sleep: options.sleep ?? defaultDeps.sleep,
      logger: options.logger ?? defaultDeps.logger,
    };
  }

  /** True once terminate() has been called */
  get terminated(): boolean {
    return this.stop.signal.aborted;
  }

  /** True while a watch() call is in progress */
  get watching(): boolean {
    return this.running;
  }

  add(check: LivenessCheck): void {
    this.registry.add(check);
  }

  remove(target: string | LivenessCheck): boolean {
    return this.registry.remove(target);
  }

  checkAll(): CheckAllOutcome {
    return this.registry.checkAll();
  }

  // ---------------------------------------------------------------------------
  // Port: supervisor.watch
  // ---------------------------------------------------------------------------

  /**
   * Checks every `periodMs` until terminated or a check expires.
   *
   * Resolves `{ success: true }` when termination is observed (including a
   * terminate() issued before watch started, in which case nothing is
   * checked), or `{ success: false, error }` on the first failing pass.
   *
   * @throws InvalidConfigurationError if periodMs is negative or not finite
   * @throws WatchdogError if another watch() is already running
   */
  async watch(periodMs: number, options: WatchOptions = {}): Promise<WatchOutcome> {
    if (!Number.isFinite(periodMs) || periodMs < 0) {
      throw new InvalidConfigurationError(
        `Invalid watch period: ${periodMs} (must be a finite number >= 0)`,
      );
    }
    if (periodMs > MAX_TIMER_MS) {
      throw new InvalidConfigurationError(
        `Invalid watch period: ${periodMs} (must be at most ${MAX_TIMER_MS}ms)`,
      );
    }
    if (this.running) {
      throw new WatchdogError('watch is already running');
    }

    this.running = true;
    const { signal, release } = linkSignals(this.stop.signal, options.signal);
    const { logger } = this.deps;
    let passes = 0;

    try {
      logger.info(
        `Watchdog: watching ${this.registry.size} check(s) every ${formatMs(periodMs)}`,
      );

      while (!signal.aborted) {
        const outcome = this.registry.checkAll();
        if (!outcome.success) {
          logger.debug(`Watchdog: pass ${passes + 1} failed (${outcome.error.names.join(', ')})`);
          return { success: false, error: outcome.error, passes };
        }

        passes++;
        options.onPass?.(passes);
        await this.deps.sleep(periodMs, signal);
      }

      logger.info(`Watchdog: terminated after ${passes} pass(es)`);
      return { success: true, reason: 'terminated', passes };
    } finally {
      release();
      this.running = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Port: supervisor.terminate
  // ---------------------------------------------------------------------------

  /**
   * Stops the current and any future watch() at the next opportunity.
   * Idempotent; callable before watch() starts.
   */
  terminate(): void {
    if (this.stop.signal.aborted) return;
    this.deps.logger.debug('Watchdog: termination requested');
    this.stop.abort();
  }
}

/**
 * Creates a supervisor with an empty registry.
 */
export function createSupervisor(options?: SupervisorOptions): Supervisor {
  return new Supervisor(options);
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

interface LinkedSignal {
  signal: AbortSignal;
  /** Detaches listeners from the source signals */
  release: () => void;
}

/**
 * Returns a signal that aborts when either source aborts.
 */
function linkSignals(primary: AbortSignal, secondary: AbortSignal | undefined): LinkedSignal {
  if (!secondary) {
    return { signal: primary, release: () => {} };
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();

  if (primary.aborted || secondary.aborted) {
    controller.abort();
    return { signal: controller.signal, release: () => {} };
  }

  primary.addEventListener('abort', onAbort, { once: true });
  secondary.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    release: () => {
      primary.removeEventListener('abort', onAbort);
      secondary.removeEventListener('abort', onAbort);
    },
  };
}
