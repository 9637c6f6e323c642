/**
 * Heartbeat Supervision Tests
 *
 * Real heartbeat files in a temporary directory; fake timers drive both the
 * clock and the supervision period.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { superviseHeartbeats } from '../src/supervise';
import type { SuperviseDeps } from '../src/supervise';
import type { Config } from '../src/types';
import { sleep } from '../src/utils';
import { makeLogger } from './helpers';

vi.mock('@actions/core');

const T0 = new Date('2026-01-25T12:00:00.000Z');

describe('superviseHeartbeats', () => {
  let testDir: string;
  let handlers: Map<string, () => void>;
  let unregister: ReturnType<typeof vi.fn>;
  let deps: SuperviseDeps;

  function makeConfig(overrides: Partial<Config> = {}): Config {
    return {
      heartbeats: [
        { name: 'api', path: path.join(testDir, 'api.hb'), window_seconds: 60 },
        { name: 'db', path: path.join(testDir, 'db.hb'), window_seconds: 10 },
      ],
      period_seconds: 5,
      duration_seconds: 20,
      touch_on_start: true,
      diagnostics: false,
      ...overrides,
    };
  }

  beforeEach((): void => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'heartbeat-watchdog-supervise-'));
    handlers = new Map();
    unregister = vi.fn();
    deps = {
      registerSignal: vi.fn((event: NodeJS.Signals, handler: () => void) => {
        handlers.set(event, handler);
        return unregister;
      }),
      now: () => Date.now(),
      sleep,
      logger: makeLogger(),
    };
  });

  afterEach((): void => {
    vi.useRealTimers();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('rejects a duration longer than the longest timer delay before touching any file', async (): Promise<void> => {
    await expect(
      superviseHeartbeats(makeConfig({ duration_seconds: 3_000_000 }), deps),
    ).rejects.toThrow('Invalid duration-seconds: 3000000 (must be at most 2147483.647)');
    expect(fs.existsSync(path.join(testDir, 'api.hb'))).toBe(false);
    expect(deps.registerSignal).not.toHaveBeenCalled();
  });

  it('runs a single pass when duration is 0', async (): Promise<void> => {
    const data = await superviseHeartbeats(makeConfig({ duration_seconds: 0 }), deps);

    expect(data.outcome).toEqual({ success: true, passes: 1 });
    expect(data.checks.map((c) => c.status)).toEqual(['alive', 'alive']);
    expect(data.duration_seconds).toBe(0);
    expect(deps.registerSignal).not.toHaveBeenCalled();
  });

  it('reports a missing heartbeat file as expired without touching it', async (): Promise<void> => {
    const config = makeConfig({ duration_seconds: 0, touch_on_start: false });
    fs.writeFileSync(path.join(testDir, 'api.hb'), '');
    fs.utimesSync(path.join(testDir, 'api.hb'), T0, T0);

    const data = await superviseHeartbeats(config, deps);

    expect(data.outcome.success).toBe(false);
    if (!data.outcome.success) expect(data.outcome.error.names).toEqual(['db']);
    expect(data.outcome.passes).toBe(0);
    expect(data.checks.map((c) => [c.name, c.status])).toEqual([
      ['api', 'alive'],
      ['db', 'expired'],
    ]);
    expect(fs.existsSync(path.join(testDir, 'db.hb'))).toBe(false);
  });

  it('terminates successfully once the duration elapses', async (): Promise<void> => {
    const db = path.join(testDir, 'db.hb');
    const running = superviseHeartbeats(makeConfig(), deps);

    // keep db fresh by touching it the way the monitored service would
    for (let t = 4_000; t <= 16_000; t += 4_000) {
      await vi.advanceTimersByTimeAsync(4_000);
      const stamp = new Date(T0.getTime() + t);
      fs.utimesSync(db, stamp, stamp);
    }
    await vi.advanceTimersByTimeAsync(4_000);
    const data = await running;

    expect(data.outcome).toEqual({ success: true, reason: 'terminated', passes: 4 });
    expect(data.duration_seconds).toBe(20);
    expect(unregister).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('fails when a heartbeat goes silent', async (): Promise<void> => {
    const running = superviseHeartbeats(makeConfig({ duration_seconds: 300 }), deps);

    await vi.advanceTimersByTimeAsync(15_000);
    const data = await running;

    expect(data.outcome.success).toBe(false);
    if (data.outcome.success) return;
    // passes at t=0, 5s and 10s; db's 10s window is exceeded at t=15s
    expect(data.outcome.passes).toBe(3);
    expect(data.outcome.error.names).toEqual(['db']);
    expect(data.checks.map((c) => c.status)).toEqual(['alive', 'expired']);
    expect(data.duration_seconds).toBe(15);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('SIGTERM ends supervision early with a healthy result', async (): Promise<void> => {
    const running = superviseHeartbeats(makeConfig({ duration_seconds: 300 }), deps);

    await vi.advanceTimersByTimeAsync(5_000);
    expect([...handlers.keys()]).toEqual(['SIGTERM', 'SIGINT']);
    handlers.get('SIGTERM')?.();
    const data = await running;

    expect(data.outcome).toEqual({ success: true, reason: 'terminated', passes: 2 });
    expect(unregister).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('logs every pass with diagnostics enabled', async (): Promise<void> => {
    const running = superviseHeartbeats(makeConfig({ diagnostics: true }), deps);
    handlers.get('SIGINT')?.();
    await running;

    expect(deps.logger.info).toHaveBeenCalledWith('Watchdog: pass 1 ok (api, db)');
  });
});
