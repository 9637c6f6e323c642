/**
 * Timed Liveness Check
 * Layer: core
 *
 * Provided ports:
 *   - checks.timed
 *
 * Fixed window measured from the last reset. Expired once the clock is
 * strictly past `lastReset + duration`.
 */

import type { Clock, LivenessCheck } from '../types';
import { assertValidDuration, assertValidName } from './validate';

export interface TimedCheckOptions {
  /** Time source, defaults to Date.now */
  now?: Clock;
}

export class TimedLivenessCheck implements LivenessCheck {
  readonly name: string;
  readonly duration: number;
  private readonly now: Clock;
  private deadlineMs = 0;

  /**
   * @param name - Registry key
   * @param durationMs - Window length; 0 expires on the first later tick
   * @throws InvalidConfigurationError on an empty name or a negative/non-finite duration
   */
  constructor(name: string, durationMs: number, options: TimedCheckOptions = {}) {
    assertValidName(name);
    assertValidDuration(name, durationMs);

    this.name = name;
    this.duration = durationMs;
    this.now = options.now ?? Date.now;
    this.reset();
  }

  /** Epoch milliseconds after which the check counts as expired */
  get deadline(): number {
    return this.deadlineMs;
  }

  reset(): void {
    this.deadlineMs = this.now() + this.duration;
  }

  expired(): boolean {
    return this.now() > this.deadlineMs;
  }
}

/**
 * Creates a timed check. Fresh checks start alive.
 */
export function createTimedCheck(
  name: string,
  durationMs: number,
  options?: TimedCheckOptions,
): LivenessCheck {
  return new TimedLivenessCheck(name, durationMs, options);
}
