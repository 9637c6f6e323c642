/**
 * Shared test helpers.
 */

import { vi } from 'vitest';
import type { LivenessCheck, WatchdogLogger } from '../src/types';

export interface TestClock {
  now: () => number;
  set: (ms: number) => void;
  advance: (ms: number) => void;
}

export function makeClock(start = 0): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

export function makeLogger(): WatchdogLogger {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warning: vi.fn(),
  };
}

/**
 * LivenessCheck whose expiry is set directly by the test.
 */
export class StubCheck implements LivenessCheck {
  isExpired: boolean;
  resets = 0;

  constructor(
    readonly name: string,
    isExpired = false,
  ) {
    this.isExpired = isExpired;
  }

  reset(): void {
    this.resets++;
    this.isExpired = false;
  }

  expired(): boolean {
    return this.isExpired;
  }
}
