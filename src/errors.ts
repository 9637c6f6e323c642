/**
 * Error types
 * Layer: core
 */

import { AGGREGATE_FAILURE_PREFIX } from './types';

export class WatchdogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed construction parameters or action inputs.
 * Raised immediately, never retried.
 */
export class InvalidConfigurationError extends WatchdogError {}

/**
 * One or more checks were expired during a pass.
 * `names` holds every offending check, sorted.
 */
export class AggregateFailureError extends WatchdogError {
  readonly names: readonly string[];

  constructor(names: readonly string[]) {
    const sorted = [...names].sort();
    super(AGGREGATE_FAILURE_PREFIX + sorted.join(', '));
    this.names = sorted;
  }
}
