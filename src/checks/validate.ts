import { InvalidConfigurationError } from '../errors';

/**
 * Throws InvalidConfigurationError unless `name` has non-whitespace content.
 */
export function assertValidName(name: string): void {
  if (name.trim() === '') {
    throw new InvalidConfigurationError('Check name must not be empty');
  }
}

/**
 * Throws InvalidConfigurationError unless `durationMs` is a finite number >= 0.
 */
export function assertValidDuration(name: string, durationMs: number): void {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new InvalidConfigurationError(
      `Invalid duration for check "${name}": ${durationMs} (must be a finite number >= 0)`,
    );
  }
}
