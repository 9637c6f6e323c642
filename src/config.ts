/**
 * Configuration
 * Layer: action
 *
 * Provided ports:
 *   - config.read
 *
 * Reads and validates action inputs. Every malformed input raises
 * InvalidConfigurationError naming the input.
 */

import * as core from '@actions/core';
import * as path from 'path';
import type { Config, HeartbeatSpec } from './types';
import {
  DEFAULT_DURATION_SECONDS,
  DEFAULT_PERIOD_SECONDS,
  DEFAULT_WINDOW_SECONDS,
  MAX_TIMER_MS,
} from './types';
import { InvalidConfigurationError } from './errors';
import { parseBooleanFlag } from './utils';

const SECONDS_PATTERN = /^\d+(\.\d+)?$/;
const WINDOW_SUFFIX_PATTERN = /^(.*?)\s*,\s*(\d+(?:\.\d+)?)$/;

// -----------------------------------------------------------------------------
// Port: config.read
// -----------------------------------------------------------------------------

/**
 * Reads the action configuration from inputs.
 * Relative heartbeat paths resolve against $GITHUB_WORKSPACE (or cwd).
 */
export function readConfig(): Config {
  const baseDir = process.env['GITHUB_WORKSPACE'] || process.cwd();

  const windowSeconds = parseSeconds(
    'window-seconds',
    core.getInput('window-seconds'),
    DEFAULT_WINDOW_SECONDS,
  );
  const periodSeconds = parseSeconds(
    'period-seconds',
    core.getInput('period-seconds'),
    DEFAULT_PERIOD_SECONDS,
  );
  if (periodSeconds === 0) {
    throw new InvalidConfigurationError('Invalid period-seconds: must be greater than 0');
  }
  assertTimerSeconds('period-seconds', periodSeconds);
  const durationSeconds = parseSeconds(
    'duration-seconds',
    core.getInput('duration-seconds'),
    DEFAULT_DURATION_SECONDS,
  );
  assertTimerSeconds('duration-seconds', durationSeconds);

  const lines = core.getMultilineInput('heartbeats', { required: true });

  return {
    heartbeats: parseHeartbeats(lines, windowSeconds, baseDir),
    period_seconds: periodSeconds,
    duration_seconds: durationSeconds,
    touch_on_start: parseBooleanFlag(core.getInput('touch-on-start')),
    diagnostics: parseBooleanFlag(core.getInput('diagnostics')),
  };
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

/**
 * Parses a non-negative number of seconds. Empty input yields `fallback`.
 */
export function parseSeconds(inputName: string, raw: string, fallback: number): number {
  const trimmed = raw.trim();
  if (trimmed === '') return fallback;
  if (!SECONDS_PATTERN.test(trimmed)) {
    throw new InvalidConfigurationError(
      `Invalid ${inputName}: "${raw}" (expected a non-negative number of seconds)`,
    );
  }
  return Number(trimmed);
}

/**
 * Rejects a number of seconds that a single timer cannot wait out.
 */
export function assertTimerSeconds(inputName: string, seconds: number): void {
  if (seconds * 1000 > MAX_TIMER_MS) {
    throw new InvalidConfigurationError(
      `Invalid ${inputName}: ${seconds} (must be at most ${MAX_TIMER_MS / 1000})`,
    );
  }
}

/**
 * Parses one heartbeat line: `<name>=<path>` or `<name>=<path>,<window-seconds>`.
 */
export function parseHeartbeatLine(
  line: string,
  defaultWindowSeconds: number,
  baseDir: string,
): HeartbeatSpec {
  const eq = line.indexOf('=');
  if (eq === -1) {
    throw new InvalidConfigurationError(
      `Invalid heartbeats line: "${line}" (expected <name>=<path>[,<window-seconds>])`,
    );
  }

  const name = line.slice(0, eq).trim();
  let rest = line.slice(eq + 1).trim();
  let windowSeconds = defaultWindowSeconds;

  const suffix = WINDOW_SUFFIX_PATTERN.exec(rest);
  if (suffix) {
    rest = suffix[1] ?? '';
    windowSeconds = Number(suffix[2]);
  }

  if (name === '') {
    throw new InvalidConfigurationError(`Invalid heartbeats line: "${line}" (empty name)`);
  }
  if (rest === '') {
    throw new InvalidConfigurationError(`Invalid heartbeats line: "${line}" (empty path)`);
  }

  return { name, path: path.resolve(baseDir, rest), window_seconds: windowSeconds };
}

/**
 * Parses all heartbeat lines, skipping blanks and `#` comments.
 * Duplicate names are rejected.
 */
export function parseHeartbeats(
  lines: string[],
  defaultWindowSeconds: number,
  baseDir: string,
): HeartbeatSpec[] {
  const specs: HeartbeatSpec[] = [];
  const seen = new Set<string>();

  for (const raw of lines) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;

    const heartbeat = parseHeartbeatLine(line, defaultWindowSeconds, baseDir);
    if (seen.has(heartbeat.name)) {
      throw new InvalidConfigurationError(`Duplicate heartbeat name: "${heartbeat.name}"`);
    }
    seen.add(heartbeat.name);
    specs.push(heartbeat);
  }

  if (specs.length === 0) {
    throw new InvalidConfigurationError('No heartbeats configured');
  }
  return specs;
}
