/**
 * File Heartbeat Check
 * Layer: core
 *
 * Provided ports:
 *   - checks.file
 *
 * Liveness driven by a heartbeat file's mtime. A monitored process proves it
 * is alive by touching the file (or by calling reset() on this check); the
 * check expires once the clock is strictly past `mtime + duration`.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Clock, LivenessCheck } from '../types';
import { assertValidDuration, assertValidName } from './validate';

export interface FileCheckOptions {
  /** Time source, defaults to Date.now */
  now?: Clock;
  /**
   * Touch the file on construction so the check starts alive.
   * When false the check reflects the file as it already is. Default true.
   */
  touchOnCreate?: boolean;
}

export class FileHeartbeatCheck implements LivenessCheck {
  readonly name: string;
  readonly path: string;
  readonly duration: number;
  private readonly now: Clock;

  /**
   * @throws InvalidConfigurationError on an empty name or a negative/non-finite duration
   */
  constructor(name: string, filePath: string, durationMs: number, options: FileCheckOptions = {}) {
    assertValidName(name);
    assertValidDuration(name, durationMs);

    this.name = name;
    this.path = filePath;
    this.duration = durationMs;
    this.now = options.now ?? Date.now;

    if (options.touchOnCreate ?? true) {
      this.reset();
    }
  }

  /**
   * Epoch milliseconds after which the check counts as expired,
   * or null when the heartbeat file does not exist.
   */
  get deadline(): number | null {
    const mtimeMs = this.readMtimeMs();
    return mtimeMs === null ? null : Math.round(mtimeMs) + this.duration;
  }

  /**
   * Creates the file (and its directory) if needed and sets its mtime to now.
   * Filesystem errors propagate.
   */
  reset(): void {
    const stamp = new Date(this.now());
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    try {
      fs.utimesSync(this.path, stamp, stamp);
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code !== 'ENOENT') throw error;
      fs.writeFileSync(this.path, '', 'utf-8');
      fs.utimesSync(this.path, stamp, stamp);
    }
  }

  expired(): boolean {
    const deadline = this.deadline;
    if (deadline === null) return true;
    return this.now() > deadline;
  }

  private readMtimeMs(): number | null {
    try {
      return fs.statSync(this.path).mtimeMs;
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') return null;
      throw error;
    }
  }
}

/**
 * Creates a file-backed check.
 */
export function createFileCheck(
  name: string,
  filePath: string,
  durationMs: number,
  options?: FileCheckOptions,
): LivenessCheck {
  return new FileHeartbeatCheck(name, filePath, durationMs, options);
}
