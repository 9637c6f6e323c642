/**
 * Boundary types for heartbeat-watchdog
 *
 * These types define the contracts between modules.
 */

import type { AggregateFailureError } from './errors';

// -----------------------------------------------------------------------------
// LivenessCheck
// A named heartbeat that can be whacked and asked whether it went silent
// -----------------------------------------------------------------------------

export interface LivenessCheck {
  /** Registry key; never empty */
  readonly name: string;
  /** Re-arms the window from now ("whack") */
  reset(): void;
  /** True once the window has elapsed since the last reset. No side effects. */
  expired(): boolean;
}

/** Clock returning epoch milliseconds */
export type Clock = () => number;

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export interface CheckAllResult {
  success: true;
}

export interface CheckAllError {
  success: false;
  error: AggregateFailureError;
}

export type CheckAllOutcome = CheckAllResult | CheckAllError;

export interface WatchResult {
  success: true;
  reason: 'terminated';
  /** Number of passes that found every check alive */
  passes: number;
}

export interface WatchError {
  success: false;
  error: AggregateFailureError;
  passes: number;
}

export type WatchOutcome = WatchResult | WatchError;

// -----------------------------------------------------------------------------
// Logging
// -----------------------------------------------------------------------------

export interface WatchdogLogger {
  info(message: string): void;
  debug(message: string): void;
  warning(message: string): void;
}

// -----------------------------------------------------------------------------
// Action configuration
// -----------------------------------------------------------------------------

export interface HeartbeatSpec {
  /** Check name */
  name: string;
  /** Absolute path to the heartbeat file */
  path: string;
  /** Window in seconds */
  window_seconds: number;
}

export interface Config {
  heartbeats: HeartbeatSpec[];
  /** Supervision period in seconds */
  period_seconds: number;
  /** How long to supervise; 0 runs a single pass */
  duration_seconds: number;
  /** Touch every heartbeat file before supervising */
  touch_on_start: boolean;
  diagnostics: boolean;
}

// -----------------------------------------------------------------------------
// SummaryData
// Data passed to output renderer for summary generation
// -----------------------------------------------------------------------------

export type CheckStatus = 'alive' | 'expired';

export interface SummaryCheckRow {
  name: string;
  path: string;
  window_seconds: number;
  status: CheckStatus;
}

/** Result of a supervision run: a watch() outcome or a single checkAll pass */
export type SupervisionOutcome =
  | { success: true; passes: number }
  | { success: false; error: AggregateFailureError; passes: number };

export interface SummaryData {
  outcome: SupervisionOutcome;
  checks: SummaryCheckRow[];
  duration_seconds: number;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_WINDOW_SECONDS = 60;
export const DEFAULT_PERIOD_SECONDS = 5;
export const DEFAULT_DURATION_SECONDS = 300;

export const AGGREGATE_FAILURE_PREFIX = 'watchdog timed out on the following services: ';

/** Longest delay a Node.js timer honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;
