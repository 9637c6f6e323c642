/**
 * Library entry point.
 */

export type {
  LivenessCheck,
  Clock,
  CheckAllOutcome,
  CheckAllResult,
  CheckAllError,
  WatchOutcome,
  WatchResult,
  WatchError,
  WatchdogLogger,
} from './types';
export { AGGREGATE_FAILURE_PREFIX } from './types';
export { WatchdogError, InvalidConfigurationError, AggregateFailureError } from './errors';
export { TimedLivenessCheck, createTimedCheck } from './checks/timed-check';
export type { TimedCheckOptions } from './checks/timed-check';
export { FileHeartbeatCheck, createFileCheck } from './checks/file-check';
export type { FileCheckOptions } from './checks/file-check';
export { Registry } from './registry';
export { Supervisor, createSupervisor } from './supervisor';
export type { SupervisorDeps, SupervisorOptions, WatchOptions } from './supervisor';
