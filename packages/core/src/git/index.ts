/**
 * Git Module - Local and remote commit tracking
 */

export { GitMonitor, DEFAULT_GIT_TIMEOUTS } from './monitor.js';
export type {
  RemoteCommit,
  CommitSummary,
  GitTimeouts,
  GitMonitorOptions,
  UpdateAvailability,
} from './types.js';
