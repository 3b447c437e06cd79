/**
 * Update Module Types
 */

import type { AxiosInstance } from 'axios';
import type { CommandRunner } from '../types/common.js';
import type { UpdateErrorInfo } from '../utils/errors.js';
import type { DeploymentType } from '../deployment/types.js';
import type { RemoteCommit } from '../git/types.js';
import type { GitMonitor } from '../git/monitor.js';
import type { UpdateConfigStore } from '../config/store.js';
import type { BackupManager } from '../backup/manager.js';
import type { RollbackResult } from '../backup/types.js';
import type { MaintenanceManager } from '../maintenance/manager.js';
import type { ServiceManager } from '../service/manager.js';
import type { RestartOutcome } from '../service/types.js';
import type { RemoteFileSource } from './file-source.js';

/**
 * Updater lifecycle
 */
export enum UpdaterState {
  IDLE = 'idle',
  CHECKING = 'checking',
  NO_UPDATE = 'no_update',
  UPDATE_AVAILABLE = 'update_available',
  APPLYING = 'applying',
  VERIFYING = 'verifying',
  FAILED = 'failed',
  ROLLED_BACK = 'rolled_back',
}

/**
 * Update step
 */
export enum UpdateStep {
  ENABLE_MAINTENANCE = 'enable_maintenance',
  CREATE_BACKUP = 'create_backup',
  APPLY = 'apply',
  INSTALL_DEPENDENCIES = 'install_dependencies',
  VERIFY = 'verify',
  RECORD_VERSION = 'record_version',
  RESTART_SERVICE = 'restart_service',
  CLEANUP = 'cleanup',
  DISABLE_MAINTENANCE = 'disable_maintenance',
  ROLLBACK = 'rollback',
  COMPLETE = 'complete',
}

/**
 * Update step status
 */
export enum UpdateStepStatus {
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

/**
 * Update progress
 */
export interface UpdateProgress {
  step: UpdateStep;
  status: UpdateStepStatus;
  message: string;
  progress: number; // 0-100
  error?: UpdateErrorInfo;
  timestamp: Date;
}

export type UpdateProgressCallback = (progress: UpdateProgress) => void;

/**
 * Outcome of an update check. Never persisted.
 */
export interface UpdateCheckResult {
  status: 'success' | 'error';
  updateAvailable: boolean;
  commitsBehind: number;
  currentVersion: string;
  latestVersion?: string;
  checkTime: string;
  deploymentType: DeploymentType;
  message?: string;
  remote?: RemoteCommit;
  error?: UpdateErrorInfo;
}

/**
 * Update options
 */
export interface UpdateOptions {
  /** Apply even when the last check did not report an update */
  force?: boolean;
  progressCallback?: UpdateProgressCallback;
}

export type UpdateOutcome = 'success' | 'no_update' | 'busy' | 'failed' | 'rolled_back';

/**
 * Update result
 */
export interface UpdateResult {
  status: UpdateOutcome;
  success: boolean;
  message: string;
  previousVersion: string;
  newVersion?: string;
  /** Slot taken before the apply */
  backup?: string;
  rolledBack: boolean;
  restart?: RestartOutcome;
  error?: UpdateErrorInfo;
  duration: number; // milliseconds
  steps: UpdateProgress[];
}

/**
 * Result of an operator-initiated rollback
 */
export interface ManualRollbackResult extends RollbackResult {
  version?: string;
  restart?: RestartOutcome;
}

export interface UpdaterStatus {
  state: UpdaterState;
  busy: boolean;
  deploymentType: DeploymentType;
  updateMethod: string;
  currentVersion: string;
  maintenanceActive: boolean;
  lastCheck: UpdateCheckResult | null;
  lastResult: UpdateResult | null;
}

export interface UpdateManagerOptions {
  config: UpdateConfigStore;
  backups: BackupManager;
  maintenance: MaintenanceManager;
  services: ServiceManager;
  /** Required for git deployments */
  git?: GitMonitor;
  files?: RemoteFileSource;
  /** Runs the dependency install after a pull */
  runner?: CommandRunner;
  now?: () => Date;
}

export interface RemoteFileSourceOptions {
  http?: AxiosInstance;
  /** Remote VERSION lookup */
  versionTimeoutMs?: number;
  /** Per-file download */
  downloadTimeoutMs?: number;
}

export interface SchedulerRunResult {
  ran: boolean;
  reason?: string;
  check?: UpdateCheckResult;
  update?: UpdateResult;
}

export interface AutoUpdateSchedulerOptions {
  config: UpdateConfigStore;
  updater: {
    checkForUpdates(): Promise<UpdateCheckResult>;
    performUpdate(options?: UpdateOptions): Promise<UpdateResult>;
  };
  now?: () => Date;
}
