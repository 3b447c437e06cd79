/**
 * @appliance-updater/core
 *
 * Self-update core for the speech appliance
 * Provides deployment detection, update checks, backup/rollback, maintenance mode and service restarts
 */

// Export common types
export type { ExecutionResult, CommandOptions, CommandRunner } from './types/common.js';
export { OperatingSystem } from './types/common.js';

// Export Utils module
export {
  logger,
  initLogger,
  getLogger,
  parseLogLevel,
  LogLevel,
  UpdateError,
  UpdateErrorCode,
  describeError,
  toUpdateError,
  runCommand,
  Mutex,
} from './utils/index.js';
export type { Logger, LoggerConfig, UpdateErrorInfo } from './utils/index.js';

// Export OS module
export { OSDetector } from './os/index.js';

// Export Deployment module
export { DeploymentDetector, DeploymentType, ServicePrimitive, updateMethodFor } from './deployment/index.js';
export type { DeploymentProfile, DeploymentDetectorOptions, UpdateMethod } from './deployment/index.js';

// Export Git module
export { GitMonitor, DEFAULT_GIT_TIMEOUTS } from './git/index.js';
export type { RemoteCommit, CommitSummary, GitMonitorOptions, GitTimeouts, UpdateAvailability } from './git/index.js';

// Export Config module
export {
  UpdateConfigStore,
  defaultConfigCandidates,
  createDefaultRecord,
  deriveRepositoryConfig,
  inferVersion,
  resolveRuntimeOptions,
  updateConfigSchema,
  CONFIG_FILE_NAME,
} from './config/index.js';
export type {
  UpdateConfigRecord,
  RepositoryConfig,
  DeploymentConfig,
  VersionTracking,
  FileDownloadConfig,
  GitConfig,
  AutoUpdateConfig,
  AutoUpdateSchedule,
  BackupSettings,
  ConfigIssue,
  UpdateConfigStoreOptions,
  RuntimeOptions,
} from './config/index.js';

// Export Backup module
export { BackupManager, formatSlotName, isValidSlotName, BACKUP_METADATA_FILE } from './backup/index.js';
export type { BackupSlot, BackupMetadata, RollbackResult, BackupManagerOptions } from './backup/index.js';

// Export Service module
export { ServiceManager, ServiceStatus } from './service/index.js';
export type { RestartOutcome, RestartMethod, ServiceInfo, ServiceTarget } from './service/index.js';

// Export Maintenance module
export {
  MaintenanceManager,
  createMaintenanceMiddleware,
  renderMaintenancePage,
  resolveClientIp,
  isIpAllowed,
  isLoopback,
  normalizeIp,
  MAINTENANCE_MARKER_FILE,
  MAINTENANCE_CONFIG_FILE,
} from './maintenance/index.js';
export type {
  MaintenanceConfig,
  MaintenanceMarker,
  MaintenanceStatus,
  MaintenanceResult,
  EnableMaintenanceOptions,
  MaintenanceMiddlewareOptions,
} from './maintenance/index.js';

// Export Update module
export {
  UpdateManager,
  AutoUpdateScheduler,
  RemoteFileSource,
  computeNextRun,
  createUpdateRouter,
  UpdaterState,
  UpdateStep,
  UpdateStepStatus,
} from './update/index.js';
export type {
  UpdateCheckResult,
  UpdateOptions,
  UpdateResult,
  UpdateOutcome,
  UpdateProgress,
  UpdateProgressCallback,
  ManualRollbackResult,
  UpdaterStatus,
  SchedulerRunResult,
  UpdateRouterDependencies,
} from './update/index.js';

// Export composition root
export { createUpdateSystem } from './system.js';
export type { UpdateSystem, UpdateSystemOptions } from './system.js';
