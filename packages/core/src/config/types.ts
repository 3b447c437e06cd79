/**
 * Configuration Module Types
 */

import type { z } from 'zod';
import type {
  autoUpdateSchema,
  deploymentSchema,
  fileDownloadConfigSchema,
  gitConfigSchema,
  repositorySchema,
  updateConfigSchema,
  versionTrackingSchema,
  AUTO_UPDATE_SCHEDULES,
} from './schema.js';
import type { DeploymentDetector } from '../deployment/detector.js';
import type { CommandRunner } from '../types/common.js';

export type RepositoryConfig = z.infer<typeof repositorySchema>;
export type DeploymentConfig = z.infer<typeof deploymentSchema>;
export type VersionTracking = z.infer<typeof versionTrackingSchema>;
export type FileDownloadConfig = z.infer<typeof fileDownloadConfigSchema>;
export type GitConfig = z.infer<typeof gitConfigSchema>;
export type AutoUpdateConfig = z.infer<typeof autoUpdateSchema>;
export type AutoUpdateSchedule = (typeof AUTO_UPDATE_SCHEDULES)[number];

/**
 * The persisted update configuration document
 */
export type UpdateConfigRecord = z.infer<typeof updateConfigSchema>;

/**
 * Backup settings resolved against the deployment root
 */
export interface BackupSettings {
  enabled: boolean;
  dir: string;
  keepCount: number;
}

/**
 * Problem found (and corrected) while loading the config
 */
export interface ConfigIssue {
  code: 'CONFIG_INCONSISTENCY' | 'CORRUPT_CONFIG';
  message: string;
  detectedAt: string;
}

export interface UpdateConfigStoreOptions {
  /** Explicit config location; skips candidate probing */
  configPath?: string;
  /** Locations searched in priority order when no explicit path is given */
  candidatePaths?: string[];
  detector: DeploymentDetector;
  runner?: CommandRunner;
  /** Repository coordinates used when a default record is synthesized */
  repository?: Partial<RepositoryConfig>;
  now?: () => Date;
}
