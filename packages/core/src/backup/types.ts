/**
 * Backup Module Types
 */

/**
 * A timestamped copy of the in-scope paths, taken right before an update
 */
export interface BackupSlot {
  /** `backup_YYYYMMDD_HHMMSS`, with `_n` appended on collision */
  name: string;
  path: string;
  createdAt: Date;
  sizeBytes: number;
  version?: string;
  /** Relative paths captured in the slot */
  files?: string[];
}

/**
 * Contents of the metadata file stored beside the slot's copies
 */
export interface BackupMetadata {
  created_at: string;
  version: string | null;
  files: string[];
  skipped: string[];
}

export interface CreateBackupOptions {
  version?: string;
}

export interface RollbackResult {
  success: boolean;
  message: string;
  backupName?: string;
  /** Relative paths put back in place */
  restored: string[];
}

export interface BackupManagerOptions {
  /** Deployment root the relative paths resolve against */
  rootDir: string;
  /** Directory holding the slots */
  backupDir: string;
  /** Slots kept by `cleanupOldBackups()` when no count is passed */
  keepCount?: number;
  now?: () => Date;
}
