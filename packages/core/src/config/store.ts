/**
 * Update Configuration Store
 * Loads, synthesizes and persists the update configuration record
 */

import fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import { UpdateError, UpdateErrorCode, describeError, toUpdateError } from '../utils/errors.js';
import type { CommandRunner } from '../types/common.js';
import type { DeploymentDetector } from '../deployment/detector.js';
import { DEFAULT_INSTALL_ROOT, updateMethodFor } from '../deployment/detector.js';
import type { DeploymentProfile, DeploymentType, UpdateMethod } from '../deployment/types.js';
import { updateConfigSchema } from './schema.js';
import { deriveRepositoryConfig } from './repository.js';
import { inferVersion } from './version.js';
import type {
  AutoUpdateConfig,
  BackupSettings,
  ConfigIssue,
  GitConfig,
  RepositoryConfig,
  UpdateConfigRecord,
  UpdateConfigStoreOptions,
} from './types.js';

export const CONFIG_FILE_NAME = 'update-config.json';

/**
 * Default candidate locations, highest priority first
 */
export function defaultConfigCandidates(appRoot: string = process.cwd()): string[] {
  const candidates = [
    path.join(DEFAULT_INSTALL_ROOT, CONFIG_FILE_NAME),
    path.join(appRoot, CONFIG_FILE_NAME),
    path.join(process.cwd(), CONFIG_FILE_NAME),
    path.join(os.tmpdir(), `speech-appliance-${CONFIG_FILE_NAME}`),
  ];
  return [...new Set(candidates.map((candidate) => path.resolve(candidate)))];
}

/**
 * Build the default record for a freshly detected deployment
 */
export function createDefaultRecord(
  profile: DeploymentProfile,
  currentVersion: string,
  repository: Partial<RepositoryConfig> = {}
): UpdateConfigRecord {
  return updateConfigSchema.parse({
    repository: deriveRepositoryConfig(repository),
    deployment: {
      type: profile.type,
      target_dir: profile.targetDir,
      service_name: profile.serviceName,
      service_enabled: true,
      service_primitive: profile.servicePrimitive,
      detected_at: profile.detectedAt,
    },
    update_method: updateMethodFor(profile.type),
    version_tracking: {
      current_version: currentVersion,
      last_update: null,
      last_check: null,
    },
    file_download_config: {
      backup_dir: path.join(profile.targetDir, '.update_backups'),
    },
    git_config: {},
    auto_update: {},
  });
}

/**
 * Update Configuration Store class
 *
 * Single serialization point for the record: every write is a whole-document
 * read-modify-write under the store's mutex.
 */
export class UpdateConfigStore {
  private readonly explicitPath?: string;
  private readonly candidatePaths: string[];
  private readonly detector: DeploymentDetector;
  private readonly runner?: CommandRunner;
  private readonly repositoryDefaults: Partial<RepositoryConfig>;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  private record: UpdateConfigRecord | null = null;
  private configPath: string | null = null;
  private problems: ConfigIssue[] = [];

  constructor(options: UpdateConfigStoreOptions) {
    this.explicitPath = options.configPath ? path.resolve(options.configPath) : undefined;
    this.candidatePaths = options.candidatePaths ?? defaultConfigCandidates();
    this.detector = options.detector;
    this.runner = options.runner;
    this.repositoryDefaults = options.repository ?? {};
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load the first config found, or synthesize and persist a default one
   */
  public async loadOrCreate(): Promise<UpdateConfigRecord> {
    return this.mutex.runExclusive(async () => {
      this.problems = [];
      const existing = this.findExistingPath();

      if (existing) {
        const loaded = await this.readRecord(existing);
        if (loaded) {
          this.configPath = existing;
          this.record = await this.enforceConsistency(existing, loaded);
          logger.info('Loaded update config', { path: existing, deploymentType: this.record.deployment.type });
          return this.snapshot();
        }
      }

      const target = existing ?? this.explicitPath ?? this.chooseDefaultPath();
      const profile = this.detector.detect();
      const version = await inferVersion(profile, { runner: this.runner, now: this.now });
      const record = createDefaultRecord(profile, version, this.repositoryDefaults);

      await this.writeRecord(target, record);
      this.configPath = target;
      this.record = record;
      logger.info('Created default update config', { path: target, deploymentType: profile.type, version });
      return this.snapshot();
    });
  }

  /**
   * Re-read the record from disk
   */
  public async reload(): Promise<UpdateConfigRecord> {
    return this.loadOrCreate();
  }

  /**
   * Persist a complete record
   */
  public async save(record: UpdateConfigRecord): Promise<UpdateConfigRecord> {
    return this.mutex.runExclusive(async () => {
      const validated = this.validateForWrite(record);
      await this.writeRecord(this.requirePath(), validated);
      this.record = validated;
      return this.snapshot();
    });
  }

  /**
   * Read-modify-write. The mutator receives the latest record on disk, so fields
   * written by another component (or another version of this one) survive.
   */
  public async update(mutator: (record: UpdateConfigRecord) => UpdateConfigRecord): Promise<UpdateConfigRecord> {
    return this.mutex.runExclusive(async () => {
      const configPath = this.requirePath();
      const base = (await this.readRecord(configPath, false)) ?? this.current();
      const next = this.validateForWrite(mutator(structuredClone(base)));
      await this.writeRecord(configPath, next);
      this.record = next;
      return this.snapshot();
    });
  }

  /**
   * Record a successful update
   */
  public async recordUpdate(version: string): Promise<UpdateConfigRecord> {
    const timestamp = this.now().toISOString();
    return this.update((record) => ({
      ...record,
      version_tracking: { ...record.version_tracking, current_version: version, last_update: timestamp },
    }));
  }

  /**
   * Record the time of an update check
   */
  public async recordCheck(): Promise<UpdateConfigRecord> {
    const timestamp = this.now().toISOString();
    return this.update((record) => ({
      ...record,
      version_tracking: { ...record.version_tracking, last_check: timestamp },
    }));
  }

  public getConfigPath(): string | null {
    return this.configPath;
  }

  public getRecord(): UpdateConfigRecord {
    return this.snapshot();
  }

  public issues(): ConfigIssue[] {
    return [...this.problems];
  }

  public deploymentType(): DeploymentType {
    return this.current().deployment.type;
  }

  public updateMethod(): UpdateMethod {
    return this.current().update_method;
  }

  public targetDir(): string {
    return this.current().deployment.target_dir;
  }

  public serviceName(): string {
    return this.current().deployment.service_name;
  }

  public filesToUpdate(): string[] {
    return [...this.current().file_download_config.files_to_update];
  }

  public repository(): RepositoryConfig {
    return { ...this.current().repository };
  }

  public currentVersion(): string {
    return this.current().version_tracking.current_version;
  }

  public gitSettings(): GitConfig {
    const git = this.current().git_config;
    return { ...git, backup_paths: [...git.backup_paths], install_command: [...git.install_command] };
  }

  public autoUpdate(): AutoUpdateConfig {
    return { ...this.current().auto_update };
  }

  public backupSettings(): BackupSettings {
    const record = this.current();
    const settings = record.file_download_config;
    return {
      enabled: settings.backup_enabled,
      dir: path.resolve(record.deployment.target_dir, settings.backup_dir),
      keepCount: settings.keep_backups,
    };
  }

  // ==================== Private Helper Methods ====================

  private current(): UpdateConfigRecord {
    if (!this.record) {
      throw new UpdateError(UpdateErrorCode.NOT_FOUND, 'Update configuration not loaded. Call loadOrCreate() first.');
    }
    return this.record;
  }

  private snapshot(): UpdateConfigRecord {
    return structuredClone(this.current());
  }

  private requirePath(): string {
    if (!this.configPath) {
      throw new UpdateError(UpdateErrorCode.NOT_FOUND, 'Update configuration not loaded. Call loadOrCreate() first.');
    }
    return this.configPath;
  }

  private findExistingPath(): string | undefined {
    if (this.explicitPath) {
      return existsSync(this.explicitPath) ? this.explicitPath : undefined;
    }
    return this.candidatePaths.find((candidate) => existsSync(candidate));
  }

  private chooseDefaultPath(): string {
    const writable = this.candidatePaths.find((candidate) => existsSync(path.dirname(candidate)));
    const fallback = this.candidatePaths[this.candidatePaths.length - 1];
    if (writable) {
      return writable;
    }
    if (fallback) {
      return fallback;
    }
    return path.join(os.tmpdir(), `speech-appliance-${CONFIG_FILE_NAME}`);
  }

  /**
   * Parse a config file. Unreadable or invalid documents are set aside (when
   * `quarantine` is on) and reported as null.
   */
  private async readRecord(configPath: string, quarantine = true): Promise<UpdateConfigRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      logger.warn('Failed to read update config', { path: configPath, error: describeError(error) });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (quarantine) {
        await this.quarantine(configPath, `invalid JSON: ${describeError(error)}`);
      }
      return null;
    }

    const result = updateConfigSchema.safeParse(parsed);
    if (!result.success) {
      if (quarantine) {
        const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        await this.quarantine(configPath, detail);
      }
      return null;
    }
    return result.data;
  }

  private async quarantine(configPath: string, reason: string): Promise<void> {
    const backupPath = `${configPath}.corrupt.${this.now().getTime()}`;
    this.problems.push({
      code: 'CORRUPT_CONFIG',
      message: `Update config at ${configPath} was unusable (${reason}); replaced with defaults`,
      detectedAt: this.now().toISOString(),
    });
    try {
      await fs.copyFile(configPath, backupPath);
      logger.error('Update config is corrupted, backed it up and recreating defaults', { path: configPath, backupPath, reason });
    } catch (error) {
      logger.warn('Failed to back up corrupted update config', { path: configPath, error: describeError(error) });
    }
  }

  /**
   * A record whose update method disagrees with its deployment type is corrected
   * and written back, never used as is.
   */
  private async enforceConsistency(configPath: string, record: UpdateConfigRecord): Promise<UpdateConfigRecord> {
    const expected = updateMethodFor(record.deployment.type);
    if (record.update_method === expected) {
      return record;
    }

    const message = `update_method '${record.update_method}' does not match deployment type '${record.deployment.type}', corrected to '${expected}'`;
    logger.warn('Update config inconsistency corrected', { path: configPath, message });
    this.problems.push({ code: 'CONFIG_INCONSISTENCY', message, detectedAt: this.now().toISOString() });

    const corrected: UpdateConfigRecord = { ...record, update_method: expected };
    await this.writeRecord(configPath, corrected);
    return corrected;
  }

  private validateForWrite(record: UpdateConfigRecord): UpdateConfigRecord {
    const result = updateConfigSchema.safeParse(record);
    if (!result.success) {
      const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new UpdateError(UpdateErrorCode.CONFIG_INCONSISTENCY, `Invalid update config: ${detail}`);
    }
    const expected = updateMethodFor(result.data.deployment.type);
    if (result.data.update_method !== expected) {
      throw new UpdateError(
        UpdateErrorCode.CONFIG_INCONSISTENCY,
        `update_method '${result.data.update_method}' must be '${expected}' for deployment type '${result.data.deployment.type}'`
      );
    }
    return result.data;
  }

  private async writeRecord(configPath: string, record: UpdateConfigRecord): Promise<void> {
    const tempPath = `${configPath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(configPath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
      await fs.rename(tempPath, configPath);
      logger.debug('Saved update config', { path: configPath });
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Failed to remove temporary config file', { path: tempPath, error: describeError(cleanupError) });
      });
      throw toUpdateError(error, UpdateErrorCode.IO_FAILURE);
    }
  }
}
