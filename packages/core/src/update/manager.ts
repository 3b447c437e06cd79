/**
 * Update Manager
 * Checks for updates, applies them behind a backup, and rolls back on failure
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { UpdateError, UpdateErrorCode, describeError, toUpdateError } from '../utils/errors.js';
import type { UpdateErrorInfo } from '../utils/errors.js';
import { resolveInside } from '../utils/paths.js';
import { inferVersion } from '../config/version.js';
import type { UpdateConfigStore } from '../config/store.js';
import type { BackupManager } from '../backup/manager.js';
import type { BackupSlot } from '../backup/types.js';
import type { MaintenanceManager } from '../maintenance/manager.js';
import type { ServiceManager } from '../service/manager.js';
import type { RestartOutcome, ServiceTarget } from '../service/types.js';
import type { GitMonitor } from '../git/monitor.js';
import type { UpdateMethod } from '../deployment/types.js';
import type { GitConfig } from '../config/types.js';
import { runCommand } from '../utils/exec.js';
import type { CommandRunner } from '../types/common.js';
import { RemoteFileSource } from './file-source.js';
import type {
  ManualRollbackResult,
  UpdateCheckResult,
  UpdateManagerOptions,
  UpdateOptions,
  UpdateProgress,
  UpdateProgressCallback,
  UpdateResult,
  UpdaterStatus,
} from './types.js';
import { UpdateStep, UpdateStepStatus, UpdaterState } from './types.js';

const STEP_PROGRESS: Record<UpdateStep, number> = {
  [UpdateStep.ENABLE_MAINTENANCE]: 5,
  [UpdateStep.CREATE_BACKUP]: 20,
  [UpdateStep.APPLY]: 50,
  [UpdateStep.INSTALL_DEPENDENCIES]: 62,
  [UpdateStep.VERIFY]: 70,
  [UpdateStep.RECORD_VERSION]: 80,
  [UpdateStep.CLEANUP]: 85,
  [UpdateStep.DISABLE_MAINTENANCE]: 90,
  [UpdateStep.RESTART_SERVICE]: 95,
  [UpdateStep.ROLLBACK]: 100,
  [UpdateStep.COMPLETE]: 100,
};

interface ApplyOutcome {
  /** Manifest files that did not exist before the apply */
  created: string[];
}

interface PullOutcome {
  before: string | null;
  after: string | null;
  stdout: string;
}

/**
 * Update Manager class
 *
 * At most one apply (or manual rollback) runs per instance. The busy flag is set
 * before the first await so a second caller in the same tick sees it. Each apply
 * and rollback bumps the epoch; a check that straddles one leaves the state alone.
 */
export class UpdateManager {
  private readonly config: UpdateConfigStore;
  private readonly backups: BackupManager;
  private readonly maintenance: MaintenanceManager;
  private readonly services: ServiceManager;
  private readonly git?: GitMonitor;
  private readonly files: RemoteFileSource;
  private readonly runner: CommandRunner;
  private readonly now: () => Date;

  private state: UpdaterState = UpdaterState.IDLE;
  private busy = false;
  private epoch = 0;
  private steps: UpdateProgress[] = [];
  private lastCheck: UpdateCheckResult | null = null;
  private lastResult: UpdateResult | null = null;

  constructor(options: UpdateManagerOptions) {
    this.config = options.config;
    this.backups = options.backups;
    this.maintenance = options.maintenance;
    this.services = options.services;
    this.git = options.git;
    this.files = options.files ?? new RemoteFileSource();
    this.runner = options.runner ?? runCommand;
    this.now = options.now ?? (() => new Date());
  }

  public getState(): UpdaterState {
    return this.state;
  }

  public isBusy(): boolean {
    return this.busy;
  }

  /**
   * Compare the installed version with the remote one. Failures come back as
   * `status: 'error'` with `updateAvailable: false`.
   */
  public async checkForUpdates(): Promise<UpdateCheckResult> {
    if (this.busy) {
      return this.errorCheck(
        new UpdateError(UpdateErrorCode.BUSY, 'An update is in progress; try again when it has finished')
      );
    }

    const epoch = this.epoch;
    this.state = UpdaterState.CHECKING;
    let result: UpdateCheckResult;
    try {
      result = this.config.updateMethod() === 'git_pull' ? await this.checkGit() : await this.checkFileDownload();
    } catch (error) {
      result = this.errorCheck(toUpdateError(error));
    }

    // An apply or rollback started while the check was in flight; the result is stale
    const stale = this.busy || epoch !== this.epoch;
    if (!stale) {
      if (result.status === 'error') {
        this.state = UpdaterState.IDLE;
      } else {
        this.state = result.updateAvailable ? UpdaterState.UPDATE_AVAILABLE : UpdaterState.NO_UPDATE;
      }
    }

    try {
      await this.config.recordCheck();
    } catch (error) {
      logger.warn('Failed to record update check time', { error: describeError(error) });
    }

    if (stale) {
      logger.info('Discarding update check that overlapped an update or rollback', { status: result.status });
      return result;
    }

    this.lastCheck = result;
    logger.info('Update check finished', {
      status: result.status,
      updateAvailable: result.updateAvailable,
      currentVersion: result.currentVersion,
      latestVersion: result.latestVersion,
      commitsBehind: result.commitsBehind,
    });
    return result;
  }

  /**
   * Apply the pending update
   */
  public async performUpdate(options: UpdateOptions = {}): Promise<UpdateResult> {
    const startTime = Date.now();

    if (this.busy) {
      logger.warn('Update rejected, another update is in progress');
      return {
        status: 'busy',
        success: false,
        message: 'An update is already in progress',
        previousVersion: this.safeCurrentVersion(),
        rolledBack: false,
        error: { code: UpdateErrorCode.BUSY, message: 'An update is already in progress' },
        duration: 0,
        steps: [],
      };
    }

    if (!options.force && this.state !== UpdaterState.UPDATE_AVAILABLE) {
      return {
        status: 'no_update',
        success: false,
        message: 'No update available. Run a check first or force the update.',
        previousVersion: this.safeCurrentVersion(),
        rolledBack: false,
        duration: 0,
        steps: [],
      };
    }

    this.busy = true;
    this.epoch += 1;
    this.state = UpdaterState.APPLYING;
    this.steps = [];

    try {
      const result = await this.runUpdate(startTime, options.progressCallback);
      this.lastResult = result;
      return result;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Restore a named slot, or the newest one
   */
  public async rollback(name?: string): Promise<ManualRollbackResult> {
    if (this.busy) {
      return { success: false, message: 'An update is in progress; rollback rejected', restored: [] };
    }
    this.busy = true;
    this.epoch += 1;

    try {
      const slot = name ? { name } : await this.backups.latestBackup();
      if (!slot) {
        return { success: false, message: 'No backups available', restored: [] };
      }

      logger.info('Manual rollback requested', { backup: slot.name });
      const result = await this.backups.rollbackTo(slot.name);
      if (!result.success) {
        return result;
      }

      const slots = await this.backups.listBackups();
      const version = slots.find((entry) => entry.name === slot.name)?.version;
      if (version) {
        try {
          await this.config.recordUpdate(version);
        } catch (error) {
          logger.warn('Failed to record version after rollback', { version, error: describeError(error) });
        }
      }

      const restart = await this.services.restart(this.serviceTarget());
      this.state = UpdaterState.ROLLED_BACK;
      return { ...result, version, restart };
    } finally {
      this.busy = false;
    }
  }

  /**
   * Restart the appliance service outside of an update
   */
  public async restartService(): Promise<RestartOutcome> {
    return this.services.restart(this.serviceTarget());
  }

  public getStatus(): UpdaterStatus {
    return {
      state: this.state,
      busy: this.busy,
      deploymentType: this.config.deploymentType(),
      updateMethod: this.config.updateMethod(),
      currentVersion: this.config.currentVersion(),
      maintenanceActive: this.maintenance.isActive(),
      lastCheck: this.lastCheck,
      lastResult: this.lastResult,
    };
  }

  // ==================== Update pipeline ====================

  private async runUpdate(startTime: number, progressCallback?: UpdateProgressCallback): Promise<UpdateResult> {
    const previousVersion = this.config.currentVersion();
    const method = this.config.updateMethod();
    let slot: BackupSlot | undefined;
    let applyStarted = false;
    const created: string[] = [];

    logger.info('Starting update', { method, previousVersion, targetDir: this.config.targetDir() });

    try {
      await this.executeStep(
        UpdateStep.ENABLE_MAINTENANCE,
        async () => {
          const enabled = await this.maintenance.enable({
            autoMode: true,
            message: 'The system is being updated and will be back in a few minutes.',
            durationMinutes: 10,
          });
          if (!enabled.success) {
            throw new UpdateError(enabled.error?.code ?? UpdateErrorCode.IO_FAILURE, enabled.message);
          }
        },
        progressCallback
      );

      const scope = this.backupScope(method);
      const backup = this.config.backupSettings();
      if (backup.enabled) {
        slot = await this.executeStep(
          UpdateStep.CREATE_BACKUP,
          () => this.backups.createBackup(scope, { version: previousVersion }),
          progressCallback
        );
      } else {
        this.skipStep(UpdateStep.CREATE_BACKUP, 'Backups are disabled in the update config', progressCallback);
      }

      const targetVersion = method === 'file_download' ? await this.remoteVersion() : null;

      applyStarted = true;
      const pulled = await this.executeStep(
        UpdateStep.APPLY,
        async (): Promise<PullOutcome | null> => {
          if (method === 'git_pull') {
            return this.applyGitPull();
          }
          const outcome = await this.applyFileDownload(created);
          logger.debug('Manifest applied', { created: outcome.created.length });
          return null;
        },
        progressCallback
      );

      if (pulled) {
        const settings = this.config.gitSettings();
        if (await this.dependenciesChanged(pulled, settings.dependency_file)) {
          await this.executeStep(
            UpdateStep.INSTALL_DEPENDENCIES,
            () => this.installDependencies(settings),
            progressCallback
          );
        } else {
          this.skipStep(
            UpdateStep.INSTALL_DEPENDENCIES,
            `${settings.dependency_file} unchanged, nothing to install`,
            progressCallback
          );
        }
      }

      this.state = UpdaterState.VERIFYING;
      await this.executeStep(UpdateStep.VERIFY, () => this.verify(method), progressCallback);

      const newVersion = await this.resolveNewVersion(method, targetVersion);
      await this.executeStep(UpdateStep.RECORD_VERSION, () => this.config.recordUpdate(newVersion), progressCallback);

      await this.finishQuietly(UpdateStep.CLEANUP, () => this.backups.cleanupOldBackups(backup.keepCount), progressCallback);
      await this.finishQuietly(
        UpdateStep.DISABLE_MAINTENANCE,
        async () => {
          const disabled = await this.maintenance.disable();
          if (!disabled.success) {
            throw new UpdateError(disabled.error?.code ?? UpdateErrorCode.IO_FAILURE, disabled.message);
          }
        },
        progressCallback
      );

      // Last: the restart may stop the process running this update
      const restart = await this.executeStep(
        UpdateStep.RESTART_SERVICE,
        () => this.services.restart(this.serviceTarget()),
        progressCallback
      );

      this.state = UpdaterState.IDLE;
      this.updateProgress(UpdateStep.COMPLETE, UpdateStepStatus.COMPLETED, 'Update completed successfully', progressCallback);

      const duration = Date.now() - startTime;
      logger.info('Update completed successfully', { previousVersion, newVersion, duration, restarted: restart.restarted });

      return {
        status: 'success',
        success: true,
        message: `Updated from ${previousVersion} to ${newVersion}`,
        previousVersion,
        newVersion,
        backup: slot?.name,
        rolledBack: false,
        restart,
        duration,
        steps: this.steps,
      };
    } catch (error) {
      const failure = toUpdateError(error, UpdateErrorCode.APPLY_FAILURE);
      logger.error('Update failed', { code: failure.code, error: failure.message, backup: slot?.name });

      const rolledBack = applyStarted ? await this.restoreAfterFailure(slot, created, progressCallback) : false;
      this.state = rolledBack ? UpdaterState.ROLLED_BACK : UpdaterState.FAILED;

      const message = rolledBack
        ? `Update failed and was rolled back: ${failure.message}`
        : `Update failed: ${failure.message}`;

      return {
        status: rolledBack ? 'rolled_back' : 'failed',
        success: false,
        message,
        previousVersion,
        backup: slot?.name,
        rolledBack,
        error: failure.toJSON(),
        duration: Date.now() - startTime,
        steps: this.steps,
      };
    }
  }

  private backupScope(method: UpdateMethod): string[] {
    return method === 'git_pull' ? this.config.gitSettings().backup_paths : this.config.filesToUpdate();
  }

  private async applyGitPull(): Promise<PullOutcome> {
    const git = this.requireGit();
    const before = await git.currentCommit();
    const result = await git.pull();
    if (!result.success) {
      const code = result.timedOut ? UpdateErrorCode.TIMEOUT : UpdateErrorCode.APPLY_FAILURE;
      throw new UpdateError(code, `git pull failed: ${result.stderr.trim() || `exit code ${result.code}`}`);
    }
    return { before, after: await git.currentCommit(), stdout: result.stdout };
  }

  /**
   * Whether the pull touched the dependency file. Falls back to the pull's
   * diffstat when the commits cannot be compared.
   */
  private async dependenciesChanged(pull: PullOutcome, dependencyFile: string): Promise<boolean> {
    if (pull.before && pull.after) {
      if (pull.before === pull.after) {
        return false;
      }
      const changed = await this.requireGit().changedFiles(pull.before, pull.after);
      if (changed) {
        return changed.includes(dependencyFile);
      }
    }
    return pull.stdout.includes(dependencyFile);
  }

  private async installDependencies(settings: GitConfig): Promise<void> {
    const [command, ...args] = settings.install_command;
    if (!command) {
      throw new UpdateError(UpdateErrorCode.CONFIG_INCONSISTENCY, 'git_config.install_command is empty');
    }

    logger.info('Installing dependencies', { command, args, file: settings.dependency_file });
    const result = await this.runner(command, args, {
      cwd: this.config.targetDir(),
      timeoutMs: settings.install_timeout_ms,
    });
    if (!result.success) {
      const code = result.timedOut ? UpdateErrorCode.TIMEOUT : UpdateErrorCode.APPLY_FAILURE;
      const reason = result.timedOut ? 'timed out' : result.stderr.trim() || `exit code ${result.code}`;
      throw new UpdateError(code, `Dependency install failed: ${reason}`);
    }
  }

  /**
   * Download each manifest file in declared order, writing each one only after
   * its own download has completed
   */
  private async applyFileDownload(created: string[]): Promise<ApplyOutcome> {
    const targetDir = this.config.targetDir();
    const rawUrl = this.config.repository().raw_url;

    for (const relative of this.config.filesToUpdate()) {
      const destination = resolveInside(targetDir, relative);
      if (!destination) {
        throw new UpdateError(UpdateErrorCode.CONFIG_INCONSISTENCY, `Manifest path escapes the deployment root: ${relative}`);
      }

      const content = await this.files.download(rawUrl, relative);
      const existed = await fs
        .access(destination)
        .then(() => true)
        .catch(() => false);

      const tempPath = `${destination}.update-${process.pid}.tmp`;
      try {
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await fs.writeFile(tempPath, content);
        await fs.rename(tempPath, destination);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          logger.warn('Failed to remove temporary update file', { path: tempPath, error: describeError(cleanupError) });
        });
        throw toUpdateError(error, UpdateErrorCode.IO_FAILURE);
      }

      if (!existed) {
        created.push(relative);
      }
      logger.debug('Updated file', { file: relative, bytes: content.length });
    }

    return { created };
  }

  private async verify(method: UpdateMethod): Promise<void> {
    if (method === 'git_pull') {
      const head = await this.requireGit().currentCommit();
      if (!head) {
        throw new UpdateError(UpdateErrorCode.APPLY_FAILURE, 'HEAD does not resolve after pull');
      }
      return;
    }

    const targetDir = this.config.targetDir();
    const missing: string[] = [];
    for (const relative of this.config.filesToUpdate()) {
      const target = resolveInside(targetDir, relative);
      const present = target
        ? await fs
            .access(target)
            .then(() => true)
            .catch(() => false)
        : false;
      if (!present) {
        missing.push(relative);
      }
    }
    if (missing.length > 0) {
      throw new UpdateError(UpdateErrorCode.APPLY_FAILURE, `Missing files after update: ${missing.join(', ')}`);
    }
  }

  private async remoteVersion(): Promise<string | null> {
    if (this.lastCheck?.status === 'success' && this.lastCheck.latestVersion) {
      return this.lastCheck.latestVersion;
    }
    return this.files.fetchVersion(this.config.repository().raw_url);
  }

  private async resolveNewVersion(method: UpdateMethod, targetVersion: string | null): Promise<string> {
    if (method === 'git_pull') {
      const short = await this.requireGit().currentShortCommit();
      if (short) {
        return short;
      }
    } else if (targetVersion) {
      return targetVersion;
    }
    return inferVersion(
      { type: this.config.deploymentType(), targetDir: this.config.targetDir() },
      { now: this.now }
    );
  }

  /**
   * Put the slot back and drop files the apply created. Maintenance stays on.
   */
  private async restoreAfterFailure(
    slot: BackupSlot | undefined,
    created: string[],
    progressCallback?: UpdateProgressCallback
  ): Promise<boolean> {
    if (!slot) {
      this.skipStep(UpdateStep.ROLLBACK, 'No backup was taken, nothing to restore', progressCallback);
      return false;
    }

    this.updateProgress(UpdateStep.ROLLBACK, UpdateStepStatus.IN_PROGRESS, `Restoring ${slot.name}`, progressCallback);
    const result = await this.backups.rollbackTo(slot.name);

    const targetDir = this.config.targetDir();
    for (const relative of created) {
      const target = resolveInside(targetDir, relative);
      if (!target) continue;
      try {
        await fs.rm(target, { force: true, recursive: true });
      } catch (error) {
        logger.warn('Failed to remove file created by the failed update', { file: relative, error: describeError(error) });
      }
    }

    if (result.success) {
      this.updateProgress(UpdateStep.ROLLBACK, UpdateStepStatus.COMPLETED, result.message, progressCallback);
      logger.info('Automatic rollback successful', { backup: slot.name, removedNewFiles: created.length });
      return true;
    }

    const error: UpdateErrorInfo = { code: UpdateErrorCode.IO_FAILURE, message: result.message };
    this.updateProgress(UpdateStep.ROLLBACK, UpdateStepStatus.FAILED, result.message, progressCallback, error);
    logger.error('Automatic rollback failed', { backup: slot.name, error: result.message });
    return false;
  }

  // ==================== Check helpers ====================

  private async checkGit(): Promise<UpdateCheckResult> {
    const git = this.requireGit();
    const [current, latest] = await Promise.all([git.currentCommit(), git.latestRemote()]);

    if (!current) {
      return this.errorCheck(new UpdateError(UpdateErrorCode.NOT_FOUND, 'Could not resolve the local git HEAD'));
    }
    if (!latest) {
      return this.errorCheck(
        new UpdateError(UpdateErrorCode.TIMEOUT, 'Could not determine the latest remote commit'),
        current.slice(0, 7)
      );
    }

    const base = {
      status: 'success' as const,
      currentVersion: current.slice(0, 7),
      latestVersion: latest.sha.slice(0, 7),
      checkTime: this.now().toISOString(),
      deploymentType: this.config.deploymentType(),
      remote: latest,
    };

    if (current === latest.sha) {
      return { ...base, updateAvailable: false, commitsBehind: 0, message: 'Already up to date' };
    }

    const fetched = await git.fetchUpdates();
    const behind = fetched ? await git.commitsBehind() : null;
    const commitsBehind = Math.max(1, behind ?? 1);
    return {
      ...base,
      updateAvailable: true,
      commitsBehind,
      message: `${commitsBehind} commit(s) behind ${git.getBranch()}`,
    };
  }

  private async checkFileDownload(): Promise<UpdateCheckResult> {
    const currentVersion = this.config.currentVersion();
    const latest = await this.files.fetchVersion(this.config.repository().raw_url);
    if (!latest) {
      return this.errorCheck(
        new UpdateError(UpdateErrorCode.NOT_FOUND, 'Could not read the published version'),
        currentVersion
      );
    }

    const updateAvailable = latest !== currentVersion;
    return {
      status: 'success',
      updateAvailable,
      commitsBehind: updateAvailable ? 1 : 0,
      currentVersion,
      latestVersion: latest,
      checkTime: this.now().toISOString(),
      deploymentType: this.config.deploymentType(),
      message: updateAvailable ? `Version ${latest} is available` : 'Already up to date',
    };
  }

  private errorCheck(error: UpdateError, currentVersion: string = this.safeCurrentVersion()): UpdateCheckResult {
    return {
      status: 'error',
      updateAvailable: false,
      commitsBehind: 0,
      currentVersion,
      checkTime: this.now().toISOString(),
      deploymentType: this.config.deploymentType(),
      message: error.message,
      error: error.toJSON(),
    };
  }

  // ==================== Private Helper Methods ====================

  private requireGit(): GitMonitor {
    if (!this.git) {
      throw new UpdateError(UpdateErrorCode.CONFIG_INCONSISTENCY, 'Git deployment without a git monitor');
    }
    return this.git;
  }

  private serviceTarget(): ServiceTarget {
    const deployment = this.config.getRecord().deployment;
    return { serviceName: deployment.service_name, servicePrimitive: deployment.service_primitive };
  }

  private safeCurrentVersion(): string {
    try {
      return this.config.currentVersion();
    } catch {
      return 'unknown';
    }
  }

  /**
   * Execute a step with progress tracking
   */
  private async executeStep<T>(
    step: UpdateStep,
    action: () => Promise<T>,
    progressCallback?: UpdateProgressCallback
  ): Promise<T> {
    this.updateProgress(step, UpdateStepStatus.IN_PROGRESS, `${step}...`, progressCallback);

    try {
      const result = await action();
      this.updateProgress(step, UpdateStepStatus.COMPLETED, `${step} completed`, progressCallback);
      return result;
    } catch (error) {
      const wrapped = toUpdateError(error, UpdateErrorCode.APPLY_FAILURE);
      this.updateProgress(step, UpdateStepStatus.FAILED, `${step} failed: ${wrapped.message}`, progressCallback, wrapped.toJSON());
      throw wrapped;
    }
  }

  /**
   * Run a post-update step whose failure is logged but does not fail the update
   */
  private async finishQuietly<T>(
    step: UpdateStep,
    action: () => Promise<T>,
    progressCallback?: UpdateProgressCallback
  ): Promise<void> {
    try {
      await this.executeStep(step, action, progressCallback);
    } catch (error) {
      logger.warn('Post-update step failed', { step, error: describeError(error) });
    }
  }

  /**
   * Skip a step
   */
  private skipStep(step: UpdateStep, reason: string, progressCallback?: UpdateProgressCallback): void {
    this.updateProgress(step, UpdateStepStatus.SKIPPED, reason, progressCallback);
  }

  private updateProgress(
    step: UpdateStep,
    status: UpdateStepStatus,
    message: string,
    progressCallback?: UpdateProgressCallback,
    error?: UpdateErrorInfo
  ): void {
    const progressUpdate: UpdateProgress = {
      step,
      status,
      message,
      progress: STEP_PROGRESS[step],
      timestamp: this.now(),
      error,
    };

    this.steps.push(progressUpdate);

    if (progressCallback) {
      try {
        progressCallback(progressUpdate);
      } catch (callbackError) {
        logger.warn('Progress callback threw', { step, error: describeError(callbackError) });
      }
    }
  }
}
