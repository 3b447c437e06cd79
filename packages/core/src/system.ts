/**
 * Update System
 * Composition root wiring every update component together
 */

import axios, { type AxiosInstance } from 'axios';
import { logger } from './utils/logger.js';
import type { CommandRunner, OperatingSystem } from './types/common.js';
import { DeploymentDetector, DEFAULT_INSTALL_ROOT } from './deployment/detector.js';
import { GitMonitor } from './git/monitor.js';
import { UpdateConfigStore, defaultConfigCandidates } from './config/store.js';
import { resolveRuntimeOptions, type RuntimeOptions } from './config/runtime.js';
import type { RepositoryConfig } from './config/types.js';
import { BackupManager } from './backup/manager.js';
import { MaintenanceManager } from './maintenance/manager.js';
import { ServiceManager } from './service/manager.js';
import { RemoteFileSource } from './update/file-source.js';
import { UpdateManager } from './update/manager.js';
import { AutoUpdateScheduler } from './update/scheduler.js';

export interface UpdateSystemOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; overrides APPLIANCE_UPDATE_CONFIG */
  configPath?: string;
  candidatePaths?: string[];
  appRoot?: string;
  detector?: DeploymentDetector;
  runner?: CommandRunner;
  http?: AxiosInstance;
  os?: OperatingSystem;
  now?: () => Date;
}

/**
 * Every wired service. The caller owns the lifecycle (scheduler start/stop).
 */
export interface UpdateSystem {
  runtime: RuntimeOptions;
  detector: DeploymentDetector;
  config: UpdateConfigStore;
  git?: GitMonitor;
  files: RemoteFileSource;
  backups: BackupManager;
  maintenance: MaintenanceManager;
  services: ServiceManager;
  updater: UpdateManager;
  scheduler: AutoUpdateScheduler;
}

/**
 * Build the update system: detect the deployment, load (or create) the config,
 * then construct each component against it
 */
export async function createUpdateSystem(options: UpdateSystemOptions = {}): Promise<UpdateSystem> {
  const runtime = resolveRuntimeOptions(options.env ?? process.env);
  const appRoot = options.appRoot ?? runtime.appRoot;
  const now = options.now ?? (() => new Date());

  const detector =
    options.detector ??
    new DeploymentDetector({
      candidateRoots: [DEFAULT_INSTALL_ROOT, appRoot, process.cwd()],
      serviceName: runtime.serviceName,
      now,
    });

  const repository: Partial<RepositoryConfig> = {};
  if (runtime.repositoryUrl) repository.url = runtime.repositoryUrl;
  if (runtime.repositoryBranch) repository.branch = runtime.repositoryBranch;

  const config = new UpdateConfigStore({
    configPath: options.configPath ?? runtime.configPath,
    candidatePaths: options.candidatePaths ?? defaultConfigCandidates(appRoot),
    detector,
    runner: options.runner,
    repository,
    now,
  });
  await config.loadOrCreate();

  const targetDir = config.targetDir();
  const backupSettings = config.backupSettings();
  const repo = config.repository();
  const http = options.http ?? axios.create({ timeout: runtime.httpTimeoutMs });

  const git =
    config.updateMethod() === 'git_pull'
      ? new GitMonitor({
          repoPath: targetDir,
          apiUrl: repo.api_url,
          branch: repo.branch,
          remote: config.gitSettings().remote,
          runner: options.runner,
          http,
        })
      : undefined;

  const files = new RemoteFileSource({ http, downloadTimeoutMs: runtime.httpTimeoutMs });
  const backups = new BackupManager({
    rootDir: targetDir,
    backupDir: backupSettings.dir,
    keepCount: backupSettings.keepCount,
    now,
  });
  const maintenance = new MaintenanceManager({ appRoot: targetDir, now });
  const services = new ServiceManager({ runner: options.runner, os: options.os });
  const updater = new UpdateManager({ config, backups, maintenance, services, git, files, runner: options.runner, now });
  const scheduler = new AutoUpdateScheduler({ config, updater, now });

  logger.debug('Update system ready', {
    configPath: config.getConfigPath(),
    deploymentType: config.deploymentType(),
    targetDir,
  });

  return { runtime, detector, config, git, files, backups, maintenance, services, updater, scheduler };
}
