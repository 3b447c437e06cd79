/**
 * Deployment Detection
 * Classifies the running deployment from filesystem markers
 */

import fs from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import type { DeploymentDetectorOptions, DeploymentProfile, UpdateMethod } from './types.js';
import { DeploymentType, ServicePrimitive } from './types.js';

export const DEFAULT_INSTALL_ROOT = '/opt/speech-appliance';
export const DEFAULT_SERVICE_NAME = 'speech-appliance.service';
export const DEFAULT_INSTALL_MARKER = path.join('src', 'main.py');
export const DEFAULT_DEV_MARKER = '.appliance-dev';

function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

function exists(target: string): boolean {
  try {
    fs.accessSync(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Deployment Detector class
 *
 * Detection is recomputed on every call. An update may change the tree (a
 * file-drop install can become a checkout), so results are never cached.
 */
export class DeploymentDetector {
  private readonly candidateRoots: string[];
  private readonly installMarker: string;
  private readonly devMarker: string;
  private readonly serviceName: string;
  private readonly systemdRuntimeDir: string;
  private readonly dockerEnvFile: string;
  private readonly cwd: () => string;
  private readonly now: () => Date;

  constructor(options: DeploymentDetectorOptions = {}) {
    this.cwd = options.cwd ?? (() => process.cwd());
    this.now = options.now ?? (() => new Date());
    this.candidateRoots = options.candidateRoots ?? [DEFAULT_INSTALL_ROOT, this.cwd()];
    this.installMarker = options.installMarker ?? DEFAULT_INSTALL_MARKER;
    this.devMarker = options.devMarker ?? DEFAULT_DEV_MARKER;
    this.serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
    this.systemdRuntimeDir = options.systemdRuntimeDir ?? '/run/systemd/system';
    this.dockerEnvFile = options.dockerEnvFile ?? '/.dockerenv';
  }

  /**
   * Candidate roots, de-duplicated, in priority order
   */
  public getCandidateRoots(): string[] {
    const seen = new Set<string>();
    const roots: string[] = [];
    for (const root of this.candidateRoots) {
      const resolved = path.resolve(root);
      if (!seen.has(resolved)) {
        seen.add(resolved);
        roots.push(resolved);
      }
    }
    return roots;
  }

  /**
   * Classify the current deployment
   */
  public detect(): DeploymentProfile {
    const roots = this.getCandidateRoots();

    const gitRoot = roots.find((root) => isDirectory(path.join(root, '.git')));
    if (gitRoot) {
      logger.debug('Git checkout detected', { root: gitRoot });
      return this.buildProfile(DeploymentType.GIT, gitRoot);
    }

    const devRoot = roots.find((root) => exists(path.join(root, this.devMarker)));
    if (devRoot) {
      logger.debug('Development tree detected', { root: devRoot });
      return this.buildProfile(DeploymentType.DEVELOPMENT, devRoot);
    }

    const installRoot = roots.find((root) => exists(path.join(root, this.installMarker)));
    if (installRoot) {
      logger.debug('File-download install detected', { root: installRoot });
      return this.buildProfile(DeploymentType.FILE_DOWNLOAD, installRoot);
    }

    logger.warn('Could not determine deployment type, defaulting to file download', { roots });
    return this.buildProfile(DeploymentType.FILE_DOWNLOAD, path.resolve(this.cwd()));
  }

  private buildProfile(type: DeploymentType, targetDir: string): DeploymentProfile {
    return {
      type,
      targetDir,
      serviceName: this.serviceName,
      servicePrimitive: this.detectServicePrimitive(type),
      detectedAt: this.now().toISOString(),
    };
  }

  private detectServicePrimitive(type: DeploymentType): ServicePrimitive {
    if (type === DeploymentType.DEVELOPMENT) {
      return ServicePrimitive.NONE;
    }
    if (isDirectory(this.systemdRuntimeDir)) {
      return ServicePrimitive.SYSTEMD;
    }
    if (exists(this.dockerEnvFile)) {
      return ServicePrimitive.DOCKER;
    }
    return ServicePrimitive.NONE;
  }
}

/**
 * Update method implied by a deployment type
 */
export function updateMethodFor(type: DeploymentType): UpdateMethod {
  return type === DeploymentType.GIT ? 'git_pull' : 'file_download';
}
