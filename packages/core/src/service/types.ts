/**
 * Service Module Types
 */

import type { CommandRunner, OperatingSystem } from '../types/common.js';
import type { DeploymentProfile } from '../deployment/types.js';

/**
 * Service status
 */
export enum ServiceStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  FAILED = 'failed',
  UNKNOWN = 'unknown',
}

/**
 * Service information
 */
export interface ServiceInfo {
  status: ServiceStatus;
  method: RestartMethod;
  detail?: string;
}

export type RestartMethod = 'systemd' | 'launchd' | 'docker' | 'manual';

/**
 * What happened when the service was asked to restart. A restart that could
 * not be performed is reported, never thrown.
 */
export interface RestartOutcome {
  restarted: boolean;
  method: RestartMethod;
  message: string;
}

export type ServiceTarget = Pick<DeploymentProfile, 'serviceName' | 'servicePrimitive'>;

export interface ServiceManagerOptions {
  runner?: CommandRunner;
  /** Defaults to the local platform */
  os?: OperatingSystem;
  timeoutMs?: number;
}
