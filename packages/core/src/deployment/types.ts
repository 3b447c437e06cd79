/**
 * Deployment Module Types
 */

/**
 * How the appliance is installed
 */
export enum DeploymentType {
  GIT = 'git',
  FILE_DOWNLOAD = 'file_download',
  DEVELOPMENT = 'development',
}

/**
 * How the running service gets restarted for this deployment
 */
export enum ServicePrimitive {
  SYSTEMD = 'systemd',
  DOCKER = 'docker',
  NONE = 'none',
}

/**
 * Update mechanism; always derived from the deployment type
 */
export type UpdateMethod = 'git_pull' | 'file_download';

/**
 * Result of a deployment detection run
 */
export interface DeploymentProfile {
  type: DeploymentType;
  targetDir: string;
  serviceName: string;
  servicePrimitive: ServicePrimitive;
  detectedAt: string;
}

/**
 * Detector options; every path is injectable so detection can run against a scratch tree
 */
export interface DeploymentDetectorOptions {
  /** Roots searched in priority order */
  candidateRoots?: string[];
  /** Relative path whose presence marks a file-download install */
  installMarker?: string;
  /** Relative path whose presence marks a development tree */
  devMarker?: string;
  serviceName?: string;
  /** Directory that exists when systemd is the init system */
  systemdRuntimeDir?: string;
  /** File that exists inside a docker container */
  dockerEnvFile?: string;
  cwd?: () => string;
  now?: () => Date;
}
