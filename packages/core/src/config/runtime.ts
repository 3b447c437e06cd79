/**
 * Runtime Options
 * Reads process-level settings from environment variables with defaults
 */

import path from 'node:path';
import { LogLevel, logger, parseLogLevel } from '../utils/logger.js';
import { DEFAULT_SERVICE_NAME } from '../deployment/detector.js';

export interface RuntimeOptions {
  /** Application root checked after the install root */
  appRoot: string;
  /** Explicit update config location */
  configPath?: string;
  serviceName: string;
  logLevel: LogLevel;
  logDir?: string;
  /** Timeout for raw-file downloads and the remote version lookup */
  httpTimeoutMs: number;
  repositoryUrl?: string;
  repositoryBranch?: string;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Validate and clamp a numeric setting within bounds
 */
function validateNumber(value: number, min: number, max: number, name: string, defaultValue: number): number {
  if (Number.isNaN(value) || value < min || value > max) {
    logger.warn(`Invalid ${name} value, using default`, { value, min, max, default: defaultValue });
    return defaultValue;
  }
  return value;
}

function parseEnvInt(raw: string | undefined, defaultValue: number, min: number, max: number, name: string): number {
  const value = raw ? Number.parseInt(raw, 10) : defaultValue;
  return validateNumber(value, min, max, name, defaultValue);
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Resolve runtime options from an environment map
 */
export function resolveRuntimeOptions(env: NodeJS.ProcessEnv = process.env): RuntimeOptions {
  const configPath = nonEmpty(env.APPLIANCE_UPDATE_CONFIG);
  const logDir = nonEmpty(env.APPLIANCE_LOG_DIR);

  return {
    appRoot: path.resolve(nonEmpty(env.APPLIANCE_ROOT) ?? process.cwd()),
    configPath: configPath ? path.resolve(configPath) : undefined,
    serviceName: nonEmpty(env.APPLIANCE_SERVICE_NAME) ?? DEFAULT_SERVICE_NAME,
    logLevel: parseLogLevel(env.APPLIANCE_LOG_LEVEL),
    logDir: logDir ? path.resolve(logDir) : undefined,
    httpTimeoutMs: parseEnvInt(env.APPLIANCE_HTTP_TIMEOUT_MS, DEFAULT_HTTP_TIMEOUT_MS, 1_000, 300_000, 'APPLIANCE_HTTP_TIMEOUT_MS'),
    repositoryUrl: nonEmpty(env.APPLIANCE_REPOSITORY_URL),
    repositoryBranch: nonEmpty(env.APPLIANCE_REPOSITORY_BRANCH),
  };
}
