/**
 * Command context
 * Builds the update system for a single CLI invocation
 */

import {
  createUpdateSystem,
  initLogger,
  LogLevel,
  parseLogLevel,
  type UpdateSystem,
  type UpdateSystemOptions,
} from '@appliance-updater/core';

/**
 * Options every command accepts
 */
export interface CommonOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
  /** Wiring passed through to createUpdateSystem; `config` wins over its configPath */
  system?: UpdateSystemOptions;
}

/**
 * Configure logging for the invocation and wire the update system
 */
export async function loadSystem(options: CommonOptions): Promise<UpdateSystem> {
  const level = options.verbose
    ? LogLevel.DEBUG
    : options.json
      ? LogLevel.ERROR
      : parseLogLevel(process.env.APPLIANCE_LOG_LEVEL, LogLevel.WARN);
  initLogger({ level });

  return createUpdateSystem({ ...options.system, configPath: options.config ?? options.system?.configPath });
}
