/**
 * Utils Module
 */

export { logger, initLogger, getLogger, parseLogLevel, LogLevel } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { UpdateError, UpdateErrorCode, describeError, toUpdateError } from './errors.js';
export type { UpdateErrorInfo } from './errors.js';
export { runCommand } from './exec.js';
export { Mutex } from './mutex.js';
export { resolveInside } from './paths.js';
