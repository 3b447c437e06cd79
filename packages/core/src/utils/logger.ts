/**
 * Logging Module
 * Provides centralized logging using Winston
 */

import winston from 'winston';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level?: LogLevel;
  logToFile?: boolean;
  logDir?: string;
  logFileName?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

const getDefaultLogDir = (): string => {
  return path.join(os.homedir(), '.appliance-updater', 'logs');
};

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Parse a log level name, falling back when it is not one we know
 */
export const parseLogLevel = (raw: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel => {
  const normalized = (raw ?? '').trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
};

/**
 * Create a Winston logger instance
 */
const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = parseLogLevel(process.env.APPLIANCE_LOG_LEVEL),
    logToFile = true,
    logDir = process.env.APPLIANCE_LOG_DIR || getDefaultLogDir(),
    logFileName = 'appliance-updater.log',
    maxFiles = 7,
    maxSize = 10 * 1024 * 1024, // 10MB
    silent = false,
  } = config;

  const transports: winston.transport[] = [];

  transports.push(
    new winston.transports.Console({
      // stdout stays free for command output
      stderrLevels: Object.values(LogLevel),
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${metaStr}`;
        })
      ),
    })
  );

  if (logToFile) {
    ensureLogDir(logDir);

    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, logFileName),
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );

    // Update failures end up here as well, handy when the console is gone after a restart
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.json()
        ),
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    transports,
  });
};

let loggerInstance: winston.Logger | undefined;

/**
 * Initialize the logger with custom configuration
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance = createLogger(config);
  return loggerInstance;
};

/**
 * Get the logger instance
 */
export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

/**
 * Default logger instance (auto-initialized)
 */
export const logger = {
  error: (message: string, meta?: unknown): void => {
    getLogger().error(message, meta);
  },

  warn: (message: string, meta?: unknown): void => {
    getLogger().warn(message, meta);
  },

  info: (message: string, meta?: unknown): void => {
    getLogger().info(message, meta);
  },

  debug: (message: string, meta?: unknown): void => {
    getLogger().debug(message, meta);
  },
};

export type Logger = typeof logger;
