/**
 * Logger Utility
 *
 * Level-filtered console logger used by the registries, providers and
 * orchestration code.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Registry lookups, provider construction, file reads.
 *   - INFO  (1): Provider registration and other routine events. Default level.
 *   - WARN  (2): Fallbacks, missing data files, failed upstream requests.
 *   - ERROR (3): Failures that prevent an operation from completing.
 *
 * CONFIGURATION:
 *   LOG_LEVEL=debug|info|warn|error (default: info)
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('REGISTRY:DATA');
 *   log.info('Provider registered', { name: 'finnhub' });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] Message key=value key=value
 */

import { safeError } from './redact';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && LOG_LEVEL_MAP[envLevel] !== undefined
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();
  const contextStr = formatContext(context);

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset} ${message}${contextStr}`
  );
};

/**
 * Logger interface returned by createLogger
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'REGISTRY:LLM', 'FINNHUB')
 *
 * @example
 * const log = createLogger('FINNHUB');
 * log.warn('Data file not found', { path });
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message: string, context?: LogContext) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message: string, context?: LogContext) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message: string, context?: LogContext) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message: string, context?: LogContext) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

const levelLog = createLogger('LOGGER');

/**
 * Update log level at runtime
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
      levelLog.info('Log level changed', { level: level.toLowerCase() });
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Get current log level as string ('debug', 'info', 'warn' or 'error')
 */
export const getConfiguredLogLevel = (): string => {
  const levelNames = Object.entries(LOG_LEVEL_MAP);
  const current = levelNames.find(([, v]) => v === currentLogLevel);
  return current ? current[0] : 'info';
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await provider.getNews('AAPL', '2024-01-01', '2024-01-07');
 * } catch (error) {
 *   log.error('News lookup failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  const safe = safeError(error);
  return {
    error: safe.message,
    ...(safe.name && safe.name !== 'Error' ? { errorName: safe.name } : {}),
  };
}

export { safeError };
