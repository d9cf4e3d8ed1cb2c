/**
 * Logger Utility
 *
 * A configurable logging system with multiple verbosity levels.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Tracing of resolver chains, scope transitions and dispatch decisions.
 *   - INFO  (1): Startup, registration and request completion. Default level.
 *   - WARN  (2): Recoverable problems (a resolver that threw, an expired scope token).
 *   - ERROR (3): Failures that abort an operation.
 *
 * CONFIGURATION:
 *   LOG_LEVEL=debug|info|warn|error (default: info). Can be changed at runtime
 *   with setLogLevel().
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('SCOPE');
 *   log.info('Scope created', { keys: 2 });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 * When running inside a request context (set up by the requestLogger
 * middleware) the request ID is added to every entry for correlation.
 */

import { requestContext } from './requestContext';
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

// Get log level from environment, default to INFO
const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && LOG_LEVEL_MAP[envLevel] !== undefined
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes for terminal output
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
export const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  return Object.entries(context)
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
};

/**
 * Core logging function - writes formatted log entry to stdout
 */
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

  const reqCtx = requestContext.get();
  const requestIdStr = reqCtx?.requestId ? ` ${colors.dim}[${reqCtx.requestId}]${colors.reset}` : '';

  const enrichedContext: LogContext = {
    ...context,
    ...(reqCtx?.locale && context?.locale === undefined ? { locale: reqCtx.locale } : {}),
  };
  const formatted = formatContext(enrichedContext);
  const contextStr = formatted ? ` ${colors.dim}${formatted}${colors.reset}` : '';

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${contextStr}`
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
 * @param prefix - Module identifier shown in log output (e.g., 'LOCALE', 'SCOPE')
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

/**
 * Default logger instance with 'APP' prefix
 */
export const logger = createLogger('APP');

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
      logger.info('Log level changed', { level: level.toLowerCase() });
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Get current log level as string
 */
export const getConfiguredLogLevel = (): string => {
  const current = Object.entries(LOG_LEVEL_MAP).find(([, v]) => v === currentLogLevel);
  return current ? current[0] : 'info';
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await store.save(entry);
 * } catch (error) {
 *   log.error('Save failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  const safe = safeError(error);
  return {
    error: safe.message,
    ...(safe.name && safe.name !== 'Error' ? { errorName: safe.name } : {}),
  };
}

export default logger;
