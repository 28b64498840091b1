/**
 * Logger Utility
 *
 * Centralised logging with consistent formatting and environment-aware output.
 * Used by the command-line scripts and configuration loading; the data engine
 * itself never logs.
 */

import { ExamDataError } from './errors';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LOG_LEVEL_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Get the current log level from environment. LOG_LEVEL wins over NODE_ENV.
 */
export function getCurrentLogLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (explicit && Object.hasOwn(LOG_LEVEL_BY_NAME, explicit)) {
    return LOG_LEVEL_BY_NAME[explicit];
  }

  const env = process.env.NODE_ENV || 'development';
  if (env === 'test') return LogLevel.ERROR;
  if (env === 'production') return LogLevel.WARN;
  return LogLevel.DEBUG; // development
}

/**
 * Format log entry with timestamp and context
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: string
): string {
  const timestamp = new Date().toISOString();
  const levelName = LOG_LEVEL_NAMES[level];
  const contextStr = context ? `[${context}] ` : '';
  return `${timestamp} ${levelName} ${contextStr}${message}`;
}

/**
 * Sanitise sensitive data from logs
 */
export function sanitise(data: unknown): unknown {
  if (typeof data !== 'object' || data === null) {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map(sanitise);
  }

  const sanitised: Record<string, unknown> = {};
  const sensitiveKeys = ['password', 'token', 'secret', 'key', 'auth', 'session'];

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some(k => lowerKey.includes(k))) {
      sanitised[key] = '[REDACTED]';
    } else {
      sanitised[key] = sanitise(value);
    }
  }

  return sanitised;
}

/**
 * Core logging function. Writes to stderr so script output on stdout stays
 * machine-readable.
 */
function log(level: LogLevel, message: string, meta?: Record<string, unknown>, context?: string): void {
  const currentLevel = getCurrentLogLevel();

  if (level < currentLevel) {
    return;
  }

  const formattedMessage = formatLogEntry(level, message, context);

  if (meta) {
    console.error(formattedMessage, sanitise(meta));
  } else {
    console.error(formattedMessage);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void;
}

/**
 * Create a contextual logger
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.DEBUG, message, meta, context),
    info: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.INFO, message, meta, context),
    warn: (message: string, meta?: Record<string, unknown>) =>
      log(LogLevel.WARN, message, meta, context),
    error: (message: string, error?: Error | unknown, meta?: Record<string, unknown>) => {
      let errorMeta: Record<string, unknown>;
      if (error instanceof ExamDataError) {
        // Expected failures: the kind and message are enough
        errorMeta = { ...meta, kind: error.kind, error: error.message };
      } else if (error instanceof Error) {
        errorMeta = { ...meta, error: error.message, stack: error.stack };
      } else {
        errorMeta = { ...meta, error };
      }
      log(LogLevel.ERROR, message, errorMeta, context);
    },
  };
}
