/**
 * Level-filtered logger shared by the client and the watch engine.
 *
 * Everything goes to stderr so that programs embedding the client keep
 * stdout for their own output.
 */

import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, err?: unknown, context?: LogContext): void;
  child(scope: string): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).catch('info');

let currentLogLevel: LogLevel = LogLevelSchema.parse(process.env.LOG_LEVEL?.toLowerCase());

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLogLevel];
}

export function formatMessage(level: LogLevel, scope: string | undefined, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]` : `[${timestamp}] [${level.toUpperCase()}]`;
  if (context && Object.keys(context).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(context)}`;
  }
  return `${prefix} ${message}`;
}

function createLogger(scope?: string): Logger {
  return {
    debug(message, context) {
      if (shouldLog('debug')) {
        console.error(formatMessage('debug', scope, message, context));
      }
    },

    info(message, context) {
      if (shouldLog('info')) {
        console.error(formatMessage('info', scope, message, context));
      }
    },

    warn(message, context) {
      if (shouldLog('warn')) {
        console.error(formatMessage('warn', scope, message, context));
      }
    },

    /**
     * Log error-level messages with optional error object
     */
    error(message, err, context) {
      if (!shouldLog('error')) {
        return;
      }
      if (err) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        console.error(formatMessage('error', scope, `${message}: ${errorMessage}`, context));
      } else {
        console.error(formatMessage('error', scope, message, context));
      }
    },

    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger: Logger = createLogger();
