import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { getLoggingConfig } from '../config/logging.js';

/**
 * AsyncLocalStorage for run context (run ID, caller-supplied tags, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const config = getLoggingConfig();
  return pino({
    level: config.level,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'docsum',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    redact: {
      paths: config.redactSensitiveFields.flatMap((field) => [field, `*.${field}`]),
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.enablePrettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}

/**
 * Run `fn` with `context` bound for every child logger created inside it
 */
export function runWithContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return requestContext.run({ ...getRequestContext(), ...context }, fn);
}
