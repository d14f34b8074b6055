/**
 * Centralized Logger Service
 *
 * Provides structured logging using pino. Uses pino-pretty for
 * development and JSON output for production.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('agent');
 *   log.info({ iterations: 3 }, 'Agent finished');
 *   log.error({ err }, 'Provider call failed');
 */

import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Unknown levels fall back to info here; loadConfig rejects them
const envLevel = process.env.LOG_LEVEL?.trim() ?? '';
const level: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const env = process.env.NODE_ENV;
const pretty = env !== 'production' && env !== 'test';

/**
 * Root logger instance
 */
export const logger = pino({
  name: 'travel-planner',
  level,
  // Pretty print in dev, structured JSON in production
  ...(pretty && {
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

/**
 * Create a child logger with a namespace
 *
 * @param namespace - The namespace for this logger (e.g., 'agent', 'query', 'tools:weather')
 */
export function createLogger(namespace: string) {
  return logger.child({ namespace });
}

/**
 * Re-export pino types for convenience
 */
export type { Logger } from 'pino';
