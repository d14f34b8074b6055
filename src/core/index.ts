/**
 * Core module exports
 */

export * from './types.js';
export * from './errors.js';
export { logger, createLogger, type Logger } from './logger.js';
