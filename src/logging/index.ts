/**
 * Logging Module
 * @module logging
 */

export type {
  LogContext,
  LoggerConfig,
  DomainLogMethods,
  StructuredLogger,
} from './logger.js';

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  sanitizeUrl,
  withLogging,
} from './logger.js';
