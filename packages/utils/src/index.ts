/**
 * @stellar-grid/utils - shared infrastructure
 */

export {
  logger,
  createLogger,
  getLogDirectory,
  resolveLoggerConfig,
  Logger,
  winstonLogger,
} from './logger.js';
export type { LogContext, LoggerConfig } from './logger.js';
export * from './errors.js';
export * from './config/index.js';
