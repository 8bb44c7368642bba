/**
 * @tradesim/utils - Shared utilities package
 *
 * Logger, configuration loading and error handling. No simulation logic
 * lives here.
 */

// Logger
export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, getPackageLoggers, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
export { handleError, withContextLabel } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
