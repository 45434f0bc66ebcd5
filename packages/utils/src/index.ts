/**
 * @crossbar/utils - Shared utilities package
 *
 * Exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

export { logger, Logger, createLogger } from './logger.js';
export type { LogContext, LogLevel, LogSink } from './logger.js';

export { createPackageLogger, LogHelpers } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, type ErrorHandlerResult } from './error-handler.js';
