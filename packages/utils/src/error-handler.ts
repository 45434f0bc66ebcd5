/**
 * Error Handler
 * =============
 * Centralized error logging.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
}

/**
 * Log an error at the level its kind deserves and describe it
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      // Operational errors - expected, log as warn
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, { ...err.context, ...context });
    }

    return { handled: err.isOperational, message: err.message, code: err.code };
  }

  logger.error('Unknown error occurred', err, context);
  return { handled: false, message: err.message, code: 'UNKNOWN_ERROR' };
}
