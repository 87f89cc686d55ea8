/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError, isOperationalError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code?: string;
  operational: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));
  const operational = isOperationalError(err);

  if (err instanceof AppError && operational) {
    // Operational errors - log as warn
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
  } else if (err instanceof AppError) {
    // Programming errors - log as error
    logger.error('Application error occurred', err, {
      ...err.context,
      ...context,
    });
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    code: err instanceof AppError ? err.code : undefined,
    operational,
  };
}
