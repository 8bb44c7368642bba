/**
 * Error Handler
 * =============
 * Centralized error logging and message formatting.
 */

import { AppError } from './errors.js';
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
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return {
      handled: true,
      message: err.message,
      code: err.code,
      operational: err.isOperational,
    };
  }

  logger.error('Unknown error occurred', err, context);

  return {
    handled: true,
    message: err.message,
    operational: false,
  };
}

/**
 * Append a context label (e.g. a submission identifier) to an error message.
 * The copy keeps the original's class and fields and holds it as `cause`;
 * the original stays untouched.
 */
export function withContextLabel(error: unknown, label: string): Error {
  if (!(error instanceof Error)) {
    return new Error(`${String(error)} [${label}]`);
  }

  const message = `${error.message} [${label}]`;
  const labelled: Error = Object.create(Object.getPrototypeOf(error));
  Object.defineProperties(labelled, Object.getOwnPropertyDescriptors(error));
  Object.defineProperty(labelled, 'message', { value: message, writable: true, configurable: true });
  Object.defineProperty(labelled, 'cause', { value: error, writable: true, configurable: true });
  if (typeof error.stack === 'string') {
    labelled.stack = error.stack.replace(error.message, message);
  }
  return labelled;
}
