/**
 * Error Handler - user-facing messages, full details to the log
 */

import { AppError, logger } from '@stellar-grid/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging)
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    logger.error('CLI error', error, { ...error.toJSON(), ...context });
  } else {
    logger.error('CLI error', error, context);
  }
}

/**
 * Process exit code for an error: the AppError's own, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AppError ? error.exitCode : 1;
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
