/**
 * Centralized error handling utilities
 */

import { DatabaseError, isAppError } from '../types/errors';
import { getErrorMessage } from '../types/common';

/**
 * Wrap a persistence failure, keeping the original error as details
 */
export function handleDatabaseError(error: unknown, operation: string): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }
  return new DatabaseError(`${operation}: ${getErrorMessage(error)}`, error);
}

export interface ErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
  retryable?: boolean;
  timestamp: string;
}

/**
 * Create standardized error response
 */
export function createErrorResponse(error: unknown, exposeInternals: boolean = true): ErrorResponse {
  if (isAppError(error)) {
    return {
      error: error.message,
      code: error.code,
      details: error.details,
      retryable: error.retryable,
      timestamp: new Date().toISOString(),
    };
  }

  return {
    error: 'Internal server error',
    details: exposeInternals ? getErrorMessage(error) : 'An unexpected error occurred',
    timestamp: new Date().toISOString(),
  };
}
