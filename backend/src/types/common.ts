/**
 * Common type definitions and utilities
 */

/**
 * Error with message property
 */
export interface ErrorWithMessage {
  message: string;
}

/**
 * Type guard to check if error has message
 */
export function isErrorWithMessage(error: unknown): error is ErrorWithMessage {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Extract error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Count code points rather than UTF-16 units, so astral characters count once
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}
