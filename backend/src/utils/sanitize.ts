/**
 * Input sanitization utilities
 * Validates principals and capsule ids arriving from headers and route params
 */

import { ValidationError } from '../types/errors';

/**
 * Principals are opaque handles: letters, digits and . _ : - up to 128 characters
 */
export const principalPattern = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Validate and normalize a principal
 * @returns Trimmed principal or throws ValidationError
 */
export function sanitizePrincipal(principal: unknown, field: string = 'principal'): string {
  if (typeof principal !== 'string') {
    throw new ValidationError('must be a string', field);
  }

  const trimmed = principal.trim();
  if (!principalPattern.test(trimmed)) {
    throw new ValidationError('invalid principal format', field);
  }

  return trimmed;
}
