/**
 * Structured error types for the capsule ledger
 * Every precondition failure surfaces as one of these, carrying a stable code
 */

/**
 * Error codes enum
 */
export enum ErrorCode {
  // Ledger precondition failures
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  STILL_LOCKED = 'STILL_LOCKED',
  ALREADY_CONSUMED = 'ALREADY_CONSUMED',
  INVALID_RECIPIENT = 'INVALID_RECIPIENT',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  INVALID_UNLOCK_TIME = 'INVALID_UNLOCK_TIME',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  CAPSULE_LIMIT_EXCEEDED = 'CAPSULE_LIMIT_EXCEEDED',

  // Collaborator failures
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  DATABASE_ERROR = 'DATABASE_ERROR',

  // Request errors (400-499)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  AUTH_REQUIRED = 'AUTH_REQUIRED',

  // Internal errors (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: unknown;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number = 500,
    details?: unknown,
    retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.retryable = retryable;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unknown capsule id
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    const message = id !== undefined ? `${resource} with id ${id} not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, { resource, id }, false);
  }
}

/**
 * Caller fails a role check, or the ledger is paused for a gated operation
 */
export class UnauthorizedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.UNAUTHORIZED, 403, details, false);
  }
}

/**
 * Time precondition unmet
 */
export class StillLockedError extends AppError {
  constructor(message: string, details?: { unlockTime: number; now: number }) {
    super(message, ErrorCode.STILL_LOCKED, 423, details, false);
  }
}

export class AlreadyConsumedError extends AppError {
  constructor(capsuleId: number) {
    super(`Capsule ${capsuleId} is already consumed`, ErrorCode.ALREADY_CONSUMED, 409, { capsuleId }, false);
  }
}

export class InvalidRecipientError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_RECIPIENT, 400, undefined, false);
  }
}

export class InvalidAmountError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.INVALID_AMOUNT, 400, details, false);
  }
}

export class InvalidUnlockTimeError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_UNLOCK_TIME, 400, undefined, false);
  }
}

export class InvalidPayloadError extends AppError {
  constructor(message: string, field: string = 'payload') {
    super(message, ErrorCode.INVALID_PAYLOAD, 400, { field }, false);
  }
}

export class CapsuleLimitExceededError extends AppError {
  constructor(principal: string, limit: number) {
    super(
      `Principal ${principal} has reached the limit of ${limit} capsules`,
      ErrorCode.CAPSULE_LIMIT_EXCEEDED,
      429,
      { principal, limit },
      false
    );
  }
}

/**
 * Value transfer collaborator refused or failed the movement of funds
 */
export class TransferFailedError extends AppError {
  constructor(amount: number, from: string, to: string, retryable: boolean = true) {
    super(
      `Transfer of ${amount} from ${from} to ${to} failed`,
      ErrorCode.TRANSFER_FAILED,
      402,
      { amount, from, to },
      retryable
    );
  }
}

/**
 * Persistence layer failure
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(`Database error: ${message}`, ErrorCode.DATABASE_ERROR, 500, details, true);
  }
}

/**
 * Validation error - malformed request input
 */
export class ValidationError extends AppError {
  constructor(message: string, field?: string, details?: unknown) {
    super(
      field ? `Validation error for ${field}: ${message}` : `Validation error: ${message}`,
      ErrorCode.VALIDATION_ERROR,
      400,
      details,
      false
    );
  }
}

/**
 * Authentication error
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, ErrorCode.AUTH_REQUIRED, 401, undefined, false);
  }
}

/**
 * Type guard to check if error is AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
