import { AppError } from './app-error.js';
import { ErrorCodes } from './error-codes.js';

/**
 * Malformed input: empty identifiers, non-positive capacity and the like.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, true, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

/**
 * A user, event, registration or waitlist entry already exists.
 */
export class DuplicateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, true, ErrorCodes.CONFLICT, details);
    this.name = 'DuplicateError';
  }
}

/**
 * A referenced user, event or registration is absent.
 */
export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, true, ErrorCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

/**
 * The event is full and has no waitlist.
 */
export class CapacityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, true, ErrorCodes.CAPACITY_EXCEEDED, details);
    this.name = 'CapacityError';
  }
}

/**
 * Registration-path failure not covered by the other kinds.
 */
export class RegistrationError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: typeof ErrorCodes.REGISTRATION_FAILED | typeof ErrorCodes.LOCK_TIMEOUT = ErrorCodes.REGISTRATION_FAILED
  ) {
    super(message, 400, true, code, details);
    this.name = 'RegistrationError';
  }
}
