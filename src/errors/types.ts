/**
 * Custom error types for the workshop assistant.
 */

import { ErrorCode, ERROR_CODES } from './codes';

/**
 * Base error class for all workshop assistant errors.
 */
export class WorkshopError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'WorkshopError';
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The primary activity store cannot be reached.
 */
export class StoreUnavailableError extends WorkshopError {
  constructor(message: string) {
    super(ERROR_CODES.STORE_UNAVAILABLE, message);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A store or inference backend answered with a structured error.
 */
export class BackendError extends WorkshopError {
  public readonly backendCode?: string;

  constructor(
    message: string,
    code: ErrorCode = ERROR_CODES.STORE_BACKEND_ERROR,
    backendCode?: string
  ) {
    super(code, message);
    this.name = 'BackendError';
    this.backendCode = backendCode;
  }
}

/**
 * Request input failed validation. The HTTP layer answers it with a 400.
 */
export class ValidationError extends WorkshopError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(code, message);
    this.name = 'ValidationError';
  }
}
