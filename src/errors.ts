/**
 * Validation errors raised before any batching work begins
 */

export enum ValidationErrorCode {
  EMPTY_INPUT = 'EMPTY_INPUT',
  DUPLICATE_JOB_ID = 'DUPLICATE_JOB_ID',
  INVALID_JOB_FIELD = 'INVALID_JOB_FIELD',
  INVALID_CONSTRAINTS = 'INVALID_CONSTRAINTS',
  INVALID_REQUEST = 'INVALID_REQUEST',
}

export interface ValidationErrorDetails {
  path?: Array<string | number>;
  jobId?: string;
}

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly details: ValidationErrorDetails;

  constructor(code: ValidationErrorCode, message: string, details: ValidationErrorDetails = {}) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.details = details;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
