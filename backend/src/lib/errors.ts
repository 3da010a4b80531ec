/**
 * Domain Errors
 * Error taxonomy raised by the maturity engine. The calling layer maps
 * `statusCode` / `code` onto its own responses.
 */

import type { ZodError } from 'zod';

export interface AppError extends Error {
  statusCode: number;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Malformed or incomplete input: missing dimensions, out-of-range values,
 * pilot gate failures, bad week ordering.
 */
export class ValidationError extends Error implements AppError {
  statusCode = 422;
  code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Operation not allowed in the entity's current lifecycle state.
 */
export class StateError extends Error implements AppError {
  statusCode = 409;
  code = 'INVALID_STATE';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StateError';
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = 'NOT_FOUND';

  constructor(resource = 'Resource', identifier?: string) {
    const message = identifier
      ? `${resource} with ID '${identifier}' not found`
      : `${resource} not found`;
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Lost update on a guarded write. Safe for the caller to retry.
 */
export class ConcurrencyError extends Error implements AppError {
  statusCode = 409;
  code = 'CONCURRENCY_CONFLICT';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConcurrencyError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof ValidationError ||
    error instanceof StateError ||
    error instanceof NotFoundError ||
    error instanceof ConcurrencyError
  );
}

/**
 * Convert a zod failure into a ValidationError listing every issue.
 */
export function fromZodError(error: ZodError, message = 'Input validation failed'): ValidationError {
  return new ValidationError(message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}
