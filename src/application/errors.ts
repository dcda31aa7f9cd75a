/**
 * Errors that carry their own HTTP status.
 *
 * Thrown from use cases and pipeline hooks; the HTTP error handler maps
 * them onto the response without further inspection.
 */
export interface AppError extends Error {
  statusCode: number;
  code: string;
  details?: unknown;
}

export class BadRequestError extends Error implements AppError {
  readonly statusCode = 400;
  readonly code = 'BAD_REQUEST';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'BadRequestError';
    this.details = details;
  }
}

export class RequestTimeoutError extends Error implements AppError {
  readonly statusCode = 504;
  readonly code = 'REQUEST_TIMEOUT';

  constructor(timeoutMs: number) {
    super(`Request exceeded ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof Error
    && 'statusCode' in error
    && typeof error.statusCode === 'number'
    && 'code' in error
    && typeof error.code === 'string'
  );
}
