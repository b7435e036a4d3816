/**
 * Application errors carry the HTTP status and the error code the
 * error middleware puts in the response envelope.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

// Rejected input, nothing was written
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, 'CONFLICT', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * The backing store could not be read. Mutations refuse to run against the
 * empty snapshot a failed load yields.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string = 'Pantry store is unavailable', details?: unknown) {
    super(message, 503, 'STORE_UNAVAILABLE', details);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
