/*
  Error taxonomy for the ride admin API.
  Every error the API reports on purpose is an AppError carrying its HTTP status
  and a stable error_code; anything else is answered as a 500.
*/

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_QUERY'
  | 'INVALID_ORDERING'
  | 'MISSING_COORDINATES'
  | 'INVALID_COORDINATES'
  | 'INVALID_PAGINATION'
  | 'AUTH_TOKEN_MISSING'
  | 'AUTH_TOKEN_INVALID'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'STORE_ERROR'
  | 'INTERNAL_SERVER_ERROR';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number = 500,
    public readonly details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code: ErrorCode = 'VALIDATION_ERROR', details?: unknown) {
    super(message, code, 400, details);
    this.name = 'ValidationError';
  }
}

export class InvalidOrderingError extends ValidationError {
  constructor(public readonly field: string, allowed: readonly string[]) {
    super(
      `Invalid ordering field "${field}". Allowed values: ${allowed.join(', ')}.`,
      'INVALID_ORDERING'
    );
    this.name = 'InvalidOrderingError';
  }
}

export class MissingCoordinatesError extends ValidationError {
  constructor() {
    super('Sorting by distance requires both "lat" and "lng" query parameters.', 'MISSING_COORDINATES');
    this.name = 'MissingCoordinatesError';
  }
}

export class InvalidCoordinatesError extends ValidationError {
  constructor() {
    super('"lat" and "lng" must be valid numeric values.', 'INVALID_COORDINATES');
    this.name = 'InvalidCoordinatesError';
  }
}

export class InvalidPaginationError extends ValidationError {
  constructor(parameter: 'page' | 'page_size') {
    super(`"${parameter}" must be a positive integer.`, 'INVALID_PAGINATION');
    this.name = 'InvalidPaginationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, code: 'AUTH_TOKEN_MISSING' | 'AUTH_TOKEN_INVALID' = 'AUTH_TOKEN_MISSING') {
    super(message, code, 401);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'You do not have permission to perform this action.') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised by the store adapter when the database cannot be reached or a query fails.
 * The original driver error is kept as `cause`.
 */
export class StoreError extends AppError {
  constructor(message: string, cause: unknown) {
    super(message, 'STORE_ERROR', 503, undefined, { cause });
    this.name = 'StoreError';
  }
}

export interface ErrorResponse {
  success: false;
  error: string;
  error_code: ErrorCode;
  details?: unknown;
  timestamp: string;
}

export function createErrorResponse(
  message: string,
  errorCode: ErrorCode,
  details?: unknown
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: message,
    error_code: errorCode,
    timestamp: new Date().toISOString()
  };

  if (details !== undefined) {
    response.details = details;
  }

  return response;
}
