/**
 * Custom application error class with HTTP status codes and error codes
 * Provides structured error handling across the application
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  // Common error factory methods
  static badRequest(message: string, code: string = 'BAD_REQUEST'): AppError {
    return new AppError(message, 400, code);
  }

  static notFound(resource: string, code: string = 'NOT_FOUND'): AppError {
    return new AppError(`${resource} not found`, 404, code);
  }

  static tooManyRequests(message: string = 'Too many requests', code: string = 'RATE_LIMIT'): AppError {
    return new AppError(message, 429, code);
  }

  static internal(message: string = 'Internal server error', code: string = 'INTERNAL_ERROR'): AppError {
    return new AppError(message, 500, code, false);
  }
}

export const INVALID_INPUT_MESSAGE = 'Please ensure all fields contain valid numbers.';

/**
 * The only failure a calculation can have: a field that is not a usable
 * number. Raised before any arithmetic runs.
 */
export class TaxInputError extends AppError {
  public readonly fields: string[];

  constructor(fields: string[], message: string = INVALID_INPUT_MESSAGE) {
    super(message, 400, 'INVALID_INPUT', true, fields.map(field => ({ field, message: 'Expected a number' })));
    this.fields = fields;
  }
}
