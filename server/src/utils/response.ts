import { Response } from 'express';

/**
 * Standardized API Response Helpers
 *
 * Success responses:
 * {
 *   success: true,
 *   data: <payload>,
 *   message?: <optional message>
 * }
 *
 * Error responses:
 * {
 *   success: false,
 *   error: <error code>,
 *   message: <human-readable message>,
 *   reference?: <error tracking ID>,
 *   details?: <validation details>
 * }
 */

export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  message: string;
  reference?: string;
  details?: unknown;
  stack?: string[];
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

/**
 * Send a successful response
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  options: {
    status?: number;
    message?: string;
  } = {}
): Response {
  const { status = 200, message } = options;

  const response: SuccessResponse<T> = {
    success: true,
    data,
    ...(message && { message })
  };

  return res.status(status).json(response);
}

/**
 * Send an error response
 */
export function sendError(
  res: Response,
  statusCode: number,
  error: string,
  message: string,
  options: {
    reference?: string;
    details?: unknown;
    stack?: string[];
  } = {}
): Response {
  const response: ErrorResponse = {
    success: false,
    error,
    message,
  };

  if (options.reference) {
    response.reference = options.reference;
  }
  if (options.details) {
    response.details = options.details;
  }
  if (options.stack) {
    response.stack = options.stack;
  }

  return res.status(statusCode).json(response);
}
