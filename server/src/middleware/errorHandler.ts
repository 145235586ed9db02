import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import crypto from 'crypto';
import { logger } from '../services/logger.js';
import { recordError } from '../services/metrics.js';
import { AppError } from '../utils/AppError.js';
import { sendError } from '../utils/response.js';
import { isProduction } from '../config.js';

/**
 * Error Handler Middleware
 *
 * Provides consistent error responses while hiding sensitive details in production.
 * Logs full error details server-side for debugging.
 */

interface ResolvedError {
  statusCode: number;
  code: string;
  message: string;
  operational: boolean;
  details?: unknown;
}

/**
 * Generate error reference ID for tracking
 */
export function generateErrorRef(): string {
  return crypto.randomBytes(8).toString('hex').toUpperCase();
}

/**
 * body-parser marks a JSON syntax error with this type
 */
function isMalformedBodyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Map Zod validation errors to user-friendly format
 */
function handleZodError(error: ZodError): ResolvedError {
  return {
    statusCode: 400,
    code: 'VALIDATION_ERROR',
    message: 'Validation failed',
    operational: true,
    details: error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }))
  };
}

function toAppError(err: Error): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (isMalformedBodyError(err)) {
    return AppError.badRequest('Request body is not valid JSON');
  }
  return AppError.internal('An unexpected error occurred');
}

export function resolveError(err: Error): ResolvedError {
  if (err instanceof ZodError) {
    return handleZodError(err);
  }

  const appError = toAppError(err);
  return {
    statusCode: appError.statusCode,
    code: appError.code,
    message: appError.message,
    operational: appError.isOperational,
    details: appError.details
  };
}

/**
 * Central error handling middleware
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const errorRef = generateErrorRef();
  const isProd = isProduction();
  const resolved = resolveError(err);
  const unexpected = !resolved.operational || resolved.statusCode >= 500;

  const logDetails = {
    message: err.message,
    stack: unexpected ? err.stack : undefined,
    path: req.path,
    method: req.method,
    requestId: req.requestId
  };
  if (unexpected) {
    logger.error(`[${errorRef}] ${resolved.code}:`, logDetails);
  } else {
    logger.warn(`[${errorRef}] ${resolved.code}:`, logDetails);
  }
  recordError(resolved.code, req.path);

  sendError(res, resolved.statusCode, resolved.code, resolved.message, {
    reference: errorRef,
    details: resolved.details,
    // In development, include stack trace of unexpected errors
    stack: !isProd && unexpected && err.stack ? err.stack.split('\n') : undefined
  });
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Route ${req.method} ${req.path}`));
}
