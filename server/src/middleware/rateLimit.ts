import rateLimit from 'express-rate-limit';
import { config } from '../config.js';
import { AppError } from '../utils/AppError.js';

/**
 * Rate limiting middleware to prevent abuse
 *
 * - General API: moderate limits for normal usage
 * - Calculations (form and API): per-IP limit on calculation requests
 *
 * A limited request is passed on as a 429 AppError, so the central
 * error handler shapes the response.
 */

const FIFTEEN_MINUTES = 15 * 60 * 1000;

// General API rate limit
export const generalLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES,
  limit: config.RATE_LIMIT_MAX,
  handler: (_req, _res, next) => {
    next(AppError.tooManyRequests('Too many requests, please try again later'));
  },
  standardHeaders: true, // Return rate limit info in headers
  legacyHeaders: false,
});

// Calculation rate limit, shared by form posts and the JSON API
export const calculationLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES,
  limit: config.RATE_LIMIT_MAX * 3,
  handler: (_req, _res, next) => {
    next(AppError.tooManyRequests('Too many calculations, please try again later'));
  },
  standardHeaders: true,
  legacyHeaders: false,
});
