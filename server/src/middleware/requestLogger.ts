import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger.js';
import { recordHttpRequest } from '../services/metrics.js';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Assigns a request ID (or keeps the caller's X-Request-ID) and logs the
 * request once the response has been sent.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();
  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  const start = Date.now();
  res.on('finish', () => {
    const duration = Date.now() - start;

    logger.info(`${req.method} ${req.path}`, {
      requestId,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      userAgent: req.headers['user-agent']
    });

    // Skip health and metrics endpoints to avoid noise
    if (!req.path.includes('/health') && !req.path.includes('/metrics')) {
      recordHttpRequest(req.method, req.route ? `${req.baseUrl}${String(req.route.path)}` : req.path, res.statusCode, duration);
    }
  });

  next();
}
