import { Request, Response, NextFunction } from 'express';

/**
 * Input Sanitization Middleware
 *
 * Rejects requests carrying markup or script in any field. Values are
 * not modified; numeric coercion happens later in taxInputSchema.
 */

// Patterns that indicate potential XSS attacks
const DANGEROUS_PATTERNS = [
  /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/i,  // Script tags
  /javascript:/i,                                         // javascript: protocol
  /on\w+\s*=/i,                                          // Event handlers (onclick=, onerror=, etc.)
  /data:\s*text\/html/i,                                 // Data URLs with HTML
  /<iframe/i,
  /<object/i,
  /<embed/i,
  /<svg\b[^>]*onload/i,
];

export function containsDangerousContent(value: string): boolean {
  return DANGEROUS_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Recursively check a value, returning the path of the first offending field
 */
export function findDangerousField(obj: unknown, path: string = ''): string | null {
  if (typeof obj === 'string') {
    return containsDangerousContent(obj) ? path : null;
  }

  if (Array.isArray(obj)) {
    for (let i = 0; i < obj.length; i++) {
      const found = findDangerousField(obj[i], `${path}[${i}]`);
      if (found !== null) return found;
    }
    return null;
  }

  if (obj !== null && typeof obj === 'object') {
    for (const [key, value] of Object.entries(obj)) {
      const keyPath = path ? `${path}.${key}` : key;
      if (containsDangerousContent(key)) return keyPath;

      const found = findDangerousField(value, keyPath);
      if (found !== null) return found;
    }
  }

  return null;
}

/**
 * Sanitization middleware
 *
 * Checks request body and query params for dangerous content.
 */
export function sanitizeInput(req: Request, res: Response, next: NextFunction): void {
  const sources: Array<[string, unknown]> = [['body', req.body], ['query', req.query]];

  for (const [name, source] of sources) {
    const field = findDangerousField(source, name);
    if (field !== null) {
      res.status(400).json({
        success: false,
        error: 'INVALID_INPUT',
        message: 'Potentially dangerous content detected in request',
        details: [{ field, message: 'Markup is not allowed' }]
      });
      return;
    }
  }

  next();
}

/**
 * HTML escape function for output encoding
 * Use this when rendering user input in HTML contexts
 */
export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
