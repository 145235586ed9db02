/**
 * Logger Service
 *
 * Redacts salary figures and personal identifiers before anything reaches
 * the console. Pay details posted to the calculator never appear in logs.
 */

import { config } from '../config.js';
import { SALARY_COMPONENT_KEYS } from '../tax/incomeAggregator.js';

// Patterns to detect and sanitize sensitive data
const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string; name: string }> = [
  // CNIC (XXXXX-XXXXXXX-X, or 13 digits)
  { pattern: /\b\d{5}-\d{7}-\d\b/g, replacement: '*****-*******-*', name: 'CNIC' },
  { pattern: /\b\d{13}\b/g, replacement: '*************', name: 'CNIC' },

  // Email addresses (partial masking)
  { pattern: /\b([a-zA-Z0-9._%+-]+)@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g, replacement: '***@$2', name: 'Email' },

  // Bearer tokens and JWTs
  { pattern: /Bearer\s+[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/gi, replacement: 'Bearer [REDACTED]', name: 'JWT' },
];

// Keys to redact entirely from objects (compared lower-cased)
const SENSITIVE_KEYS = new Set([
  ...SALARY_COMPONENT_KEYS.map(key => key.toLowerCase()),
  'components',
  'cnic',
  'ntn',
  'password',
  'token',
  'authorization',
]);

// Log levels
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  level?: LogLevel;
  enableConsole?: boolean;
  sanitize?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel;
  private enableConsole: boolean;
  private sanitize: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || config.LOG_LEVEL;
    this.enableConsole = options.enableConsole ?? true;
    this.sanitize = options.sanitize ?? true;
  }

  sanitizeString(value: string): string {
    if (!this.sanitize) return value;

    let sanitized = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  /**
   * Deep sanitize an object, redacting sensitive keys and values
   */
  sanitizeObject(obj: unknown, depth = 0): unknown {
    if (!this.sanitize) return obj;
    if (depth > 10) return '[MAX DEPTH]';

    if (obj === null || obj === undefined) {
      return obj;
    }

    if (typeof obj === 'string') {
      return this.sanitizeString(obj);
    }

    if (typeof obj === 'number' || typeof obj === 'boolean') {
      return obj;
    }

    if (obj instanceof Error) {
      return {
        name: obj.name,
        message: this.sanitizeString(obj.message),
        stack: obj.stack ? this.sanitizeString(obj.stack) : undefined,
      };
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.sanitizeObject(item, depth + 1));
    }

    if (typeof obj === 'object') {
      const sanitized: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) {
          sanitized[key] = '[REDACTED]';
        } else {
          sanitized[key] = this.sanitizeObject(value, depth + 1);
        }
      }
      return sanitized;
    }

    return String(obj);
  }

  private formatArgs(args: unknown[]): unknown[] {
    return args.map(arg => this.sanitizeObject(arg));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private formatPrefix(level: LogLevel): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('debug') || !this.enableConsole) return;
    console.debug(this.formatPrefix('debug'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('info') || !this.enableConsole) return;
    console.info(this.formatPrefix('info'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('warn') || !this.enableConsole) return;
    console.warn(this.formatPrefix('warn'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('error') || !this.enableConsole) return;
    console.error(this.formatPrefix('error'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ContextLogger {
    return new ContextLogger(this, context);
  }
}

/**
 * Context-aware logger that prefixes all messages with context
 */
class ContextLogger {
  constructor(
    private parent: Logger,
    private context: Record<string, unknown>
  ) {}

  private formatMessage(message: string): string {
    const contextStr = Object.entries(this.context)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return `[${contextStr}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    this.parent.debug(this.formatMessage(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.parent.info(this.formatMessage(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.parent.warn(this.formatMessage(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.parent.error(this.formatMessage(message), ...args);
  }
}

export const logger = new Logger();

export { Logger, ContextLogger };

export function createRouteLogger(routeName: string): ContextLogger {
  return logger.child({ route: routeName });
}
