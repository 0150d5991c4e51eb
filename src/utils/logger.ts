/**
 * Structured logging utility
 * Single-line entries with timestamp, level and a JSON context; secret-looking keys are redacted
 */

import { config } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEYS = ['password', 'token', 'secret', 'apikey', 'api_key', 'authorization'];

export class Logger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private sanitize(value: unknown): unknown {
    if (typeof value !== 'object' || value === null) {
      return value;
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.sanitize(item));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      sanitized[key] = SECRET_KEYS.some((secret) => lowerKey.includes(secret))
        ? '[REDACTED]'
        : this.sanitize(entry);
    }
    return sanitized;
  }

  format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? JSON.stringify(this.sanitize(context)) : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message} ${contextStr}`.trimEnd();
  }

  debug(message: string, context?: LogContext): void {
    if (this.isEnabled('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.isEnabled('info')) {
      console.log(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.isEnabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.isEnabled('error')) {
      return;
    }
    const errorContext: LogContext = {
      ...context,
      error: error instanceof Error ? {
        message: error.message,
        name: error.name,
        stack: config.NODE_ENV === 'production' ? undefined : error.stack,
      } : error,
    };
    console.error(this.format('error', message, errorContext));
  }
}

export const logger = new Logger(config.NODE_ENV === 'test' ? 'error' : config.LOG_LEVEL);
