import { Request, Response, NextFunction } from 'express';
import '../types/express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { formatIssues } from '../utils/validation';
import { logger } from '../utils/logger';
import { config } from '../config';

interface ErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
  requestId?: string;
}

interface NormalizedError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

function hasHttpStatus(err: unknown): err is Error & { status: number; type?: unknown } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

function normalizeError(err: unknown): NormalizedError {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message, details: err.details };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: formatIssues(err),
    };
  }

  // body-parser errors (malformed JSON, payload too large) carry their own status
  if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
    return {
      statusCode: err.status,
      code: err.type === 'entity.parse.failed' ? 'MALFORMED_JSON' : 'BAD_REQUEST',
      message: err.message,
    };
  }

  return {
    statusCode: 500,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Internal Server Error',
  };
}

/**
 * Centralized error handler
 * Format: { ok: false, error: { code: string, message: string, details?: unknown } }
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { statusCode, code, message, details } = normalizeError(err);
  const context = { requestId: req.requestId, method: req.method, path: req.path, statusCode, code };

  if (statusCode >= 500) {
    logger.error('Unhandled error', err, context);
  } else {
    logger.warn(message, context);
  }

  const body: ErrorBody = {
    ok: false,
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      ...(config.NODE_ENV === 'development' && err instanceof Error ? { stack: err.stack } : {}),
    },
    ...(req.requestId ? { requestId: req.requestId } : {}),
  };

  res.status(statusCode).json(body);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { requestId: req.requestId, path: req.path });
  res.status(404).json({
    ok: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
