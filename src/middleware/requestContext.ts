import { Request, Response, NextFunction } from 'express';
import '../types/express';
import { logger } from '../utils/logger';

/**
 * Generate unique request IDs for tracing
 */
export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Attach a request id (honouring an incoming X-Request-Id) and log each request on finish
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('X-Request-Id');
  const requestId = incoming && incoming.length <= 64 ? incoming : generateRequestId();
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const startTime = Date.now();

  res.on('finish', () => {
    logger.info(`${req.method} ${req.path}`, {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
    });
  });

  next();
}
