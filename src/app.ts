/**
 * Express application
 * CORS, rate limiting, request logging and JSON error responses
 */

import express from 'express';
import rateLimit from 'express-rate-limit';
import cors from './middleware/cors';
import { requestContext } from './middleware/requestContext';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { config } from './config';
import healthRouter from './routes/health';
import schedulesRouter from './routes/schedules';
import catalogsRouter from './routes/catalogs';

export function createApp(): express.Express {
  const app = express();

  app.use(cors);

  app.use(rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' } },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  app.use(express.json({ limit: '2mb' }));
  app.use(requestContext);

  app.use('/health', healthRouter);
  app.use('/api/schedules', schedulesRouter);
  app.use('/api/catalogs', catalogsRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
