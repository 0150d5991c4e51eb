import corsModule, { CorsOptions } from 'cors';
import { config, corsOrigins } from '../config';
import { logger } from '../utils/logger';

const staticAllowedOrigins = [
  'http://localhost:3000',
];

export function isOriginAllowed(origin: string, allowed: string[] = corsOrigins()): boolean {
  if (allowed.includes('*')) {
    return true;
  }

  if (staticAllowedOrigins.includes(origin) || allowed.includes(origin)) {
    return true;
  }

  // Development: allow all localhost origins
  return config.NODE_ENV === 'development' && (origin.includes('localhost') || origin.includes('127.0.0.1'));
}

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin || isOriginAllowed(origin)) {
      callback(null, true);
      return;
    }

    logger.warn('CORS blocked origin', { origin });
    callback(new Error('Not allowed by CORS'));
  },
  credentials: false,
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
  exposedHeaders: ['X-Request-Id'],
};

export default corsModule(corsOptions);
