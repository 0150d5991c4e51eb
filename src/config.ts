/**
 * Environment configuration
 * Loaded once from process.env (and .env via dotenv) and validated with zod
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DEFAULT_MAX_CANDIDATES: z.coerce.number().int().positive().default(1000),
  MAX_CANDIDATES_LIMIT: z.coerce.number().int().positive().default(10000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(input: Partial<Record<string, string>>): Env {
  return envSchema.parse(input);
}

export const config: Env = parseEnv(process.env);

export function corsOrigins(env: Env = config): string[] {
  return env.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
