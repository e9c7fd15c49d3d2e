/**
 * Environment Config
 * ==================
 *
 * Parsed once at import. `dotenv/config` must be loaded before this module
 * (see server.ts).
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  STORAGE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  DB_NAME: z.string().min(1).default('investment_data'),
  MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  STORE_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  return parsed.data;
}

export const env = loadEnv();
