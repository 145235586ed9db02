import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const booleanFlag = z.preprocess(
  (value) => typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value,
  z.boolean()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3001'),
  DISABLE_RATE_LIMIT: booleanFlag.default(false),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100)
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment map.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export const config = loadConfig();

export function isProduction(): boolean {
  return config.NODE_ENV === 'production';
}
