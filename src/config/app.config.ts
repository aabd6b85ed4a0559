import { z } from 'zod';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(3000),
    HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    // Storage
    STORE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().url().optional(),
    // Registration atomic units
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    TRANSACTION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  })
  .refine((env) => env.STORE_DRIVER !== 'postgres' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required when STORE_DRIVER is postgres',
    path: ['DATABASE_URL'],
  });

const env = envSchema.parse(process.env);

export const config = {
  ...env,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'debug' : 'info'),
  database: {
    driver: env.STORE_DRIVER,
    url: env.DATABASE_URL,
    poolSize: env.NODE_ENV === 'production' ? 20 : 5,
  },
  registration: {
    lockTimeoutMs: env.LOCK_TIMEOUT_MS,
    maxTransactionAttempts: env.TRANSACTION_MAX_ATTEMPTS,
  },
};
