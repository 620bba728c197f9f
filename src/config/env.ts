import { z } from 'zod';

const positiveIntFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MIN: z.coerce.number().int().nonnegative().default(0),
  DB_POOL_MAX: positiveIntFromEnv(10),
  DB_STATEMENT_TIMEOUT_MS: positiveIntFromEnv(15_000),
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters long'),
  DEFAULT_WAREHOUSE_ID: positiveIntFromEnv(1),
  LOW_STOCK_THRESHOLD: z.coerce.number().nonnegative().default(5),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env =>
  envSchema.parse({
    NODE_ENV: source.NODE_ENV,
    PORT: source.PORT,
    LOG_LEVEL: source.LOG_LEVEL,
    DATABASE_URL: source.DATABASE_URL,
    DB_POOL_MIN: source.DB_POOL_MIN,
    DB_POOL_MAX: source.DB_POOL_MAX,
    DB_STATEMENT_TIMEOUT_MS: source.DB_STATEMENT_TIMEOUT_MS,
    JWT_SECRET: source.JWT_SECRET,
    DEFAULT_WAREHOUSE_ID: source.DEFAULT_WAREHOUSE_ID,
    LOW_STOCK_THRESHOLD: source.LOW_STOCK_THRESHOLD,
  });

export const env: Env = parseEnv(process.env);
