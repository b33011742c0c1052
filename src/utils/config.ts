import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  JWT_SECRET: z.string().min(1).default('change-me'),
  JWT_EXPIRY_SECONDS: z.coerce.number().int().positive().default(3600),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(10),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  RATE_LIMIT_ENABLED: booleanFlag.default('true'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
  FIRST_SUPERUSER: z.string().email().optional(),
  FIRST_SUPERUSER_PASSWORD: z.string().min(8).optional()
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export type AppConfig = {
  port: number;
  databaseUrl: string;
  dbBusyTimeoutMs: number;
  jwtSecret: string;
  jwtExpirySeconds: number;
  bcryptRounds: number;
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  rateLimit: { enabled: boolean; windowMs: number; max: number };
  firstSuperuser?: { email: string; password: string };
};

let cached: AppConfig | null = null;

/**
 * Retrieves strongly typed configuration derived from environment variables.
 * The result is parsed once and reused.
 * @returns Object containing application configuration values.
 * @throws {Error} When mandatory variables are missing or malformed.
 */
export function getConfig(): AppConfig {
  if (cached) {
    return cached;
  }

  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${message}`);
  }

  const env = result.data;
  cached = {
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    dbBusyTimeoutMs: env.DB_BUSY_TIMEOUT_MS,
    jwtSecret: env.JWT_SECRET,
    jwtExpirySeconds: env.JWT_EXPIRY_SECONDS,
    bcryptRounds: env.BCRYPT_ROUNDS,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    rateLimit: {
      enabled: env.RATE_LIMIT_ENABLED,
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX
    },
    firstSuperuser:
      env.FIRST_SUPERUSER && env.FIRST_SUPERUSER_PASSWORD
        ? { email: env.FIRST_SUPERUSER.toLowerCase(), password: env.FIRST_SUPERUSER_PASSWORD }
        : undefined
  };
  return cached;
}

/**
 * Drops the cached configuration so the next read re-parses the environment.
 * @returns void
 */
export function resetConfig(): void {
  cached = null;
}
