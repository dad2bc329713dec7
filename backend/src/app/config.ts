/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig() runs once at startup; the returned object is passed to buildDeps()
 *   and never mutated. Nothing else reads process.env (except the logger bootstrap).
 *
 * TYPING:
 * - nodeEnv and storeDriver are unions, so invalid values ('prod', 'mongo') are caught
 *   at startup by Zod rather than silently falling through to the wrong branch.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const StoreDriverSchema = z.enum(['postgres', 'memory']).default('postgres');
const JwtAlgorithmSchema = z.enum(['HS256', 'HS384', 'HS512']).default('HS256');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('tenant-admin-backend'),

    // Document store
    STORE_DRIVER: StoreDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),

    // Tokens
    JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
    JWT_ALGORITHM: JwtAlgorithmSchema,
    JWT_ISSUER: z.string().min(1).default('tenant-admin-api'),
    JWT_AUDIENCE: z.string().min(1).default('tenant-admin-users'),
    JWT_ACCESS_TTL_MINUTES: z.coerce.number().int().min(1).default(30),
    JWT_REFRESH_TTL_DAYS: z.coerce.number().int().min(1).default(7),

    // Password hashing (4 is only sensible in tests)
    BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),
  })
  .refine((env) => env.STORE_DRIVER !== 'postgres' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    path: ['DATABASE_URL'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StoreDriver = z.infer<typeof StoreDriverSchema>;
export type JwtAlgorithm = z.infer<typeof JwtAlgorithmSchema>;

export type AppConfig = Readonly<{
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  storeDriver: StoreDriver;
  databaseUrl: string | null;

  jwt: Readonly<{
    secret: string;
    algorithm: JwtAlgorithm;
    issuer: string;
    audience: string;
    accessTtlMinutes: number;
    refreshTtlDays: number;
  }>;

  bcryptCost: number;
}>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    storeDriver: parsed.STORE_DRIVER,
    databaseUrl: parsed.DATABASE_URL ?? null,

    jwt: {
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      issuer: parsed.JWT_ISSUER,
      audience: parsed.JWT_AUDIENCE,
      accessTtlMinutes: parsed.JWT_ACCESS_TTL_MINUTES,
      refreshTtlDays: parsed.JWT_REFRESH_TTL_DAYS,
    },

    bcryptCost: parsed.BCRYPT_COST,
  };
}
