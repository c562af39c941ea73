/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv (see .env.example).
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv and userStore are unions, so invalid values ('prod', 'mongo') are
 *   caught at startup by Zod rather than silently falling through.
 * - DATABASE_URL is only required when USER_STORE=postgres.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const UserStoreKindSchema = z.enum(['postgres', 'memory']).default('postgres');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    USER_STORE: UserStoreKindSchema,
    DATABASE_URL: z.string().min(1).optional(),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('user-directory-backend'),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

    CORS_ORIGIN: z.string().min(1).default('*'),
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when USER_STORE=postgres',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type UserStoreKind = z.infer<typeof UserStoreKindSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  userStore: UserStoreKind;
  databaseUrl: string | null;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  corsOrigin: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    userStore: parsed.USER_STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    corsOrigin: parsed.CORS_ORIGIN,
  };
}
