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
 *
 * TYPING:
 * - storage is a discriminated union: a postgres config always carries a
 *   databaseUrl, a memory config never does.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-admin-api'),
  SERVICE_VERSION: z.string().default('1.0.0'),

  API_PREFIX: z
    .string()
    .regex(/^\/[a-z0-9/_-]*[a-z0-9_-]$/i, 'API_PREFIX must start with "/" and not end with "/"')
    .default('/api/v1'),

  // Comma-separated browser origins allowed to call the API.
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://localhost:8080')
    .transform((v) =>
      v
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().url())),

  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().min(1).optional(),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type StorageConfig = { driver: 'postgres'; databaseUrl: string } | { driver: 'memory' };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  logLevel: string;
  serviceName: string;
  serviceVersion: string;

  apiPrefix: string;
  corsOrigins: string[];

  storage: StorageConfig;
};

type ParsedEnv = z.infer<typeof ConfigSchema>;

function buildStorageConfig(parsed: ParsedEnv): StorageConfig {
  if (parsed.STORAGE_DRIVER === 'memory') {
    return { driver: 'memory' };
  }

  if (!parsed.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when STORAGE_DRIVER=postgres');
  }

  return { driver: 'postgres', databaseUrl: parsed.DATABASE_URL };
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
    serviceVersion: parsed.SERVICE_VERSION,

    apiPrefix: parsed.API_PREFIX,
    corsOrigins: parsed.CORS_ORIGINS,

    storage: buildStorageConfig(parsed),
  };
}
