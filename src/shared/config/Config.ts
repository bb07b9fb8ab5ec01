/**
 * Runtime configuration for the plan store service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  schemaPath: string;
  jsonBodyLimit: string;
  redis: {
    keyPrefix: string;
    commandTimeoutMs: number;
  };
}

const DEFAULT_PORT = 4000;
const DEFAULT_REDIS_COMMAND_TIMEOUT_MS = 2000;

function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'test' || raw === 'production') {
    return raw;
  }
  return 'development';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  port: parsePositiveInt(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'plan-store-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  schemaPath: process.env.SCHEMA_PATH || 'schema/plan-schema.json',
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '1mb',
  redis: {
    keyPrefix: process.env.REDIS_KEY_PREFIX ?? '',
    commandTimeoutMs: parsePositiveInt(
      process.env.REDIS_COMMAND_TIMEOUT_MS,
      DEFAULT_REDIS_COMMAND_TIMEOUT_MS,
    ),
  },
};

/**
 * Redis connection URL for the plan record store.
 * Throws if not configured to fail fast on startup.
 */
export function getRedisUrl(): string {
  const url = process.env.REDIS_URL;

  if (!url || url.trim().length === 0) {
    throw new Error('REDIS_URL is not configured');
  }

  return url;
}
