// src/shared/redis/RedisClient.ts

/**
 * Central Redis connection for the plan store.
 *
 * This module ensures there is only one ioredis connection per process.
 * Import this wherever you need Redis access in the infrastructure layer.
 */

import Redis from 'ioredis';

import { config, getRedisUrl } from '../config/Config';
import { logger } from '../logging/Logger';

let redis: Redis | null = null;

/**
 * Get the singleton Redis connection.
 *
 * Commands are bounded by `commandTimeout` and retried at most once on reconnect,
 * so a lost connection surfaces to callers instead of stalling a request.
 */
export function getRedisClient(): Redis {
  if (redis === null) {
    const client = new Redis(getRedisUrl(), {
      keyPrefix: config.redis.keyPrefix || undefined,
      commandTimeout: config.redis.commandTimeoutMs,
      maxRetriesPerRequest: 1,
    });

    client.on('error', (err: Error) => {
      logger.warn({ err }, 'Redis connection error');
    });

    redis = client;
  }

  return redis;
}

/**
 * Gracefully close the Redis connection.
 * Call this from shutdown handlers.
 */
export async function disconnectRedis(): Promise<void> {
  if (redis !== null) {
    const client = redis;
    redis = null;
    await client.quit();
  }
}
