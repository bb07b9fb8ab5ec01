// src/plans/infrastructure/RedisPlanStore.ts

/**
 * RedisPlanStore
 *
 * Infrastructure implementation of IPlanRecordStore on Redis hashes.
 *
 * - One hash per plan id; `data` and `etag` are its fields.
 * - HSET with both fields is a single atomic command; HGETALL reads a
 *   consistent snapshot of the hash.
 * - Any client failure (connection loss, command timeout) is rethrown as
 *   StoreUnavailableError so callers can tell it apart from domain outcomes.
 */

import type Redis from 'ioredis';

import type { IPlanRecordStore } from '../domain/PlanRecordStore';
import { StoreUnavailableError } from '../domain/PlanStoreErrors';
import { getRedisClient } from '../../shared/redis/RedisClient';
import { logger } from '../../shared/logging/Logger';

/**
 * Narrow Redis client surface used by this store.
 * Tests substitute an in-memory implementation.
 */
export type RedisHashClient = {
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, fields: Record<string, string>): Promise<number>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
};

export function toRedisHashClient(redis: Redis): RedisHashClient {
  return {
    hgetall: (key) => redis.hgetall(key),
    hset: (key, fields) => redis.hset(key, fields),
    del: (key) => redis.del(key),
    ping: () => redis.ping(),
  };
}

export class RedisPlanStore implements IPlanRecordStore {
  private readonly redis: RedisHashClient;

  public constructor(client?: RedisHashClient) {
    this.redis = client ?? toRedisHashClient(getRedisClient());
  }

  public async get(key: string): Promise<Record<string, string> | null> {
    const fields = await this.call('HGETALL', key, () => this.redis.hgetall(key));

    // Redis answers HGETALL on a missing key with an empty hash.
    return Object.keys(fields).length === 0 ? null : fields;
  }

  public async putFields(key: string, fields: Record<string, string>): Promise<void> {
    await this.call('HSET', key, () => this.redis.hset(key, fields));
  }

  public async delete(key: string): Promise<boolean> {
    const removed = await this.call('DEL', key, () => this.redis.del(key));
    return removed > 0;
  }

  public async ping(): Promise<void> {
    await this.call('PING', undefined, () => this.redis.ping());
  }

  private async call<T>(command: string, key: string | undefined, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      logger.warn({ err, command, key }, 'Redis command failed');
      throw new StoreUnavailableError(`Redis ${command} failed`, { cause: err });
    }
  }
}
