// tests/infrastructure/redisPlanStore.infrastructure.test.ts
/**
 * Infrastructure tests for RedisPlanStore.
 *
 * Uses an in-memory stand-in for the Redis hash commands to verify:
 * - Missing keys (empty HGETALL replies) map to null.
 * - Both fields are written by a single HSET.
 * - DEL replies map to existed / did not exist.
 * - Client failures surface as StoreUnavailableError.
 */

import { RedisPlanStore } from '../../src/plans/infrastructure/RedisPlanStore';
import { StoreUnavailableError } from '../../src/plans/domain/PlanStoreErrors';
import { InMemoryRedisHashClient } from '../support/InMemoryRedisHashClient';

describe('RedisPlanStore', () => {
  it('returns null for a key Redis reports as an empty hash', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);

    await expect(store.get('plan-1')).resolves.toBeNull();
  });

  it('writes data and etag together in one HSET and reads them back', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);

    await store.putFields('plan-1', { data: '{"objectId":"plan-1"}', etag: 'tag-1' });

    expect(client.calls.hset).toBe(1);
    await expect(store.get('plan-1')).resolves.toEqual({
      data: '{"objectId":"plan-1"}',
      etag: 'tag-1',
    });
  });

  it('overwrites both fields of an existing record', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);

    await store.putFields('plan-1', { data: '{"v":1}', etag: 'tag-1' });
    await store.putFields('plan-1', { data: '{"v":2}', etag: 'tag-2' });

    await expect(store.get('plan-1')).resolves.toEqual({ data: '{"v":2}', etag: 'tag-2' });
  });

  it('reports whether a deleted key existed', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);
    await store.putFields('plan-1', { data: '{}', etag: 'tag' });

    await expect(store.delete('plan-1')).resolves.toBe(true);
    await expect(store.delete('plan-1')).resolves.toBe(false);
    await expect(store.get('plan-1')).resolves.toBeNull();
  });

  it('wraps client failures in StoreUnavailableError with the original cause', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);
    const cause = new Error('Command timed out');
    client.failWith = cause;

    const failure = await store.get('plan-1').catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(StoreUnavailableError);
    expect(failure instanceof Error && failure.message).toBe('Redis HGETALL failed');
    expect(failure instanceof Error && failure.cause).toBe(cause);

    await expect(store.putFields('plan-1', { data: '{}', etag: 't' })).rejects.toBeInstanceOf(
      StoreUnavailableError,
    );
    await expect(store.delete('plan-1')).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.ping()).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('ping resolves when Redis answers', async () => {
    const client = new InMemoryRedisHashClient();
    const store = new RedisPlanStore(client);

    await expect(store.ping()).resolves.toBeUndefined();
    expect(client.calls.ping).toBe(1);
  });
});
