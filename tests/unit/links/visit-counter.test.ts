/**
 * Unit tests for the visit counter stores
 */

import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { createKeyBuilder } from '@/infra/redis/key-builder.js';
import { makeMemoryVisitCounter, makeRedisVisitCounter } from '@/modules/links/index.js';

import { FakeRedis } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

const makeRedisCounter = (redis = new FakeRedis()) => ({
  redis,
  counter: makeRedisVisitCounter({
    redis,
    keyBuilder: createKeyBuilder({ globalPrefix: 'test' }),
    logger: testLogger,
    scanCount: 2,
  }),
});

describe('makeRedisVisitCounter', () => {
  it('stores deltas under the versioned visits key', async () => {
    const { redis, counter } = makeRedisCounter();

    const result = await counter.increment('abc123');

    expect(result._unsafeUnwrap()).toBe(1);
    expect(redis.peekValue('test:v1:visits:abc123')).toBe('1');
  });

  it('increments by an arbitrary amount', async () => {
    const { counter } = makeRedisCounter();
    await counter.increment('abc123');

    const result = await counter.increment('abc123', 5);

    expect(result._unsafeUnwrap()).toBe(6);
  });

  it('moves the pending delta into the in-flight key on take', async () => {
    const { redis, counter } = makeRedisCounter();
    await counter.increment('abc123', 3);

    const taken = await counter.takeAndReset('abc123');

    expect(taken._unsafeUnwrap()).toBe(3);
    expect(redis.peekValue('test:v1:visits:abc123')).toBeUndefined();
    expect(redis.peekValue('test:v1:inflight:abc123')).toBe('3');
  });

  it('returns an unacknowledged delta again on the next take', async () => {
    const { counter } = makeRedisCounter();
    await counter.increment('abc123', 3);
    await counter.takeAndReset('abc123');
    await counter.increment('abc123', 2);

    expect((await counter.takeAndReset('abc123'))._unsafeUnwrap()).toBe(5);
  });

  it('clears the in-flight key once the whole delta is acknowledged', async () => {
    const { redis, counter } = makeRedisCounter();
    await counter.increment('abc123', 3);
    await counter.takeAndReset('abc123');

    await counter.acknowledge('abc123', 3);

    expect(redis.peekValue('test:v1:inflight:abc123')).toBeUndefined();
    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(0);
  });

  it('lands increments after a take in the next delta', async () => {
    const { redis, counter } = makeRedisCounter();
    await counter.increment('abc123', 3);
    await counter.takeAndReset('abc123');
    await counter.acknowledge('abc123', 3);

    await counter.increment('abc123');

    expect(redis.peekValue('test:v1:visits:abc123')).toBe('1');
    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(1);
  });

  it('returns zero when taking an absent delta', async () => {
    const { counter } = makeRedisCounter();

    expect((await counter.takeAndReset('missing'))._unsafeUnwrap()).toBe(0);
  });

  it('peeks without resetting', async () => {
    const { counter } = makeRedisCounter();
    await counter.increment('abc123', 2);

    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(2);
    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(2);
  });

  it('counts pending and in-flight parts when peeking', async () => {
    const { counter } = makeRedisCounter();
    await counter.increment('abc123', 2);
    await counter.takeAndReset('abc123');
    await counter.increment('abc123', 1);

    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(3);
  });

  it('peeks many codes with a single MGET', async () => {
    const { redis, counter } = makeRedisCounter();
    await counter.increment('a', 2);
    await counter.increment('b', 1);
    await counter.takeAndReset('b');
    await counter.increment('b', 4);

    const result = await counter.peekMany(['a', 'b', 'missing']);

    expect([...result._unsafeUnwrap()]).toEqual([
      ['a', 2],
      ['b', 5],
      ['missing', 0],
    ]);
    expect(redis.callCount('mget')).toBe(1);
  });

  it('skips the round trip when peeking no codes', async () => {
    const { redis, counter } = makeRedisCounter();

    expect((await counter.peekMany([]))._unsafeUnwrap().size).toBe(0);
    expect(redis.callCount('mget')).toBe(0);
  });

  it('lists pending codes across scan pages, ignoring foreign keys', async () => {
    const redis = new FakeRedis({ scanPageSize: 2 });
    const { counter } = makeRedisCounter(redis);
    await counter.increment('a');
    await counter.increment('b');
    await counter.increment('c');
    await redis.incrby('test:v2:visits:d', 1);
    await redis.incrby('other:v1:visits:e', 1);

    const result = await counter.listPendingCodes();

    expect([...result._unsafeUnwrap()].sort()).toEqual(['a', 'b', 'c']);
  });

  it('lists in-flight codes before pending ones, once each', async () => {
    const { counter } = makeRedisCounter();
    await counter.increment('a');
    await counter.increment('b');
    await counter.takeAndReset('b');
    await counter.increment('b');

    expect((await counter.listPendingCodes())._unsafeUnwrap()).toEqual(['b', 'a']);
  });

  it('maps Redis failures to CounterStoreUnavailableError', async () => {
    const redis = new FakeRedis();
    redis.setFailing('incrby', true);
    redis.setFailing('eval', true);
    redis.setFailing('mget', true);
    redis.setFailing('scan', true);
    const { counter } = makeRedisCounter(redis);

    expect((await counter.increment('abc123'))._unsafeUnwrapErr().type).toBe(
      'CounterStoreUnavailableError'
    );
    expect((await counter.takeAndReset('abc123'))._unsafeUnwrapErr().type).toBe(
      'CounterStoreUnavailableError'
    );
    expect((await counter.acknowledge('abc123', 1))._unsafeUnwrapErr().type).toBe(
      'CounterStoreUnavailableError'
    );
    expect((await counter.peek('abc123'))._unsafeUnwrapErr().type).toBe(
      'CounterStoreUnavailableError'
    );
    expect((await counter.listPendingCodes())._unsafeUnwrapErr().type).toBe(
      'CounterStoreUnavailableError'
    );
  });

  it('keeps the delta in Redis when the take reply is lost', async () => {
    const redis = new FakeRedis();
    const { counter } = makeRedisCounter(redis);
    await counter.increment('abc123', 3);
    redis.setReplyLost('eval', true);

    const taken = await counter.takeAndReset('abc123');

    expect(taken._unsafeUnwrapErr().type).toBe('CounterStoreUnavailableError');
    expect(redis.peekValue('test:v1:inflight:abc123')).toBe('3');
    expect((await counter.listPendingCodes())._unsafeUnwrap()).toEqual(['abc123']);
  });

  it('treats a non-numeric value as zero', async () => {
    const redis = new FakeRedis();
    redis.data.set('test:v1:visits:abc123', { value: 'garbage', expiresAt: null });
    const { counter } = makeRedisCounter(redis);

    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(0);
  });

  it('discards a non-numeric value on take', async () => {
    const redis = new FakeRedis();
    redis.data.set('test:v1:visits:abc123', { value: 'garbage', expiresAt: null });
    const { counter } = makeRedisCounter(redis);

    expect((await counter.takeAndReset('abc123'))._unsafeUnwrap()).toBe(0);
    expect(redis.peekValue('test:v1:visits:abc123')).toBeUndefined();
    expect(redis.peekValue('test:v1:inflight:abc123')).toBeUndefined();
  });
});

describe('makeMemoryVisitCounter', () => {
  it('supports increment, peek, take, acknowledge and list', async () => {
    const counter = makeMemoryVisitCounter();
    await counter.increment('abc123');
    await counter.increment('abc123', 2);
    await counter.increment('def456');

    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(3);
    expect((await counter.listPendingCodes())._unsafeUnwrap()).toEqual(['abc123', 'def456']);
    expect((await counter.takeAndReset('abc123'))._unsafeUnwrap()).toBe(3);
    expect((await counter.takeAndReset('abc123'))._unsafeUnwrap()).toBe(3);
    expect((await counter.peek('abc123'))._unsafeUnwrap()).toBe(3);

    await counter.acknowledge('abc123', 3);

    expect((await counter.listPendingCodes())._unsafeUnwrap()).toEqual(['def456']);
    expect((await counter.takeAndReset('abc123'))._unsafeUnwrap()).toBe(0);
  });

  it('peeks many codes at once', async () => {
    const counter = makeMemoryVisitCounter();
    await counter.increment('abc123', 2);

    const result = await counter.peekMany(['abc123', 'def456']);

    expect(result._unsafeUnwrap().get('abc123')).toBe(2);
    expect(result._unsafeUnwrap().get('def456')).toBe(0);
  });
});
