/**
 * Unit tests for the reconciliation lease adapters
 */

import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { createKeyBuilder } from '@/infra/redis/key-builder.js';
import { makeMemoryLease, makeRedisLease } from '@/modules/reconciliation/index.js';

import { FakeRedis } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

const LEASE_KEY = 'test:v1:lease:reconciler';

const makeLease = () => {
  let clock = 0;
  const redis = new FakeRedis({ now: () => clock });
  const lease = makeRedisLease({
    redis,
    keyBuilder: createKeyBuilder({ globalPrefix: 'test' }),
    logger: testLogger,
  });
  return {
    redis,
    lease,
    advance: (ms: number) => {
      clock += ms;
    },
  };
};

describe('makeRedisLease', () => {
  it('grants the lease to one owner at a time', async () => {
    const { redis, lease } = makeLease();

    expect((await lease.acquire('worker-1', 1000))._unsafeUnwrap()).toBe('granted');
    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('denied');
    expect(redis.peekValue(LEASE_KEY)).toBe('worker-1');
  });

  it('grants the lease again once it expires', async () => {
    const { lease, advance } = makeLease();
    await lease.acquire('worker-1', 1000);

    advance(1000);

    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('granted');
  });

  it('extends the lease on renewal', async () => {
    const { lease, advance } = makeLease();
    await lease.acquire('worker-1', 1000);

    advance(800);
    expect((await lease.renew('worker-1'))._unsafeUnwrap()).toBe('ok');
    advance(800);

    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('denied');
  });

  it('reports expired when another owner took over', async () => {
    const { lease, advance } = makeLease();
    await lease.acquire('worker-1', 1000);
    advance(1000);
    await lease.acquire('worker-2', 1000);

    expect((await lease.renew('worker-1'))._unsafeUnwrap()).toBe('expired');
  });

  it('reports expired for an owner that never acquired', async () => {
    const { lease } = makeLease();

    expect((await lease.renew('worker-1'))._unsafeUnwrap()).toBe('expired');
  });

  it('only releases a lease held by the caller', async () => {
    const { redis, lease } = makeLease();
    await lease.acquire('worker-1', 1000);

    await lease.release('worker-2');
    expect(redis.peekValue(LEASE_KEY)).toBe('worker-1');

    await lease.release('worker-1');
    expect(redis.peekValue(LEASE_KEY)).toBeUndefined();
  });

  it('maps Redis failures to LeaseUnavailableError', async () => {
    const { redis, lease } = makeLease();
    redis.setFailing('set', true);

    expect((await lease.acquire('worker-1', 1000))._unsafeUnwrapErr().type).toBe(
      'LeaseUnavailableError'
    );
  });
});

describe('makeMemoryLease', () => {
  it('behaves like the Redis lease for a single process', async () => {
    let clock = 0;
    const lease = makeMemoryLease({ now: () => clock });

    expect((await lease.acquire('worker-1', 1000))._unsafeUnwrap()).toBe('granted');
    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('denied');

    clock = 900;
    expect((await lease.renew('worker-1'))._unsafeUnwrap()).toBe('ok');
    clock = 1500;
    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('denied');

    await lease.release('worker-1');
    expect((await lease.acquire('worker-2', 1000))._unsafeUnwrap()).toBe('granted');
    expect((await lease.renew('worker-1'))._unsafeUnwrap()).toBe('expired');
  });
});
