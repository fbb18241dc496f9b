/**
 * Unit tests for the reconciler scheduler
 */

import { err, ok } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it, vi, afterEach } from 'vitest';

import { makeMemoryVisitCounter, type ShortLinkRepository } from '@/modules/links/index.js';
import {
  createLeaseUnavailableError,
  createReconcilerScheduler,
  makeMemoryLease,
  type ReconciliationLease,
} from '@/modules/reconciliation/index.js';

import { createTestShortLink } from '../../fixtures/builders.js';
import { makeFakeShortLinkRepo } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

/**
 * Repository whose merges wait until `release()` is called.
 */
const makeBlockingRepo = (codes: string[]) => {
  const repo = makeFakeShortLinkRepo({
    shortLinks: codes.map((code) => createTestShortLink({ code })),
  });
  let release: () => void = () => undefined;
  let markEntered: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const entered = new Promise<void>((resolve) => {
    markEntered = resolve;
  });
  const blocking: ShortLinkRepository = {
    ...repo,
    addToVisitCount: async (code, delta) => {
      markEntered();
      await gate;
      return repo.addToVisitCount(code, delta);
    },
  };
  return { repo, blocking, entered, release: () => release() };
};

const schedulerOptions = {
  logger: testLogger,
  intervalMs: 1000,
  leaseTtlMs: 60_000,
  maxConsecutiveMergeFailures: 3,
};

describe('createReconcilerScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a pass on every interval', async () => {
    vi.useFakeTimers();
    const repo = makeFakeShortLinkRepo({ shortLinks: [createTestShortLink()] });
    const counterStore = makeMemoryVisitCounter();
    const scheduler = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: repo, counterStore, lease: makeMemoryLease() },
      ownerId: 'worker-1',
    });

    scheduler.start();
    await counterStore.increment('abc123', 2);
    await vi.advanceTimersByTimeAsync(1000);
    expect(repo.store.get('abc123')?.visitCount).toBe(2);

    await counterStore.increment('abc123', 1);
    await vi.advanceTimersByTimeAsync(1000);
    expect(repo.store.get('abc123')?.visitCount).toBe(3);

    await scheduler.stop();
  });

  it('uses a host and process based owner id by default', () => {
    const scheduler = createReconcilerScheduler({
      ...schedulerOptions,
      deps: {
        shortLinkRepo: makeFakeShortLinkRepo(),
        counterStore: makeMemoryVisitCounter(),
        lease: makeMemoryLease(),
      },
    });

    expect(scheduler.ownerId).toContain(`:${String(process.pid)}:`);
  });

  it('skips a run while the previous pass is in flight', async () => {
    const { blocking, release } = makeBlockingRepo(['abc123']);
    const counterStore = makeMemoryVisitCounter();
    await counterStore.increment('abc123');
    const scheduler = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: blocking, counterStore, lease: makeMemoryLease() },
    });

    const first = scheduler.runOnce();
    const second = await scheduler.runOnce();
    release();

    expect(second).toBeNull();
    expect((await first)?._unsafeUnwrap().merged).toBe(1);
  });

  it('skips the cycle and keeps pending deltas when the lease store is down', async () => {
    const repo = makeFakeShortLinkRepo({ shortLinks: [createTestShortLink()] });
    const counterStore = makeMemoryVisitCounter();
    await counterStore.increment('abc123', 2);
    let leaseDown = true;
    const memoryLease = makeMemoryLease();
    const lease: ReconciliationLease = {
      acquire: async (ownerId, ttlMs) =>
        leaseDown
          ? err(createLeaseUnavailableError('lease store offline'))
          : memoryLease.acquire(ownerId, ttlMs),
      renew: async (ownerId) => memoryLease.renew(ownerId),
      release: async (ownerId) => (leaseDown ? ok(undefined) : memoryLease.release(ownerId)),
    };
    const scheduler = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: repo, counterStore, lease },
      ownerId: 'worker-1',
    });

    const failed = await scheduler.runOnce();
    expect(failed?._unsafeUnwrapErr().type).toBe('LeaseUnavailableError');
    expect(repo.store.get('abc123')?.visitCount).toBe(0);
    expect((await counterStore.peek('abc123'))._unsafeUnwrap()).toBe(2);

    leaseDown = false;
    const recovered = await scheduler.runOnce();
    expect(recovered?._unsafeUnwrap().merged).toBe(1);
    expect(repo.store.get('abc123')?.visitCount).toBe(2);
  });

  it('lets only one of two schedulers merge while they overlap', async () => {
    const { repo, blocking, release } = makeBlockingRepo(['abc123']);
    const counterStore = makeMemoryVisitCounter();
    const lease = makeMemoryLease();
    await counterStore.increment('abc123', 5);
    const a = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: blocking, counterStore, lease },
      ownerId: 'worker-a',
    });
    const b = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: blocking, counterStore, lease },
      ownerId: 'worker-b',
    });

    const passA = a.runOnce();
    const passB = await b.runOnce();
    release();
    const resultA = await passA;

    expect(passB?._unsafeUnwrap().status).toBe('skipped');
    expect(resultA?._unsafeUnwrap().merged).toBe(1);
    expect(repo.store.get('abc123')?.visitCount).toBe(5);
  });

  it('stop() cancels the running pass between codes and waits for it', async () => {
    const { repo, blocking, entered, release } = makeBlockingRepo(['c1', 'c2']);
    const counterStore = makeMemoryVisitCounter();
    await counterStore.increment('c1');
    await counterStore.increment('c2');
    const scheduler = createReconcilerScheduler({
      ...schedulerOptions,
      deps: { shortLinkRepo: blocking, counterStore, lease: makeMemoryLease() },
    });
    scheduler.start();

    const pass = scheduler.runOnce();
    await entered;
    const stopped = scheduler.stop();
    release();
    await stopped;

    expect(scheduler.isRunning()).toBe(false);
    expect((await pass)?._unsafeUnwrap().status).toBe('cancelled');
    expect(repo.store.get('c1')?.visitCount).toBe(1);
    expect((await counterStore.peek('c2'))._unsafeUnwrap()).toBe(1);
  });
});
