/**
 * In-memory reconciliation lease for a single process and for tests.
 */

import { ok, type Result } from 'neverthrow';

import type { LeaseUnavailableError } from '../../core/errors.js';
import type { LeaseAcquireOutcome, LeaseRenewOutcome, ReconciliationLease } from '../../core/ports.js';

interface Holder {
  ownerId: string;
  ttlMs: number;
  expiresAt: number;
}

export interface MemoryLeaseOptions {
  /** Clock. Default: Date.now */
  now?: () => number;
}

export const makeMemoryLease = (options: MemoryLeaseOptions = {}): ReconciliationLease => {
  const now = options.now ?? Date.now;
  let holder: Holder | null = null;

  const currentHolder = (): Holder | null => {
    if (holder !== null && now() >= holder.expiresAt) {
      holder = null;
    }
    return holder;
  };

  return {
    acquire(ownerId: string, ttlMs: number): Promise<Result<LeaseAcquireOutcome, LeaseUnavailableError>> {
      if (currentHolder() !== null) {
        return Promise.resolve(ok('denied'));
      }
      holder = { ownerId, ttlMs, expiresAt: now() + ttlMs };
      return Promise.resolve(ok('granted'));
    },

    renew(ownerId: string): Promise<Result<LeaseRenewOutcome, LeaseUnavailableError>> {
      const current = currentHolder();
      if (current === null || current.ownerId !== ownerId) {
        return Promise.resolve(ok('expired'));
      }
      current.expiresAt = now() + current.ttlMs;
      return Promise.resolve(ok('ok'));
    },

    release(ownerId: string): Promise<Result<void, LeaseUnavailableError>> {
      if (currentHolder()?.ownerId === ownerId) {
        holder = null;
      }
      return Promise.resolve(ok(undefined));
    },
  };
};
