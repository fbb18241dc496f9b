/**
 * Reconciliation Module - Port Interfaces
 */

import type { LeaseUnavailableError } from './errors.js';
import type { Result } from 'neverthrow';

export type LeaseAcquireOutcome = 'granted' | 'denied';
export type LeaseRenewOutcome = 'ok' | 'expired';

/**
 * Exclusive, expiring lease so that at most one process reconciles at a
 * time. Every operation only affects the lease when `ownerId` holds it.
 */
export interface ReconciliationLease {
  /**
   * Takes the lease if nobody holds it.
   */
  acquire(ownerId: string, ttlMs: number): Promise<Result<LeaseAcquireOutcome, LeaseUnavailableError>>;

  /**
   * Extends the lease by its TTL.
   * @returns 'expired' when ownerId no longer holds it
   */
  renew(ownerId: string): Promise<Result<LeaseRenewOutcome, LeaseUnavailableError>>;

  /**
   * Gives the lease up. A no-op when ownerId does not hold it.
   */
  release(ownerId: string): Promise<Result<void, LeaseUnavailableError>>;
}
