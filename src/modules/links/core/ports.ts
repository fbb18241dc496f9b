/**
 * Links Module - Port Interfaces
 *
 * Defines the durable store, counter store and cache contracts that the
 * shell layer must implement.
 */

import type { CounterStoreUnavailableError, ShortLinkRepoError } from './errors.js';
import type { NewShortLink, ShortLink } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Durable Link Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Repository interface for the authoritative link records.
 */
export interface ShortLinkRepository {
  /**
   * Finds a short link by its code.
   * @returns The short link if found, null if not found
   */
  getByCode(code: string): Promise<Result<ShortLink | null, ShortLinkRepoError>>;

  /**
   * Inserts a new link with a visit count of zero.
   * Fails with ShortLinkAlreadyExistsError when the code is taken.
   */
  create(input: NewShortLink): Promise<Result<ShortLink, ShortLinkRepoError>>;

  /**
   * Adds a delta to the committed visit count
   * (`visit_count = visit_count + delta`).
   * Fails with ShortLinkNotFoundError when no row has this code.
   */
  addToVisitCount(code: string, delta: number): Promise<Result<void, ShortLinkRepoError>>;

  /**
   * Lists the links created by an owner, newest first.
   */
  listByOwner(owner: string): Promise<Result<ShortLink[], ShortLinkRepoError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Fast Counter Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shared integer counters holding visit deltas since the last reconciliation.
 *
 * A code's delta has two parts: the pending part the resolver increments,
 * and the in-flight part a reconciliation pass has claimed but not yet
 * acknowledged. Every operation is a single atomic step of the backing store.
 */
export interface VisitCounterStore {
  /**
   * Atomically adds `by` (default 1) to the code's pending delta.
   * @returns The new pending delta
   */
  increment(code: string, by?: number): Promise<Result<number, CounterStoreUnavailableError>>;

  /**
   * Atomically moves the pending delta into the in-flight part and resets
   * the pending part to zero.
   *
   * An in-flight delta left by an earlier take that was never acknowledged
   * is returned again.
   * @returns The whole in-flight delta (0 when absent)
   */
  takeAndReset(code: string): Promise<Result<number, CounterStoreUnavailableError>>;

  /**
   * Removes a delta returned by takeAndReset from the in-flight part, once
   * it has been merged or discarded.
   */
  acknowledge(code: string, delta: number): Promise<Result<void, CounterStoreUnavailableError>>;

  /**
   * Reads the delta (pending plus in-flight) without changing it.
   */
  peek(code: string): Promise<Result<number, CounterStoreUnavailableError>>;

  /**
   * Reads the deltas of several codes in one round trip.
   * Codes without an entry map to 0.
   */
  peekMany(codes: readonly string[]): Promise<Result<Map<string, number>, CounterStoreUnavailableError>>;

  /**
   * Lists codes with a pending or in-flight entry.
   */
  listPendingCodes(): Promise<Result<string[], CounterStoreUnavailableError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Target URL Cache
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Bounded read-through cache for code → target URL.
 * Entries never need invalidation: target URLs are immutable.
 */
export interface TargetUrlCache {
  /**
   * Gets a cached target URL for a code.
   * @returns The target URL if cached, null if not cached
   */
  get(code: string): Promise<string | null>;

  /**
   * Caches a target URL for a code.
   */
  set(code: string, targetUrl: string): Promise<void>;
}

/**
 * No-op cache implementation for when caching is disabled.
 */
export const noopTargetUrlCache: TargetUrlCache = {
  get: () => Promise.resolve(null),
  set: () => Promise.resolve(),
};
