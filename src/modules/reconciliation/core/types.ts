/**
 * Reconciliation Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default interval between passes (5 minutes) */
export const DEFAULT_RECONCILE_INTERVAL_MS = 300_000;

/** Default lease TTL */
export const DEFAULT_LEASE_TTL_MS = 60_000;

/** Default number of consecutive durable failures that aborts a pass */
export const DEFAULT_MAX_CONSECUTIVE_MERGE_FAILURES = 3;

/** Name of the lease guarding reconciliation passes */
export const RECONCILER_LEASE_NAME = 'reconciler';

// ─────────────────────────────────────────────────────────────────────────────
// Pass Result
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How a pass ended.
 *
 * - completed: every listed code was processed
 * - aborted: too many consecutive durable store failures
 * - lease-lost: the lease could not be renewed
 * - cancelled: stop was requested between codes
 * - skipped: another process holds the lease
 */
export type ReconcilePassStatus = 'completed' | 'aborted' | 'lease-lost' | 'cancelled' | 'skipped';

export interface ReconcilePassResult {
  status: ReconcilePassStatus;
  /** Codes listed with a pending delta */
  scanned: number;
  /** Codes whose delta reached the durable store */
  merged: number;
  /** Sum of merged deltas */
  visitsMerged: number;
  /** Codes whose taken delta was zero */
  empty: number;
  /** Codes whose delta could not be taken; retried next pass */
  skipped: number;
  /** Failed merges whose delta stays claimed for the next pass */
  compensated: number;
  /** Deltas discarded because the code has no durable row */
  dropped: number;
  /** Merged deltas that could not be acknowledged and will be merged again */
  unacknowledged: number;
  /** Durable store failures during merges */
  failures: number;
  /** Listed codes left untouched when the pass stopped early */
  remaining: number;
}

export const emptyPassResult = (status: ReconcilePassStatus): ReconcilePassResult => ({
  status,
  scanned: 0,
  merged: 0,
  visitsMerged: 0,
  empty: 0,
  skipped: 0,
  compensated: 0,
  dropped: 0,
  unacknowledged: 0,
  failures: 0,
  remaining: 0,
});

/**
 * Settings for a single pass.
 */
export interface ReconcilePassOptions {
  /** Identity of this process as lease holder */
  ownerId: string;
  leaseTtlMs: number;
  maxConsecutiveMergeFailures: number;
  /** Aborting the signal stops the pass between codes */
  signal?: AbortSignal;
}
