/**
 * Reconciliation Module - Public API
 *
 * Periodically folds pending visit deltas into the committed visit counts.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ReconcilePassStatus,
  ReconcilePassResult,
  ReconcilePassOptions,
} from './core/types.js';

export {
  DEFAULT_RECONCILE_INTERVAL_MS,
  DEFAULT_LEASE_TTL_MS,
  DEFAULT_MAX_CONSECUTIVE_MERGE_FAILURES,
  RECONCILER_LEASE_NAME,
  emptyPassResult,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors & Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { LeaseUnavailableError, ReconcileError } from './core/errors.js';
export { createLeaseUnavailableError } from './core/errors.js';

export type {
  ReconciliationLease,
  LeaseAcquireOutcome,
  LeaseRenewOutcome,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  runReconciliationPass,
  type RunReconciliationPassDeps,
} from './core/usecases/run-reconciliation-pass.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeRedisLease,
  RENEW_LEASE_SCRIPT,
  RELEASE_LEASE_SCRIPT,
  type RedisLeaseClient,
  type RedisLeaseOptions,
} from './shell/lease/redis-lease.js';

export { makeMemoryLease, type MemoryLeaseOptions } from './shell/lease/memory-lease.js';

export {
  createReconcilerScheduler,
  createDefaultOwnerId,
  type ReconcilerScheduler,
  type ReconcilerSchedulerOptions,
} from './shell/scheduler/reconciler-scheduler.js';
