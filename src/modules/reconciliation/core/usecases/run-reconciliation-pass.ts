/**
 * Run Reconciliation Pass Use Case
 *
 * Moves pending visit deltas from the counter store into the committed
 * visit counts, under an exclusive lease.
 */

import { ok, err, type Result } from 'neverthrow';

import { emptyPassResult, type ReconcilePassOptions, type ReconcilePassResult } from '../types.js';

import type { ShortLinkRepository, VisitCounterStore } from '../../../links/core/ports.js';
import type { ReconcileError } from '../errors.js';
import type { ReconciliationLease } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunReconciliationPassDeps {
  counterStore: VisitCounterStore;
  shortLinkRepo: ShortLinkRepository;
  lease: ReconciliationLease;
  logger: Logger;
  /** Clock used for lease renewal timing. Default: Date.now */
  now?: () => number;
}

/**
 * Outcome of reconciling one code.
 */
type CodeOutcome =
  | { kind: 'merged'; delta: number; acknowledged: boolean }
  | { kind: 'empty' }
  | { kind: 'skipped' }
  | { kind: 'dropped' }
  | { kind: 'compensated' };

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runs one reconciliation pass.
 *
 * Flow:
 * 1. Acquire the lease (denied → skipped result)
 * 2. List codes with a pending delta
 * 3. Per code: claim the delta, add it to the committed count, then
 *    acknowledge it. A delta whose merge fails stays claimed and is
 *    returned by the next take
 * 4. Between codes: honour cancellation, renew the lease, stop after too many
 *    consecutive durable failures
 * 5. Release the lease
 *
 * Returns an error only when the pass could not start (lease store or
 * listing failure); per-code failures are reported in the result counts.
 */
export const runReconciliationPass = async (
  deps: RunReconciliationPassDeps,
  options: ReconcilePassOptions
): Promise<Result<ReconcilePassResult, ReconcileError>> => {
  const { counterStore, lease, logger } = deps;
  const { ownerId, leaseTtlMs, maxConsecutiveMergeFailures, signal } = options;
  const now = deps.now ?? Date.now;

  // Step 1: Acquire lease
  const acquireResult = await lease.acquire(ownerId, leaseTtlMs);
  if (acquireResult.isErr()) {
    return err(acquireResult.error);
  }
  if (acquireResult.value === 'denied') {
    logger.debug({ ownerId }, 'Reconciliation lease held elsewhere, skipping pass');
    return ok(emptyPassResult('skipped'));
  }

  try {
    // Step 2: List pending codes
    const listResult = await counterStore.listPendingCodes();
    if (listResult.isErr()) {
      return err(listResult.error);
    }

    const codes = listResult.value;
    const result = emptyPassResult('completed');
    result.scanned = codes.length;

    const renewEveryMs = leaseTtlMs / 3;
    let lastRenewedAt = now();
    let consecutiveFailures = 0;

    for (const [index, code] of codes.entries()) {
      // Step 4: Between-code checks
      if (signal?.aborted === true) {
        result.status = 'cancelled';
        result.remaining = codes.length - index;
        break;
      }

      if (now() - lastRenewedAt >= renewEveryMs) {
        const renewResult = await lease.renew(ownerId);
        if (renewResult.isErr() || renewResult.value === 'expired') {
          logger.warn(
            { ownerId, error: renewResult.isErr() ? renewResult.error : undefined },
            'Reconciliation lease lost, stopping pass'
          );
          result.status = 'lease-lost';
          result.remaining = codes.length - index;
          break;
        }
        lastRenewedAt = now();
      }

      // Step 3: Reconcile code
      const outcome = await reconcileCode(deps, code);

      switch (outcome.kind) {
        case 'merged':
          result.merged++;
          result.visitsMerged += outcome.delta;
          if (!outcome.acknowledged) {
            result.unacknowledged++;
          }
          consecutiveFailures = 0;
          break;
        case 'empty':
          result.empty++;
          break;
        case 'skipped':
          result.skipped++;
          break;
        case 'dropped':
          result.dropped++;
          consecutiveFailures = 0;
          break;
        case 'compensated':
          result.compensated++;
          result.failures++;
          consecutiveFailures++;
          break;
      }

      if (consecutiveFailures >= maxConsecutiveMergeFailures) {
        logger.error(
          { consecutiveFailures, remaining: codes.length - index - 1 },
          'Durable store failing repeatedly, aborting reconciliation pass'
        );
        result.status = 'aborted';
        result.remaining = codes.length - index - 1;
        break;
      }
    }

    logger.info({ ...result }, 'Reconciliation pass finished');
    return ok(result);
  } finally {
    // Step 5: Release lease
    const releaseResult = await lease.release(ownerId);
    if (releaseResult.isErr()) {
      logger.warn({ ownerId, error: releaseResult.error }, 'Failed to release reconciliation lease');
    }
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Takes one code's delta and merges it. Always runs to completion once the
 * delta has been taken.
 */
const reconcileCode = async (
  deps: RunReconciliationPassDeps,
  code: string
): Promise<CodeOutcome> => {
  const { counterStore, shortLinkRepo, logger } = deps;

  const takeResult = await counterStore.takeAndReset(code);
  if (takeResult.isErr()) {
    logger.warn({ code, error: takeResult.error }, 'Failed to take visit delta, retrying next pass');
    return { kind: 'skipped' };
  }

  const delta = takeResult.value;
  if (delta === 0) {
    await acknowledge(deps, code, delta);
    return { kind: 'empty' };
  }
  if (delta < 0) {
    logger.warn({ code, delta }, 'Discarding negative visit delta');
    await acknowledge(deps, code, delta);
    return { kind: 'dropped' };
  }

  const mergeResult = await shortLinkRepo.addToVisitCount(code, delta);
  if (mergeResult.isOk()) {
    logger.debug({ code, delta }, 'Visit delta merged');
    const acknowledged = await acknowledge(deps, code, delta);
    if (!acknowledged) {
      logger.error(
        { code, delta },
        'Visit delta merged but still claimed; the next pass will merge it again'
      );
    }
    return { kind: 'merged', delta, acknowledged };
  }

  if (mergeResult.error.type === 'ShortLinkNotFoundError') {
    logger.warn({ code, delta }, 'Discarding visit delta for unknown short link');
    await acknowledge(deps, code, delta);
    return { kind: 'dropped' };
  }

  logger.warn(
    { code, delta, error: mergeResult.error },
    'Merge failed, visit delta kept for next pass'
  );
  return { kind: 'compensated' };
};

/**
 * Releases a claimed delta.
 * @returns false when the counter store could not be reached
 */
const acknowledge = async (
  deps: RunReconciliationPassDeps,
  code: string,
  delta: number
): Promise<boolean> => {
  const result = await deps.counterStore.acknowledge(code, delta);
  if (result.isErr()) {
    deps.logger.warn({ code, delta, error: result.error }, 'Failed to acknowledge visit delta');
    return false;
  }
  return true;
};
