/**
 * Reconciler Scheduler
 *
 * Runs a reconciliation pass on a fixed interval. Ticks that arrive while a
 * pass is still running are skipped, and stop() waits for the running pass
 * to finish its current code.
 */

import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';

import { describeError } from '../../../../common/types/errors.js';
import {
  runReconciliationPass,
  type RunReconciliationPassDeps,
} from '../../core/usecases/run-reconciliation-pass.js';

import type { ReconcileError } from '../../core/errors.js';
import type { ReconcilePassResult } from '../../core/types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ReconcilerSchedulerOptions {
  deps: Omit<RunReconciliationPassDeps, 'logger'>;
  logger: Logger;
  intervalMs: number;
  leaseTtlMs: number;
  maxConsecutiveMergeFailures: number;
  /** Lease owner identity. Default: `{hostname}:{pid}:{uuid}` */
  ownerId?: string;
}

export interface ReconcilerScheduler {
  /** Starts the interval timer. Calling it twice has no effect. */
  start(): void;
  /** Stops the timer, cancels the running pass between codes and waits for it. */
  stop(): Promise<void>;
  /**
   * Runs one pass now.
   * @returns null when a pass is already in flight
   */
  runOnce(): Promise<Result<ReconcilePassResult, ReconcileError> | null>;
  readonly ownerId: string;
  isRunning(): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const createDefaultOwnerId = (): string => {
  return `${hostname()}:${String(process.pid)}:${randomUUID()}`;
};

export const createReconcilerScheduler = (
  options: ReconcilerSchedulerOptions
): ReconcilerScheduler => {
  const { intervalMs, leaseTtlMs, maxConsecutiveMergeFailures } = options;
  const ownerId = options.ownerId ?? createDefaultOwnerId();
  const log = options.logger.child({ component: 'ReconcilerScheduler', ownerId });
  const passDeps: RunReconciliationPassDeps = {
    ...options.deps,
    logger: options.logger.child({ usecase: 'runReconciliationPass', ownerId }),
  };

  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<Result<ReconcilePassResult, ReconcileError>> | null = null;
  let controller: AbortController | null = null;
  let consecutiveAborts = 0;

  const recordOutcome = (result: Result<ReconcilePassResult, ReconcileError>): void => {
    if (result.isErr()) {
      log.warn({ error: result.error }, 'Reconciliation pass could not run');
      return;
    }

    if (result.value.status === 'aborted') {
      consecutiveAborts++;
      log.error(
        { consecutiveAborts, remaining: result.value.remaining },
        'Reconciliation pass aborted; pending deltas are accumulating'
      );
    } else if (result.value.status !== 'skipped') {
      consecutiveAborts = 0;
    }
  };

  const runOnce = async (): Promise<Result<ReconcilePassResult, ReconcileError> | null> => {
    if (inFlight !== null) {
      log.debug('Previous reconciliation pass still running, skipping tick');
      return null;
    }

    const passController = new AbortController();
    controller = passController;
    inFlight = runReconciliationPass(passDeps, {
      ownerId,
      leaseTtlMs,
      maxConsecutiveMergeFailures,
      signal: passController.signal,
    });

    try {
      const result = await inFlight;
      recordOutcome(result);
      return result;
    } finally {
      inFlight = null;
      controller = null;
    }
  };

  const tick = (): void => {
    runOnce().catch((error: unknown) => {
      log.error({ err: error }, `Reconciliation pass failed unexpectedly: ${describeError(error)}`);
    });
  };

  return {
    ownerId,

    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(tick, intervalMs);
      log.info({ intervalMs, leaseTtlMs }, 'Reconciler scheduler started');
    },

    async stop(): Promise<void> {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }

      controller?.abort();

      if (inFlight !== null) {
        log.info('Waiting for running reconciliation pass to stop');
        await inFlight.catch((error: unknown) => {
          log.error({ err: error }, 'Reconciliation pass failed while stopping');
        });
      }

      log.info('Reconciler scheduler stopped');
    },

    runOnce,

    isRunning(): boolean {
      return timer !== null;
    },
  };
};
