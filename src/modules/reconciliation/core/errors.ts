/**
 * Reconciliation Module - Domain Errors
 */

import type { InfraError } from '../../../common/types/errors.js';
import type { CounterStoreUnavailableError } from '../../links/core/errors.js';

/**
 * The lease store failed; the cycle is skipped.
 */
export interface LeaseUnavailableError extends InfraError {
  readonly type: 'LeaseUnavailableError';
}

/**
 * Errors that prevent a pass from running at all.
 */
export type ReconcileError = LeaseUnavailableError | CounterStoreUnavailableError;

export const createLeaseUnavailableError = (
  message: string,
  cause?: unknown
): LeaseUnavailableError => ({
  type: 'LeaseUnavailableError',
  message,
  retryable: true,
  cause,
});
