/**
 * Links Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { InfraError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The durable link store (Postgres) failed or timed out.
 */
export interface DurableStoreUnavailableError extends InfraError {
  readonly type: 'DurableStoreUnavailableError';
}

/**
 * The fast counter store (Redis) failed or timed out.
 */
export interface CounterStoreUnavailableError extends InfraError {
  readonly type: 'CounterStoreUnavailableError';
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Short link not found.
 */
export interface ShortLinkNotFoundError {
  readonly type: 'ShortLinkNotFoundError';
  readonly message: string;
  readonly code: string;
}

/**
 * A link with this code already exists.
 */
export interface ShortLinkAlreadyExistsError {
  readonly type: 'ShortLinkAlreadyExistsError';
  readonly message: string;
  readonly code: string;
}

/**
 * Invalid input (malformed URL or code).
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible links module errors.
 */
export type LinkError =
  | DurableStoreUnavailableError
  | CounterStoreUnavailableError
  | ShortLinkNotFoundError
  | ShortLinkAlreadyExistsError
  | InvalidInputError;

/**
 * Errors a short link repository may return.
 */
export type ShortLinkRepoError =
  | DurableStoreUnavailableError
  | ShortLinkNotFoundError
  | ShortLinkAlreadyExistsError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDurableStoreUnavailableError = (
  message: string,
  cause?: unknown
): DurableStoreUnavailableError => ({
  type: 'DurableStoreUnavailableError',
  message,
  retryable: true,
  cause,
});

export const createCounterStoreUnavailableError = (
  message: string,
  cause?: unknown
): CounterStoreUnavailableError => ({
  type: 'CounterStoreUnavailableError',
  message,
  retryable: true,
  cause,
});

export const createShortLinkNotFoundError = (code: string): ShortLinkNotFoundError => ({
  type: 'ShortLinkNotFoundError',
  message: `Short link with code '${code}' not found`,
  code,
});

export const createShortLinkAlreadyExistsError = (code: string): ShortLinkAlreadyExistsError => ({
  type: 'ShortLinkAlreadyExistsError',
  message: `Short link with code '${code}' already exists`,
  code,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes for the transport layer.
 */
export const LINK_ERROR_HTTP_STATUS: Record<LinkError['type'], number> = {
  DurableStoreUnavailableError: 503,
  CounterStoreUnavailableError: 503,
  ShortLinkNotFoundError: 404,
  ShortLinkAlreadyExistsError: 409,
  InvalidInputError: 400,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: LinkError): number => {
  return LINK_ERROR_HTTP_STATUS[error.type];
};
