/**
 * Links Module - Domain Types
 *
 * Contains domain types, constants, and pure functions for short links.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Maximum target URL length */
export const MAX_TARGET_URL_LENGTH = 2048;

/** Maximum short code length */
export const MAX_CODE_LENGTH = 64;

/** Code pattern regex for validation */
export const CODE_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Protocols a target URL may use */
export const ALLOWED_TARGET_PROTOCOLS: readonly string[] = ['http:', 'https:'];

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Durable short link record.
 */
export interface ShortLink {
  /** Unique, immutable short code */
  readonly code: string;
  /** Absolute URL the code redirects to (immutable) */
  readonly targetUrl: string;
  /** Creation timestamp */
  readonly createdAt: Date;
  /** Opaque identity reference of the creator */
  readonly owner: string | null;
  /** Last committed visit total; only the reconciler changes it */
  readonly visitCount: number;
}

/**
 * Input for inserting a short link.
 */
export interface NewShortLink {
  readonly code: string;
  readonly targetUrl: string;
  readonly owner: string | null;
}

/**
 * Visit statistics for a link.
 * totalVisits = committedVisits + pendingVisits.
 */
export interface LinkStats {
  readonly code: string;
  readonly targetUrl: string;
  readonly owner: string | null;
  readonly createdAt: Date;
  /** Total last merged into the durable store */
  readonly committedVisits: number;
  /** Delta still waiting in the counter store */
  readonly pendingVisits: number;
  readonly totalVisits: number;
  /** True when the counter store could not be read; pendingVisits is then 0 */
  readonly pendingUnavailable: boolean;
}

/**
 * Timeouts applied to store calls on the hot path.
 */
export interface ResolverTimeouts {
  /** Bound on the durable lookup on a cache miss */
  readonly durableStoreMs: number;
  /** Bound on the visit increment */
  readonly counterStoreMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates if a string is a valid short code.
 */
export const isValidCode = (code: string): boolean => {
  return CODE_PATTERN.test(code);
};

/**
 * Builds link statistics from the durable record and the pending delta.
 */
export const toLinkStats = (
  link: ShortLink,
  pendingVisits: number,
  pendingUnavailable: boolean
): LinkStats => ({
  code: link.code,
  targetUrl: link.targetUrl,
  owner: link.owner,
  createdAt: link.createdAt,
  committedVisits: link.visitCount,
  pendingVisits,
  totalVisits: link.visitCount + pendingVisits,
  pendingUnavailable,
});
