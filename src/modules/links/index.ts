/**
 * Links Module - Public API
 *
 * Short link creation, redirect resolution with visit counting, and
 * visit statistics.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type { ShortLink, NewShortLink, LinkStats, ResolverTimeouts } from './core/types.js';

export {
  // Constants
  MAX_TARGET_URL_LENGTH,
  MAX_CODE_LENGTH,
  CODE_PATTERN,
  ALLOWED_TARGET_PROTOCOLS,
  // Helpers
  isValidCode,
  toLinkStats,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LinkError,
  ShortLinkRepoError,
  DurableStoreUnavailableError,
  CounterStoreUnavailableError,
  ShortLinkNotFoundError,
  ShortLinkAlreadyExistsError,
  InvalidInputError,
} from './core/errors.js';

export {
  // Error constructors
  createDurableStoreUnavailableError,
  createCounterStoreUnavailableError,
  createShortLinkNotFoundError,
  createShortLinkAlreadyExistsError,
  createInvalidInputError,
  // HTTP status mapping
  LINK_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ShortLinkRepository, VisitCounterStore, TargetUrlCache } from './core/ports.js';
export { noopTargetUrlCache } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export { validateCode, validateTargetUrl, normalizeOwner } from './core/validation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  resolveShortLink,
  type ResolveShortLinkDeps,
  type ResolveShortLinkInput,
  type ResolveShortLinkResult,
} from './core/usecases/resolve-short-link.js';

export {
  createShortLink,
  type CreateShortLinkDeps,
  type CreateShortLinkInput,
} from './core/usecases/create-short-link.js';

export { getLinkStats, type LinkStatsDeps } from './core/usecases/get-link-stats.js';
export { listOwnerLinks } from './core/usecases/list-owner-links.js';

export {
  createLinkService,
  type LinkService,
  type LinkServiceDeps,
} from './core/link-service.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository
// ─────────────────────────────────────────────────────────────────────────────

export { makeShortLinkRepo, type ShortLinkRepoOptions } from './shell/repo/short-link-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Counter Store
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeRedisVisitCounter,
  TAKE_VISITS_SCRIPT,
  ACKNOWLEDGE_VISITS_SCRIPT,
  type RedisCounterClient,
  type RedisVisitCounterOptions,
} from './shell/counter/redis-visit-counter.js';

export { makeMemoryVisitCounter } from './shell/counter/memory-visit-counter.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Cache
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeMemoryTargetCache,
  type MemoryTargetCacheOptions,
} from './shell/cache/memory-target-cache.js';
