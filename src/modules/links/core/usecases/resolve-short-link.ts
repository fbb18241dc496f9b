/**
 * Resolve Short Link Use Case
 *
 * Resolves a short code to its target URL and records one visit in the
 * fast counter store. Counting never fails or delays a redirect beyond the
 * counter deadline.
 */

import { ok, err, type Result } from 'neverthrow';

import { withDeadline } from '../../../../common/utils/timeout.js';
import {
  createCounterStoreUnavailableError,
  createDurableStoreUnavailableError,
  createShortLinkNotFoundError,
  type LinkError,
} from '../errors.js';
import { validateCode } from '../validation.js';

import type { ShortLinkRepository, TargetUrlCache, VisitCounterStore } from '../ports.js';
import type { ResolverTimeouts } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for resolve short link use case.
 */
export interface ResolveShortLinkDeps {
  shortLinkRepo: ShortLinkRepository;
  counterStore: VisitCounterStore;
  cache: TargetUrlCache;
  logger: Logger;
  timeouts: ResolverTimeouts;
}

/**
 * Input for resolve short link use case.
 */
export interface ResolveShortLinkInput {
  /** Short code to resolve */
  code: string;
}

/**
 * Result of resolve short link use case.
 */
export interface ResolveShortLinkResult {
  /** Target URL to redirect to */
  url: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolves a short code to its target URL.
 *
 * Flow:
 * 1. Validate the code
 * 2. Check cache for URL
 * 3. If cache miss, query the durable store (bounded) and populate the cache
 * 4. Increment the visit delta (bounded, failures only logged)
 * 5. Return target URL
 *
 * Unknown codes return ShortLinkNotFoundError and never create a counter.
 */
export const resolveShortLink = async (
  deps: ResolveShortLinkDeps,
  input: ResolveShortLinkInput
): Promise<Result<ResolveShortLinkResult, LinkError>> => {
  const { shortLinkRepo, cache, timeouts } = deps;

  const codeResult = validateCode(input.code);
  if (codeResult.isErr()) {
    return err(codeResult.error);
  }
  const code = codeResult.value;

  let url = await cache.get(code);

  if (url === null) {
    const linkResult = await withDeadline(
      shortLinkRepo.getByCode(code),
      timeouts.durableStoreMs,
      () =>
        createDurableStoreUnavailableError(
          `Short link lookup timed out after ${String(timeouts.durableStoreMs)}ms`
        )
    );
    if (linkResult.isErr()) {
      return err(linkResult.error);
    }

    const link = linkResult.value;
    if (link === null) {
      return err(createShortLinkNotFoundError(code));
    }

    url = link.targetUrl;
    await cache.set(code, url);
  }

  await recordVisit(deps, code);

  return ok({ url });
};

/**
 * Adds one visit to the code's pending delta.
 * A failure loses at most this single visit and never fails the resolution.
 */
const recordVisit = async (deps: ResolveShortLinkDeps, code: string): Promise<void> => {
  const { counterStore, logger, timeouts } = deps;

  const result = await withDeadline(counterStore.increment(code), timeouts.counterStoreMs, () =>
    createCounterStoreUnavailableError(
      `Visit increment timed out after ${String(timeouts.counterStoreMs)}ms`
    )
  );

  if (result.isErr()) {
    logger.warn({ code, error: result.error }, 'Failed to record visit');
  }
};
