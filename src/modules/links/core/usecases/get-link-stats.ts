/**
 * Get Link Stats Use Case
 *
 * Reports committed, pending and total visits for a link.
 */

import { ok, err, type Result } from 'neverthrow';

import { createShortLinkNotFoundError, type LinkError } from '../errors.js';
import { toLinkStats, type LinkStats, type ShortLink } from '../types.js';
import { validateCode } from '../validation.js';

import type { ShortLinkRepository, VisitCounterStore } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LinkStatsDeps {
  shortLinkRepo: ShortLinkRepository;
  counterStore: VisitCounterStore;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gets visit statistics for one link.
 *
 * The pending delta is read with a non-destructive peek. When the counter
 * store cannot be read the stats still return, flagged pendingUnavailable.
 */
export const getLinkStats = async (
  deps: LinkStatsDeps,
  code: string
): Promise<Result<LinkStats, LinkError>> => {
  const codeResult = validateCode(code);
  if (codeResult.isErr()) {
    return err(codeResult.error);
  }

  const linkResult = await deps.shortLinkRepo.getByCode(codeResult.value);
  if (linkResult.isErr()) {
    return err(linkResult.error);
  }

  const link = linkResult.value;
  if (link === null) {
    return err(createShortLinkNotFoundError(codeResult.value));
  }

  return ok(await withPendingVisits(deps, link));
};

/**
 * Combines a durable record with its pending delta.
 */
export const withPendingVisits = async (
  deps: LinkStatsDeps,
  link: ShortLink
): Promise<LinkStats> => {
  const pendingResult = await deps.counterStore.peek(link.code);

  if (pendingResult.isErr()) {
    deps.logger.warn(
      { code: link.code, error: pendingResult.error },
      'Pending visits unavailable, reporting committed count only'
    );
    return toLinkStats(link, 0, true);
  }

  return toLinkStats(link, pendingResult.value, false);
};
