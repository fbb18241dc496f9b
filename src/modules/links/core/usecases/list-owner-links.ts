/**
 * List Owner Links Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidInputError, type LinkError } from '../errors.js';
import { toLinkStats, type LinkStats } from '../types.js';
import { normalizeOwner } from '../validation.js';

import type { LinkStatsDeps } from './get-link-stats.js';

/**
 * Lists every link created by an owner with its visit statistics,
 * newest first. An owner without links gets an empty list.
 *
 * Pending deltas for all links are read in one batch; when that read fails
 * every entry is flagged pendingUnavailable.
 */
export const listOwnerLinks = async (
  deps: LinkStatsDeps,
  owner: string
): Promise<Result<LinkStats[], LinkError>> => {
  const normalized = normalizeOwner(owner);
  if (normalized === null) {
    return err(createInvalidInputError('owner', 'Owner is required'));
  }

  const linksResult = await deps.shortLinkRepo.listByOwner(normalized);
  if (linksResult.isErr()) {
    return err(linksResult.error);
  }

  const links = linksResult.value;
  if (links.length === 0) {
    return ok([]);
  }

  const pendingResult = await deps.counterStore.peekMany(links.map((link) => link.code));
  if (pendingResult.isErr()) {
    deps.logger.warn(
      { owner: normalized, error: pendingResult.error },
      'Pending visits unavailable, reporting committed counts only'
    );
    return ok(links.map((link) => toLinkStats(link, 0, true)));
  }

  const pending = pendingResult.value;
  return ok(links.map((link) => toLinkStats(link, pending.get(link.code) ?? 0, false)));
};
