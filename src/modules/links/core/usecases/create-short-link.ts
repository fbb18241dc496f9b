/**
 * Create Short Link Use Case
 *
 * Inserts a new code → target URL mapping and warms the resolver cache.
 */

import { ok, err, type Result } from 'neverthrow';

import { normalizeOwner, validateCode, validateTargetUrl } from '../validation.js';

import type { LinkError } from '../errors.js';
import type { ShortLinkRepository, TargetUrlCache } from '../ports.js';
import type { ShortLink } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CreateShortLinkDeps {
  shortLinkRepo: ShortLinkRepository;
  cache: TargetUrlCache;
}

export interface CreateShortLinkInput {
  code: string;
  targetUrl: string;
  /** Identity reference of the creator, if any */
  owner?: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a short link with a committed visit count of zero.
 * A taken code fails with ShortLinkAlreadyExistsError.
 */
export const createShortLink = async (
  deps: CreateShortLinkDeps,
  input: CreateShortLinkInput
): Promise<Result<ShortLink, LinkError>> => {
  const codeResult = validateCode(input.code);
  if (codeResult.isErr()) {
    return err(codeResult.error);
  }

  const urlResult = validateTargetUrl(input.targetUrl);
  if (urlResult.isErr()) {
    return err(urlResult.error);
  }

  const createResult = await deps.shortLinkRepo.create({
    code: codeResult.value,
    targetUrl: urlResult.value,
    owner: normalizeOwner(input.owner),
  });
  if (createResult.isErr()) {
    return err(createResult.error);
  }

  const link = createResult.value;
  await deps.cache.set(link.code, link.targetUrl);

  return ok(link);
};
