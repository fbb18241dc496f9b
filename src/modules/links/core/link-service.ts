/**
 * Link service: the consumer-facing operations bound to their dependencies.
 */

import { createShortLink, type CreateShortLinkInput } from './usecases/create-short-link.js';
import { getLinkStats } from './usecases/get-link-stats.js';
import { listOwnerLinks } from './usecases/list-owner-links.js';
import { resolveShortLink, type ResolveShortLinkResult } from './usecases/resolve-short-link.js';

import type { LinkError } from './errors.js';
import type { ShortLinkRepository, TargetUrlCache, VisitCounterStore } from './ports.js';
import type { LinkStats, ResolverTimeouts, ShortLink } from './types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface LinkServiceDeps {
  shortLinkRepo: ShortLinkRepository;
  counterStore: VisitCounterStore;
  cache: TargetUrlCache;
  logger: Logger;
  timeouts: ResolverTimeouts;
}

export interface LinkService {
  resolve(code: string): Promise<Result<ResolveShortLinkResult, LinkError>>;
  createShortLink(input: CreateShortLinkInput): Promise<Result<ShortLink, LinkError>>;
  getLinkStats(code: string): Promise<Result<LinkStats, LinkError>>;
  listOwnerLinks(owner: string): Promise<Result<LinkStats[], LinkError>>;
}

export const createLinkService = (deps: LinkServiceDeps): LinkService => {
  const resolveDeps = { ...deps, logger: deps.logger.child({ usecase: 'resolveShortLink' }) };
  const statsDeps = { ...deps, logger: deps.logger.child({ usecase: 'linkStats' }) };

  return {
    resolve: (code) => resolveShortLink(resolveDeps, { code }),
    createShortLink: (input) => createShortLink(deps, input),
    getLinkStats: (code) => getLinkStats(statsDeps, code),
    listOwnerLinks: (owner) => listOwnerLinks(statsDeps, owner),
  };
};
