/**
 * Unit tests for create-short-link use case
 */

import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { makeMemoryTargetCache } from '@/modules/links/index.js';
import { createShortLink } from '@/modules/links/core/usecases/create-short-link.js';

import { createTestShortLink } from '../../fixtures/builders.js';
import { makeFakeShortLinkRepo } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

const makeDeps = () => ({
  shortLinkRepo: makeFakeShortLinkRepo(),
  cache: makeMemoryTargetCache({ maxEntries: 10, logger: testLogger }),
});

describe('createShortLink use case', () => {
  it('creates a link with zero committed visits', async () => {
    const deps = makeDeps();

    const result = await createShortLink(deps, {
      code: 'abc123',
      targetUrl: 'https://example.com/x',
      owner: 'user-1',
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.code).toBe('abc123');
      expect(result.value.targetUrl).toBe('https://example.com/x');
      expect(result.value.owner).toBe('user-1');
      expect(result.value.visitCount).toBe(0);
    }
  });

  it('stores a missing owner as null', async () => {
    const deps = makeDeps();

    const result = await createShortLink(deps, {
      code: 'abc123',
      targetUrl: 'https://example.com/x',
    });

    expect(result._unsafeUnwrap().owner).toBeNull();
  });

  it('warms the resolver cache', async () => {
    const deps = makeDeps();

    await createShortLink(deps, { code: 'abc123', targetUrl: 'https://example.com/x' });

    expect(await deps.cache.get('abc123')).toBe('https://example.com/x');
  });

  it('returns ShortLinkAlreadyExistsError for a taken code', async () => {
    const deps = {
      ...makeDeps(),
      shortLinkRepo: makeFakeShortLinkRepo({ shortLinks: [createTestShortLink()] }),
    };

    const result = await createShortLink(deps, {
      code: 'abc123',
      targetUrl: 'https://example.com/other',
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('ShortLinkAlreadyExistsError');
    }
  });

  it('keeps the original target when a taken code is reused', async () => {
    const repo = makeFakeShortLinkRepo({ shortLinks: [createTestShortLink()] });
    const deps = { ...makeDeps(), shortLinkRepo: repo };

    await createShortLink(deps, { code: 'abc123', targetUrl: 'https://example.com/other' });

    expect(repo.store.get('abc123')?.targetUrl).toBe('https://example.com/x');
    expect(await deps.cache.get('abc123')).toBeNull();
  });

  it('rejects a non-http target URL', async () => {
    const deps = makeDeps();

    const result = await createShortLink(deps, {
      code: 'abc123',
      targetUrl: 'ftp://example.com/file',
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('InvalidInputError');
    }
    expect(deps.shortLinkRepo.calls.create).toBe(0);
  });

  it('rejects a malformed code', async () => {
    const deps = makeDeps();

    const result = await createShortLink(deps, {
      code: 'no/slashes',
      targetUrl: 'https://example.com/x',
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('InvalidInputError');
    }
  });

  it('propagates durable store failures', async () => {
    const deps = { ...makeDeps(), shortLinkRepo: makeFakeShortLinkRepo({ simulateDbError: true }) };

    const result = await createShortLink(deps, {
      code: 'abc123',
      targetUrl: 'https://example.com/x',
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('DurableStoreUnavailableError');
    }
  });
});
