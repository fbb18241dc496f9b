/**
 * In-process LRU cache for code → target URL.
 *
 * Entries never expire: target URLs are immutable once created, so the only
 * way out of the cache is eviction when it is full.
 */

import { noopTargetUrlCache, type TargetUrlCache } from '../../core/ports.js';

import type { Logger } from 'pino';

export interface MemoryTargetCacheOptions {
  /** LRU capacity; 0 disables caching */
  maxEntries: number;
  logger: Logger;
}

class MemoryTargetCache implements TargetUrlCache {
  // Map keeps insertion order: the first key is the least recently used
  private readonly entries = new Map<string, string>();
  private readonly maxEntries: number;
  private readonly log: Logger;
  private reportedFull = false;

  constructor(options: MemoryTargetCacheOptions) {
    this.maxEntries = options.maxEntries;
    this.log = options.logger.child({ component: 'TargetUrlCache' });
  }

  get(code: string): Promise<string | null> {
    const targetUrl = this.entries.get(code);
    if (targetUrl === undefined) {
      return Promise.resolve(null);
    }

    this.entries.delete(code);
    this.entries.set(code, targetUrl);
    return Promise.resolve(targetUrl);
  }

  set(code: string, targetUrl: string): Promise<void> {
    if (this.entries.has(code)) {
      this.entries.delete(code);
    } else if (this.entries.size >= this.maxEntries) {
      this.evictLeastRecentlyUsed();
    }

    this.entries.set(code, targetUrl);
    return Promise.resolve();
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done === true) {
      return;
    }

    this.entries.delete(oldest.value);
    if (!this.reportedFull) {
      this.reportedFull = true;
      this.log.debug({ maxEntries: this.maxEntries }, 'Target URL cache full, evicting LRU entries');
    }
  }
}

/**
 * Creates the resolver's read-through cache.
 */
export const makeMemoryTargetCache = (options: MemoryTargetCacheOptions): TargetUrlCache => {
  if (!Number.isInteger(options.maxEntries) || options.maxEntries < 0) {
    throw new Error(`maxEntries must be a non-negative integer, got: ${String(options.maxEntries)}`);
  }
  if (options.maxEntries === 0) {
    return noopTargetUrlCache;
  }

  return new MemoryTargetCache(options);
};
