/**
 * Redis Visit Counter Store
 *
 * Pending visit deltas live under `{prefix}:v1:visits:{code}` as plain
 * integers without expiry. A reconciliation take moves the pending delta
 * into `{prefix}:v1:inflight:{code}` inside one Lua script, and the key is
 * only decremented once the merge is acknowledged. A take whose reply never
 * arrives therefore leaves the delta in Redis for the next pass.
 */

import { ok, err, type Result } from 'neverthrow';

import { RedisNamespace, type KeyBuilder } from '../../../../infra/redis/key-builder.js';
import {
  createCounterStoreUnavailableError,
  type CounterStoreUnavailableError,
} from '../../core/errors.js';

import type { VisitCounterStore } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Scripts
// ─────────────────────────────────────────────────────────────────────────────

/**
 * KEYS[1] = pending key, KEYS[2] = in-flight key.
 * Returns { raw pending value, in-flight value after the move }.
 * A non-integer pending value is deleted without being moved.
 */
export const TAKE_VISITS_SCRIPT = [
  "local pending = redis.call('get', KEYS[1])",
  'if pending then',
  "  redis.call('del', KEYS[1])",
  "  if string.match(pending, '^%-?%d+$') then redis.call('incrby', KEYS[2], pending) end",
  'end',
  "return { pending or false, redis.call('get', KEYS[2]) or false }",
].join('\n');

/** KEYS[1] = in-flight key, ARGV[1] = acknowledged delta */
export const ACKNOWLEDGE_VISITS_SCRIPT = [
  "local left = redis.call('decrby', KEYS[1], ARGV[1])",
  "if left == 0 then redis.call('del', KEYS[1]) end",
  'return left',
].join('\n');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subset of the ioredis client used by the counter store.
 */
export interface RedisCounterClient {
  incrby(key: string, increment: number): Promise<number>;
  mget(...keys: string[]): Promise<(string | null)[]>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[string, string[]]>;
}

export interface RedisVisitCounterOptions {
  redis: RedisCounterClient;
  keyBuilder: KeyBuilder;
  logger: Logger;
  /** SCAN page size hint. Default: 500 */
  scanCount?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class RedisVisitCounter implements VisitCounterStore {
  private readonly redis: RedisCounterClient;
  private readonly keys: KeyBuilder;
  private readonly log: Logger;
  private readonly scanCount: number;

  constructor(options: RedisVisitCounterOptions) {
    this.redis = options.redis;
    this.keys = options.keyBuilder;
    this.log = options.logger.child({ component: 'RedisVisitCounter' });
    this.scanCount = options.scanCount ?? 500;
  }

  async increment(code: string, by = 1): Promise<Result<number, CounterStoreUnavailableError>> {
    try {
      const value = await this.redis.incrby(this.pendingKey(code), by);
      return ok(value);
    } catch (error) {
      return err(createCounterStoreUnavailableError('Failed to increment visit counter', error));
    }
  }

  async takeAndReset(code: string): Promise<Result<number, CounterStoreUnavailableError>> {
    let reply: unknown;
    try {
      reply = await this.redis.eval(
        TAKE_VISITS_SCRIPT,
        2,
        this.pendingKey(code),
        this.inflightKey(code)
      );
    } catch (error) {
      return err(createCounterStoreUnavailableError('Failed to take visit counter', error));
    }

    if (!Array.isArray(reply)) {
      return err(createCounterStoreUnavailableError('Unexpected reply when taking visit counter'));
    }

    const pending = toStringOrNull(reply[0]);
    if (pending !== null && Number.isNaN(Number.parseInt(pending, 10))) {
      this.log.warn({ code, raw: pending }, 'Discarded non-numeric visit counter');
    }
    return ok(this.parseCount(code, toStringOrNull(reply[1])));
  }

  async acknowledge(code: string, delta: number): Promise<Result<void, CounterStoreUnavailableError>> {
    try {
      await this.redis.eval(ACKNOWLEDGE_VISITS_SCRIPT, 1, this.inflightKey(code), String(delta));
      return ok(undefined);
    } catch (error) {
      return err(createCounterStoreUnavailableError('Failed to acknowledge visit counter', error));
    }
  }

  async peek(code: string): Promise<Result<number, CounterStoreUnavailableError>> {
    const result = await this.peekMany([code]);
    return result.map((deltas) => deltas.get(code) ?? 0);
  }

  async peekMany(
    codes: readonly string[]
  ): Promise<Result<Map<string, number>, CounterStoreUnavailableError>> {
    const deltas = new Map<string, number>();
    if (codes.length === 0) {
      return ok(deltas);
    }

    let values: (string | null)[];
    try {
      values = await this.redis.mget(
        ...codes.flatMap((code) => [this.pendingKey(code), this.inflightKey(code)])
      );
    } catch (error) {
      return err(createCounterStoreUnavailableError('Failed to read visit counters', error));
    }

    for (const [index, code] of codes.entries()) {
      const pending = this.parseCount(code, values[index * 2] ?? null);
      const inflight = this.parseCount(code, values[index * 2 + 1] ?? null);
      deltas.set(code, pending + inflight);
    }
    return ok(deltas);
  }

  async listPendingCodes(): Promise<Result<string[], CounterStoreUnavailableError>> {
    const codes = new Set<string>();

    try {
      // In-flight first: codes an interrupted pass claimed are merged before new ones
      await this.scanCodes(RedisNamespace.INFLIGHT, codes);
      await this.scanCodes(RedisNamespace.VISITS, codes);
    } catch (error) {
      return err(createCounterStoreUnavailableError('Failed to list pending visit counters', error));
    }

    return ok([...codes]);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────

  private pendingKey(code: string): string {
    return this.keys.build(RedisNamespace.VISITS, code);
  }

  private inflightKey(code: string): string {
    return this.keys.build(RedisNamespace.INFLIGHT, code);
  }

  private async scanCodes(namespace: RedisNamespace, codes: Set<string>): Promise<void> {
    const pattern = this.keys.pattern(namespace);
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount);
      for (const key of keys) {
        const code = this.keys.parse(namespace, key);
        if (code !== null) {
          codes.add(code);
        }
      }
      cursor = next;
    } while (cursor !== '0');
  }

  private parseCount(code: string, raw: string | null): number {
    if (raw === null) {
      return 0;
    }
    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      this.log.warn({ code, raw }, 'Ignoring non-numeric visit counter');
      return 0;
    }
    return value;
  }
}

const toStringOrNull = (value: unknown): string | null => (typeof value === 'string' ? value : null);

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Redis-backed visit counter store.
 */
export const makeRedisVisitCounter = (options: RedisVisitCounterOptions): VisitCounterStore => {
  return new RedisVisitCounter(options);
};
