/**
 * Redis Reconciliation Lease
 *
 * A single key `{prefix}:v1:lease:{name}` holds the owner id with a PX
 * expiry. Renewal and release compare the owner inside a Lua script so a
 * process never extends or deletes a lease someone else took over.
 */

import { ok, err, type Result } from 'neverthrow';

import { RedisNamespace, type KeyBuilder } from '../../../../infra/redis/key-builder.js';
import { createLeaseUnavailableError, type LeaseUnavailableError } from '../../core/errors.js';
import { RECONCILER_LEASE_NAME } from '../../core/types.js';

import type { LeaseAcquireOutcome, LeaseRenewOutcome, ReconciliationLease } from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Scripts
// ─────────────────────────────────────────────────────────────────────────────

/** KEYS[1] = lease key, ARGV[1] = owner, ARGV[2] = ttl ms */
export const RENEW_LEASE_SCRIPT =
  "if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('pexpire', KEYS[1], ARGV[2]) else return 0 end";

/** KEYS[1] = lease key, ARGV[1] = owner */
export const RELEASE_LEASE_SCRIPT =
  "if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('del', KEYS[1]) else return 0 end";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subset of the ioredis client used by the lease.
 */
export interface RedisLeaseClient {
  set(key: string, value: string, pxToken: 'PX', milliseconds: number, nxToken: 'NX'): Promise<'OK' | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export interface RedisLeaseOptions {
  redis: RedisLeaseClient;
  keyBuilder: KeyBuilder;
  logger: Logger;
  /** Lease name. Default: 'reconciler' */
  name?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class RedisReconciliationLease implements ReconciliationLease {
  private readonly redis: RedisLeaseClient;
  private readonly key: string;
  private readonly log: Logger;
  /** TTL requested by each owner at acquisition, reused on renewal */
  private readonly ttls = new Map<string, number>();

  constructor(options: RedisLeaseOptions) {
    this.redis = options.redis;
    this.key = options.keyBuilder.build(RedisNamespace.LEASE, options.name ?? RECONCILER_LEASE_NAME);
    this.log = options.logger.child({ component: 'RedisReconciliationLease' });
  }

  async acquire(
    ownerId: string,
    ttlMs: number
  ): Promise<Result<LeaseAcquireOutcome, LeaseUnavailableError>> {
    try {
      const reply = await this.redis.set(this.key, ownerId, 'PX', ttlMs, 'NX');
      if (reply !== 'OK') {
        return ok('denied');
      }
      this.ttls.set(ownerId, ttlMs);
      this.log.debug({ ownerId, ttlMs }, 'Lease acquired');
      return ok('granted');
    } catch (error) {
      return err(createLeaseUnavailableError('Failed to acquire reconciliation lease', error));
    }
  }

  async renew(ownerId: string): Promise<Result<LeaseRenewOutcome, LeaseUnavailableError>> {
    const ttlMs = this.ttls.get(ownerId);
    if (ttlMs === undefined) {
      return ok('expired');
    }

    try {
      const reply = await this.redis.eval(RENEW_LEASE_SCRIPT, 1, this.key, ownerId, String(ttlMs));
      if (reply === 1) {
        return ok('ok');
      }
      this.ttls.delete(ownerId);
      return ok('expired');
    } catch (error) {
      return err(createLeaseUnavailableError('Failed to renew reconciliation lease', error));
    }
  }

  async release(ownerId: string): Promise<Result<void, LeaseUnavailableError>> {
    this.ttls.delete(ownerId);

    try {
      await this.redis.eval(RELEASE_LEASE_SCRIPT, 1, this.key, ownerId);
      return ok(undefined);
    } catch (error) {
      return err(createLeaseUnavailableError('Failed to release reconciliation lease', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Redis-backed reconciliation lease.
 */
export const makeRedisLease = (options: RedisLeaseOptions): ReconciliationLease => {
  return new RedisReconciliationLease(options);
};
