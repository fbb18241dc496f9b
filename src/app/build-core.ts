/**
 * Composition root.
 *
 * Wires the durable store, the counter store, the lease and the cache into
 * the link service and the reconciler scheduler. Shared by the worker and
 * by any transport layer that serves redirects.
 */

import { initDatabase, type DbClient } from '../infra/database/client.js';
import { createRedisClient, type Redis } from '../infra/redis/client.js';
import { createKeyBuilder } from '../infra/redis/key-builder.js';
import {
  createLinkService,
  makeMemoryTargetCache,
  makeMemoryVisitCounter,
  makeRedisVisitCounter,
  makeShortLinkRepo,
  type LinkService,
  type VisitCounterStore,
} from '../modules/links/index.js';
import {
  createReconcilerScheduler,
  makeMemoryLease,
  makeRedisLease,
  type ReconcilerScheduler,
  type ReconciliationLease,
} from '../modules/reconciliation/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface CoreDeps {
  config: AppConfig;
  logger: Logger;
  /** Overrides the database built from config */
  db?: DbClient;
}

/**
 * The resolver and the reconciler talk to Redis over separate connections:
 * the resolver's carries the short hot-path command timeout, the
 * reconciler's a longer one so that a slow reply to a take is still read.
 */
export interface RedisConnections {
  hotPath: Redis;
  reconciler: Redis;
}

export interface Core {
  db: DbClient;
  /** null when running on in-memory counters */
  redis: RedisConnections | null;
  linkService: LinkService;
  scheduler: ReconcilerScheduler;
  /** Stops the scheduler and closes every connection */
  close(): Promise<void>;
}

interface CounterBackend {
  redis: RedisConnections | null;
  /** Used by the resolver and the stats use cases */
  counterStore: VisitCounterStore;
  /** Same counters, reached over the reconciler's connection */
  reconcilerCounterStore: VisitCounterStore;
  lease: ReconciliationLease;
}

/**
 * Creates both Redis connections without connecting them.
 */
export const createRedisConnections = (
  config: AppConfig,
  url: string,
  logger: Logger
): RedisConnections => ({
  hotPath: createRedisClient({
    url,
    commandTimeoutMs: config.redis.commandTimeoutMs,
    connectionName: 'shortlinks-resolver',
    logger,
  }),
  reconciler: createRedisClient({
    url,
    commandTimeoutMs: config.redis.reconcilerCommandTimeoutMs,
    connectionName: 'shortlinks-reconciler',
    logger,
  }),
});

const buildCounterBackend = async (config: AppConfig, logger: Logger): Promise<CounterBackend> => {
  if (config.redis.url === undefined) {
    if (config.server.isProduction) {
      throw new Error('REDIS_URL is required in production');
    }
    logger.warn(
      'REDIS_URL not configured - using in-memory visit counters (single process only)'
    );
    const counterStore = makeMemoryVisitCounter();
    return {
      redis: null,
      counterStore,
      reconcilerCounterStore: counterStore,
      lease: makeMemoryLease(),
    };
  }

  const redis = createRedisConnections(config, config.redis.url, logger);
  try {
    await Promise.all([redis.hotPath.connect(), redis.reconciler.connect()]);
  } catch (error) {
    redis.hotPath.disconnect();
    redis.reconciler.disconnect();
    throw error;
  }

  const keyBuilder = createKeyBuilder({ globalPrefix: config.redis.prefix });

  return {
    redis,
    counterStore: makeRedisVisitCounter({ redis: redis.hotPath, keyBuilder, logger }),
    reconcilerCounterStore: makeRedisVisitCounter({ redis: redis.reconciler, keyBuilder, logger }),
    lease: makeRedisLease({ redis: redis.reconciler, keyBuilder, logger }),
  };
};

export const buildCore = async (deps: CoreDeps): Promise<Core> => {
  const { config, logger } = deps;

  const { redis, counterStore, reconcilerCounterStore, lease } = await buildCounterBackend(
    config,
    logger
  );
  const db = deps.db ?? initDatabase(config);

  const shortLinkRepo = makeShortLinkRepo({ db, logger });
  const cache = makeMemoryTargetCache({ maxEntries: config.resolver.cacheMaxEntries, logger });

  const linkService = createLinkService({
    shortLinkRepo,
    counterStore,
    cache,
    logger,
    timeouts: {
      durableStoreMs: config.resolver.durableStoreTimeoutMs,
      counterStoreMs: config.resolver.counterStoreTimeoutMs,
    },
  });

  const scheduler = createReconcilerScheduler({
    deps: { counterStore: reconcilerCounterStore, shortLinkRepo, lease },
    logger,
    intervalMs: config.reconciler.intervalMs,
    leaseTtlMs: config.reconciler.leaseTtlMs,
    maxConsecutiveMergeFailures: config.reconciler.maxConsecutiveMergeFailures,
  });

  return {
    db,
    redis,
    linkService,
    scheduler,
    async close(): Promise<void> {
      await scheduler.stop();
      if (redis !== null) {
        await Promise.all([redis.hotPath.quit(), redis.reconciler.quit()]);
      }
      await db.destroy();
    },
  };
};
