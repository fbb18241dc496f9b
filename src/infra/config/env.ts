/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Durable link store (Postgres)
  DATABASE_URL: Type.String({ minLength: 1 }),
  DB_POOL_MAX: Type.Integer({ default: 10, minimum: 1, maximum: 100 }),
  DB_STATEMENT_TIMEOUT_MS: Type.Integer({ default: 5000, minimum: 100 }),
  DB_TIMEOUT_MS: Type.Integer({ default: 300, minimum: 1 }),

  // Fast counter store (Redis)
  REDIS_URL: Type.Optional(Type.String()),
  REDIS_PREFIX: Type.String({ default: 'shortlinks', pattern: '^[A-Za-z0-9_.-]+$' }),
  COUNTER_TIMEOUT_MS: Type.Integer({ default: 200, minimum: 1 }),
  RECONCILER_REDIS_TIMEOUT_MS: Type.Integer({ default: 5000, minimum: 100 }),

  // Resolver cache
  RESOLVER_CACHE_MAX_ENTRIES: Type.Integer({ default: 10000, minimum: 0 }),

  // Reconciler
  RECONCILE_INTERVAL_MS: Type.Integer({ default: 300000, minimum: 1000 }),
  LEASE_TTL_MS: Type.Integer({ default: 60000, minimum: 1000 }),
  MAX_CONSECUTIVE_MERGE_FAILURES: Type.Integer({ default: 3, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parses an optional integer variable, keeping the raw string when it is not
 * numeric so that schema validation reports it.
 */
const parseIntVar = (value: string | undefined, defaultValue: number): number | string => {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    DB_POOL_MAX: parseIntVar(env['DB_POOL_MAX'], 10),
    DB_STATEMENT_TIMEOUT_MS: parseIntVar(env['DB_STATEMENT_TIMEOUT_MS'], 5000),
    DB_TIMEOUT_MS: parseIntVar(env['DB_TIMEOUT_MS'], 300),
    ...(env['REDIS_URL'] !== undefined && env['REDIS_URL'] !== '' && { REDIS_URL: env['REDIS_URL'] }),
    REDIS_PREFIX: env['REDIS_PREFIX'] ?? 'shortlinks',
    COUNTER_TIMEOUT_MS: parseIntVar(env['COUNTER_TIMEOUT_MS'], 200),
    RECONCILER_REDIS_TIMEOUT_MS: parseIntVar(env['RECONCILER_REDIS_TIMEOUT_MS'], 5000),
    RESOLVER_CACHE_MAX_ENTRIES: parseIntVar(env['RESOLVER_CACHE_MAX_ENTRIES'], 10000),
    RECONCILE_INTERVAL_MS: parseIntVar(env['RECONCILE_INTERVAL_MS'], 300000),
    LEASE_TTL_MS: parseIntVar(env['LEASE_TTL_MS'], 60000),
    MAX_CONSECUTIVE_MERGE_FAILURES: parseIntVar(env['MAX_CONSECUTIVE_MERGE_FAILURES'], 3),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  // In-memory counters are per process
  if (rawEnv.NODE_ENV === 'production' && rawEnv.REDIS_URL === undefined) {
    throw new Error('Invalid environment configuration: REDIS_URL is required in production');
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
    poolMax: env.DB_POOL_MAX,
    /** Driver-level statement timeout applied to every query */
    statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
  },
  redis: {
    url: env.REDIS_URL,
    prefix: env.REDIS_PREFIX,
    /** ioredis commandTimeout of the resolver's connection */
    commandTimeoutMs: env.COUNTER_TIMEOUT_MS,
    /** ioredis commandTimeout of the reconciler's own connection */
    reconcilerCommandTimeoutMs: env.RECONCILER_REDIS_TIMEOUT_MS,
  },
  resolver: {
    cacheMaxEntries: env.RESOLVER_CACHE_MAX_ENTRIES,
    /** Bound on the durable lookup on a cache miss */
    durableStoreTimeoutMs: env.DB_TIMEOUT_MS,
    /** Bound on the visit increment; a timeout is swallowed */
    counterStoreTimeoutMs: env.COUNTER_TIMEOUT_MS,
  },
  reconciler: {
    intervalMs: env.RECONCILE_INTERVAL_MS,
    leaseTtlMs: env.LEASE_TTL_MS,
    maxConsecutiveMergeFailures: env.MAX_CONSECUTIVE_MERGE_FAILURES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
