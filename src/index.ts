/**
 * Public entry point: short link resolution with visit counting and
 * periodic reconciliation into the durable store.
 */

export * from './modules/links/index.js';
export * from './modules/reconciliation/index.js';

export { buildCore, type Core, type CoreDeps } from './app/build-core.js';
export { parseEnv, createConfig, type Env, type AppConfig } from './infra/config/index.js';
export { createLogger, type Logger } from './infra/logger/index.js';
export { initDatabase, type DbClient, type Database } from './infra/database/client.js';
export { createRedisClient, type Redis } from './infra/redis/client.js';
export {
  createKeyBuilder,
  KEYSPACE_VERSION,
  RedisNamespace,
  type KeyBuilder,
} from './infra/redis/key-builder.js';
