/**
 * Redis client factory using ioredis.
 *
 * No ioredis keyPrefix is set: keys are built by the versioned key builder
 * so that SCAN patterns and Lua KEYS agree.
 */

import { Redis } from 'ioredis';

import type { Logger } from 'pino';

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
  /** Sent with CLIENT SETNAME and added to log lines */
  connectionName?: string;
  logger: Logger;
}

/**
 * Creates an ioredis client that fails fast instead of queueing commands
 * while disconnected.
 */
export const createRedisClient = (options: RedisClientOptions): Redis => {
  const connectionName = options.connectionName ?? 'shortlinks';
  const log = options.logger.child({ component: 'RedisClient', connection: connectionName });

  const client = new Redis(options.url, {
    connectionName,
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

  client.on('error', (error: Error) => {
    log.warn({ err: error }, 'Redis connection error');
  });

  client.on('ready', () => {
    log.info('Redis connection ready');
  });

  return client;
};

export type { Redis } from 'ioredis';
