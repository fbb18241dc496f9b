import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { Database } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type DbClient = Kysely<Database>;

/**
 * Create a Kysely instance for the link database.
 * Every pooled connection gets the configured statement timeout.
 */
export const initDatabase = (config: AppConfig): DbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for link database (DATABASE_URL)');
  }

  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: database.url,
        max: database.poolMax,
        statement_timeout: database.statementTimeoutMs,
      }),
    }),
  });
};

export type { Database, ShortLinks, Timestamp } from './types.js';
