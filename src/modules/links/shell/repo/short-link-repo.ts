/**
 * Short Link Repository Implementation
 *
 * Kysely-based implementation for the short_links table.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  createDurableStoreUnavailableError,
  createShortLinkAlreadyExistsError,
  createShortLinkNotFoundError,
  type ShortLinkRepoError,
} from '../../core/errors.js';

import type { DbClient } from '../../../../infra/database/client.js';
import type { ShortLinkRepository } from '../../core/ports.js';
import type { NewShortLink, ShortLink } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Row shape selected from short_links.
 */
interface QueryRow {
  code: string;
  target_url: string;
  created_at: Date | string;
  owner: string | null;
  visit_count: string | number;
}

/**
 * Options for creating the short link repository.
 */
export interface ShortLinkRepoOptions {
  db: DbClient;
  logger: Logger;
}

/** Postgres SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = '23505';

const LINK_COLUMNS = ['code', 'target_url', 'created_at', 'owner', 'visit_count'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based Short Link Repository.
 */
class KyselyShortLinkRepo implements ShortLinkRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: ShortLinkRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'ShortLinkRepo' });
  }

  async getByCode(code: string): Promise<Result<ShortLink | null, ShortLinkRepoError>> {
    this.log.debug({ code }, 'Finding short link by code');

    try {
      const row = await this.db
        .selectFrom('short_links')
        .select(LINK_COLUMNS)
        .where('code', '=', code)
        .executeTakeFirst();

      if (row === undefined) {
        this.log.debug({ code }, 'Short link not found');
        return ok(null);
      }

      return ok(this.mapRowToShortLink(row));
    } catch (error) {
      this.log.error({ err: error, code }, 'Failed to find short link by code');
      return err(createDurableStoreUnavailableError('Failed to find short link by code', error));
    }
  }

  async create(input: NewShortLink): Promise<Result<ShortLink, ShortLinkRepoError>> {
    const { code, targetUrl, owner } = input;

    this.log.debug({ code, owner }, 'Creating short link');

    try {
      const row = await this.db
        .insertInto('short_links')
        .values({
          code,
          target_url: targetUrl,
          owner,
          visit_count: 0,
        })
        .returning(LINK_COLUMNS)
        .executeTakeFirstOrThrow();

      this.log.info({ code }, 'Short link created');
      return ok(this.mapRowToShortLink(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.log.debug({ code }, 'Short link code already taken');
        return err(createShortLinkAlreadyExistsError(code));
      }

      this.log.error({ err: error, code }, 'Failed to create short link');
      return err(createDurableStoreUnavailableError('Failed to create short link', error));
    }
  }

  async addToVisitCount(code: string, delta: number): Promise<Result<void, ShortLinkRepoError>> {
    this.log.debug({ code, delta }, 'Adding visits to committed count');

    try {
      const result = await this.db
        .updateTable('short_links')
        .set({ visit_count: sql<number>`visit_count + ${delta}` })
        .where('code', '=', code)
        .executeTakeFirst();

      if (result.numUpdatedRows === 0n) {
        return err(createShortLinkNotFoundError(code));
      }

      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, code, delta }, 'Failed to add visits to committed count');
      return err(createDurableStoreUnavailableError('Failed to update visit count', error));
    }
  }

  async listByOwner(owner: string): Promise<Result<ShortLink[], ShortLinkRepoError>> {
    this.log.debug({ owner }, 'Listing short links by owner');

    try {
      const rows = await this.db
        .selectFrom('short_links')
        .select(LINK_COLUMNS)
        .where('owner', '=', owner)
        .orderBy('created_at', 'desc')
        .orderBy('code', 'asc')
        .execute();

      return ok(rows.map((row) => this.mapRowToShortLink(row)));
    } catch (error) {
      this.log.error({ err: error, owner }, 'Failed to list short links by owner');
      return err(createDurableStoreUnavailableError('Failed to list short links by owner', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Maps a database row to ShortLink domain type.
   */
  private mapRowToShortLink(row: QueryRow): ShortLink {
    return {
      code: row.code,
      targetUrl: row.target_url,
      createdAt: row.created_at instanceof Date ? row.created_at : new Date(row.created_at),
      owner: row.owner,
      visitCount:
        typeof row.visit_count === 'number'
          ? row.visit_count
          : Number.parseInt(row.visit_count, 10),
    };
  }
}

/**
 * Detects a Postgres unique constraint violation.
 */
const isUniqueViolation = (error: unknown): boolean => {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a short link repository.
 */
export const makeShortLinkRepo = (options: ShortLinkRepoOptions): ShortLinkRepository => {
  return new KyselyShortLinkRepo(options);
};
