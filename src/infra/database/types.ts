import type { ColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Short Links Table
export interface ShortLinks {
  code: string;
  target_url: string;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
  owner: string | null;
  // BIGINT comes back from pg as a string; writes are numbers or SQL expressions
  visit_count: ColumnType<string, number | undefined, number>;
}

export interface Database {
  short_links: ShortLinks;
}
