import { sqliteTable, text, real, index } from 'drizzle-orm/sqlite-core';

export const TABLE_NAME = 'chronicle';

/**
 * Drizzle schema for the per-month `chronicle` table.
 *
 * `id` is the envelope's object_id, unique across the whole store, which
 * gives idempotent inserts via ON CONFLICT DO NOTHING.
 */
export const chronicle = sqliteTable(TABLE_NAME, {
  id: text('id').primaryKey(),
  timestamp: real('timestamp').notNull(),
  source: text('source'),
  content: text('content'),
  blob_path: text('blob_path'),
}, (table) => [
  index('idx_chronicle_timestamp').on(table.timestamp),
  index('idx_chronicle_source').on(table.source),
]);

export type ChronicleRow = typeof chronicle.$inferSelect;
export type NewChronicleRow = typeof chronicle.$inferInsert;

/**
 * Applied on every open. Partitions are created lazily per month, so there
 * is no migration step; the statements are idempotent.
 */
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id         TEXT PRIMARY KEY,
    timestamp  REAL NOT NULL,
    source     TEXT,
    content    TEXT,
    blob_path  TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_chronicle_timestamp ON ${TABLE_NAME} (timestamp);
  CREATE INDEX IF NOT EXISTS idx_chronicle_source ON ${TABLE_NAME} (source);
`;
