/**
 * @module Schema
 * @description Database schema definitions for Drizzle ORM.
 */

import { sqliteTable, text, integer, primaryKey, index } from 'drizzle-orm/sqlite-core'

/**
 * Append-only raw observations.
 *
 * `seq` preserves arrival order, which is the order observations sharing a `loaded_at`
 * are returned in. Timestamps are ISO 8601 text, which sorts chronologically.
 *
 * @example
 * ```ts
 * import { drizzle } from 'drizzle-orm/better-sqlite3'
 * import { strata_observations } from 'strata/schema'
 *
 * const db = drizzle(new Database('warehouse.db'))
 * const rows = db.select().from(strata_observations).limit(10).all()
 * ```
 */
export const strata_observations = sqliteTable('strata_observations', {
  seq: integer('seq').primaryKey({ autoIncrement: true }),
  entity: text('entity').notNull(),
  unique_key: text('unique_key').notNull(),
  loaded_at: text('loaded_at').notNull(),
  content_hash: text('content_hash').notNull(),
  payload: text('payload').notNull(),
}, (table) => ({
  loaded_idx: index('idx_obs_entity_loaded').on(table.entity, table.loaded_at),
  key_idx: index('idx_obs_entity_key').on(table.entity, table.unique_key, table.loaded_at),
  hash_idx: index('idx_obs_entity_hash').on(table.entity, table.content_hash),
}))

/**
 * Versioned, hooked records. One row per observation of a key; rewritten whenever a run
 * re-derives it.
 *
 * - `hooks` - JSON object of hook name to hook string
 * - `pit_hook` - Primary hook pinned to `valid_from`, null when the primary hook is missing
 */
export const strata_versions = sqliteTable('strata_versions', {
  entity: text('entity').notNull(),
  unique_key: text('unique_key').notNull(),
  loaded_at: text('loaded_at').notNull(),
  content_hash: text('content_hash').notNull(),
  payload: text('payload').notNull(),
  valid_from: text('valid_from').notNull(),
  valid_to: text('valid_to').notNull(),
  updated_at: text('updated_at').notNull(),
  version: integer('version').notNull(),
  is_current: integer('is_current', { mode: 'boolean' }).notNull(),
  hooks: text('hooks').notNull(),
  pit_hook: text('pit_hook'),
}, (table) => ({
  pk: primaryKey({ columns: [table.entity, table.unique_key, table.loaded_at] }),
  current_idx: index('idx_versions_current').on(table.entity, table.is_current),
  pit_idx: index('idx_versions_pit').on(table.pit_hook),
}))

export const strata_bridges = sqliteTable('strata_bridges', {
  bridge: text('bridge').notNull(),
  identity: text('identity').notNull(),
  hooks: text('hooks').notNull(),
  pit_hooks: text('pit_hooks').notNull(),
  attributes: text('attributes').notNull(),
  valid_from: text('valid_from').notNull(),
  valid_to: text('valid_to').notNull(),
  updated_at: text('updated_at').notNull(),
  is_current: integer('is_current', { mode: 'boolean' }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.bridge, table.identity] }),
  updated_idx: index('idx_bridges_updated').on(table.bridge, table.updated_at),
}))

export type ObservationRow = typeof strata_observations.$inferSelect
export type ObservationInsert = typeof strata_observations.$inferInsert
export type VersionRow = typeof strata_versions.$inferSelect
export type VersionInsert = typeof strata_versions.$inferInsert
export type BridgeRowRecord = typeof strata_bridges.$inferSelect
export type BridgeRowInsert = typeof strata_bridges.$inferInsert

/**
 * SQL to create the strata tables and indexes.
 *
 * Safe to run multiple times (uses IF NOT EXISTS). `create_sqlite_backend()` runs it on
 * the database it is given.
 */
export const STRATA_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS strata_observations (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  entity TEXT NOT NULL,
  unique_key TEXT NOT NULL,
  loaded_at TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  payload TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_obs_entity_loaded ON strata_observations(entity, loaded_at);
CREATE INDEX IF NOT EXISTS idx_obs_entity_key ON strata_observations(entity, unique_key, loaded_at);
CREATE INDEX IF NOT EXISTS idx_obs_entity_hash ON strata_observations(entity, content_hash);

CREATE TABLE IF NOT EXISTS strata_versions (
  entity TEXT NOT NULL,
  unique_key TEXT NOT NULL,
  loaded_at TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  payload TEXT NOT NULL,
  valid_from TEXT NOT NULL,
  valid_to TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  version INTEGER NOT NULL,
  is_current INTEGER NOT NULL,
  hooks TEXT NOT NULL,
  pit_hook TEXT,
  PRIMARY KEY (entity, unique_key, loaded_at)
);

CREATE INDEX IF NOT EXISTS idx_versions_current ON strata_versions(entity, is_current);
CREATE INDEX IF NOT EXISTS idx_versions_pit ON strata_versions(pit_hook);

CREATE TABLE IF NOT EXISTS strata_bridges (
  bridge TEXT NOT NULL,
  identity TEXT NOT NULL,
  hooks TEXT NOT NULL,
  pit_hooks TEXT NOT NULL,
  attributes TEXT NOT NULL,
  valid_from TEXT NOT NULL,
  valid_to TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  is_current INTEGER NOT NULL,
  PRIMARY KEY (bridge, identity)
);

CREATE INDEX IF NOT EXISTS idx_bridges_updated ON strata_bridges(bridge, updated_at);
`
