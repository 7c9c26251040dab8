/**
 * @module Backends
 * @description SQLite storage backend using drizzle-orm over better-sqlite3.
 */

import { and, asc, eq, gte, lt } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type Database from "better-sqlite3";
import type { Backend, EventHandler } from "../types";
import { strata_bridges, strata_observations, strata_versions, STRATA_MIGRATION_SQL } from "../schema";
import {
	bridge_to_row,
	create_emitter,
	observation_to_row,
	parse_bridge_row,
	parse_observation_row,
	parse_version_row,
	version_to_row,
} from "../utils";
import { create_bridge_client, create_raw_client, create_version_client } from "./base";
import type { BridgeStorage, RawStorage, VersionStorage } from "./base";

export type SqliteBackendConfig = {
	database: Database.Database;
	on_event?: EventHandler;
};

function create_raw_storage(db: BetterSQLite3Database): RawStorage {
	return {
		async append(observations) {
			db.transaction(tx => {
				for (const observation of observations) {
					tx.insert(strata_observations).values(observation_to_row(observation)).run();
				}
			});
		},

		async changed_keys(entity, window) {
			const rows = db
				.selectDistinct({ unique_key: strata_observations.unique_key })
				.from(strata_observations)
				.where(
					and(
						eq(strata_observations.entity, entity),
						gte(strata_observations.loaded_at, window.start.toISOString()),
						lt(strata_observations.loaded_at, window.end.toISOString())
					)
				)
				.all();
			return rows.map(row => row.unique_key);
		},

		async history(entity, unique_key, since) {
			const conditions: SQL[] = [eq(strata_observations.entity, entity), eq(strata_observations.unique_key, unique_key)];
			if (since) conditions.push(gte(strata_observations.loaded_at, since.toISOString()));

			const rows = db
				.select()
				.from(strata_observations)
				.where(and(...conditions))
				.orderBy(asc(strata_observations.loaded_at), asc(strata_observations.seq))
				.all();
			return rows.map(parse_observation_row);
		},

		async has_hash(entity, content_hash) {
			const rows = db
				.select({ seq: strata_observations.seq })
				.from(strata_observations)
				.where(and(eq(strata_observations.entity, entity), eq(strata_observations.content_hash, content_hash)))
				.limit(1)
				.all();
			return rows.length > 0;
		},

		async has_before(entity, unique_key, instant) {
			const rows = db
				.select({ seq: strata_observations.seq })
				.from(strata_observations)
				.where(
					and(
						eq(strata_observations.entity, entity),
						eq(strata_observations.unique_key, unique_key),
						lt(strata_observations.loaded_at, instant.toISOString())
					)
				)
				.limit(1)
				.all();
			return rows.length > 0;
		},
	};
}

function create_version_storage(db: BetterSQLite3Database): VersionStorage {
	return {
		async upsert(records) {
			db.transaction(tx => {
				for (const record of records) {
					const row = version_to_row(record);
					tx.insert(strata_versions)
						.values(row)
						.onConflictDoUpdate({
							target: [strata_versions.entity, strata_versions.unique_key, strata_versions.loaded_at],
							set: {
								content_hash: row.content_hash,
								payload: row.payload,
								valid_from: row.valid_from,
								valid_to: row.valid_to,
								updated_at: row.updated_at,
								version: row.version,
								is_current: row.is_current,
								hooks: row.hooks,
								pit_hook: row.pit_hook,
							},
						})
						.run();
				}
			});
		},

		async *list(entity, opts) {
			const conditions: SQL[] = [eq(strata_versions.entity, entity)];
			if (opts.unique_key !== undefined) conditions.push(eq(strata_versions.unique_key, opts.unique_key));
			if (opts.current_only) conditions.push(eq(strata_versions.is_current, true));

			const rows = db
				.select()
				.from(strata_versions)
				.where(and(...conditions))
				.orderBy(asc(strata_versions.unique_key), asc(strata_versions.loaded_at))
				.all();
			for (const row of rows) yield parse_version_row(row);
		},
	};
}

function create_bridge_storage(db: BetterSQLite3Database): BridgeStorage {
	return {
		async upsert(rows) {
			db.transaction(tx => {
				for (const bridge_row of rows) {
					const row = bridge_to_row(bridge_row);
					tx.insert(strata_bridges)
						.values(row)
						.onConflictDoUpdate({
							target: [strata_bridges.bridge, strata_bridges.identity],
							set: {
								hooks: row.hooks,
								pit_hooks: row.pit_hooks,
								attributes: row.attributes,
								valid_from: row.valid_from,
								valid_to: row.valid_to,
								updated_at: row.updated_at,
								is_current: row.is_current,
							},
						})
						.run();
				}
			});
		},

		async *list(bridge) {
			const rows = db.select().from(strata_bridges).where(eq(strata_bridges.bridge, bridge)).orderBy(asc(strata_bridges.identity)).all();
			for (const row of rows) yield parse_bridge_row(row);
		},
	};
}

/**
 * Creates a SQLite storage backend.
 * @category Backends
 * @group Storage Backends
 *
 * Runs `STRATA_MIGRATION_SQL` on the given database, then stores raw observations,
 * versions and bridge rows in it. Each upsert batch is one transaction.
 *
 * @example
 * ```ts
 * import Database from 'better-sqlite3'
 *
 * const backend = create_sqlite_backend({ database: new Database('warehouse.db') })
 * const warehouse = create_warehouse()
 *   .with_backend(backend)
 *   .with_entity(customers)
 *   .build()
 * ```
 *
 * @see STRATA_MIGRATION_SQL for the tables it creates
 */
export function create_sqlite_backend(config: SqliteBackendConfig): Backend {
	const { database, on_event } = config;
	database.exec(STRATA_MIGRATION_SQL);
	const db = drizzle(database);
	const emit = create_emitter(on_event);

	return {
		raw: create_raw_client(create_raw_storage(db), emit),
		versions: create_version_client(create_version_storage(db), emit),
		bridges: create_bridge_client(create_bridge_storage(db), emit),
		on_event,
	};
}
