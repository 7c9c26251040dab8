/**
 * @module Backends
 * @description In-memory storage backend for testing and development.
 */

import type { Backend, BridgeRow, EventHandler, HookedRecord, RawObservation } from "../types";
import { create_emitter } from "../utils";
import { changed_keys } from "../window";
import { bridge_key, compare_versions, create_bridge_client, create_raw_client, create_version_client, version_key } from "./base";
import type { BridgeStorage, RawStorage, VersionStorage } from "./base";

export type MemoryBackendOptions = {
	on_event?: EventHandler;
};

/**
 * Creates an in-memory storage backend.
 * @category Backends
 * @group Storage Backends
 *
 * Ideal for testing, development, and ephemeral storage scenarios.
 * All data is lost when the process ends.
 *
 * @example
 * ```ts
 * const warehouse = create_warehouse()
 *   .with_backend(create_memory_backend())
 *   .with_entity(customers)
 *   .build()
 *
 * // With event logging
 * const backend = create_memory_backend({
 *   on_event: (e) => console.log(`[${e.type}]`, e)
 * })
 * ```
 */
export function create_memory_backend(options?: MemoryBackendOptions): Backend {
	const observation_store = new Map<string, RawObservation[]>();
	const version_store = new Map<string, HookedRecord>();
	const bridge_store = new Map<string, BridgeRow>();
	const on_event = options?.on_event;
	const emit = create_emitter(on_event);

	const rows_of = (entity: string): RawObservation[] => observation_store.get(entity) ?? [];

	const raw_storage: RawStorage = {
		async append(observations) {
			for (const observation of observations) {
				const rows = observation_store.get(observation.entity);
				if (rows) rows.push({ ...observation });
				else observation_store.set(observation.entity, [{ ...observation }]);
			}
		},

		async changed_keys(entity, window) {
			return [...changed_keys(rows_of(entity), window)];
		},

		async history(entity, unique_key, since) {
			return rows_of(entity)
				.filter(o => o.unique_key === unique_key && (!since || o.loaded_at.getTime() >= since.getTime()))
				.sort((a, b) => a.loaded_at.getTime() - b.loaded_at.getTime());
		},

		async has_hash(entity, content_hash) {
			return rows_of(entity).some(o => o.content_hash === content_hash);
		},

		async has_before(entity, unique_key, instant) {
			return rows_of(entity).some(o => o.unique_key === unique_key && o.loaded_at.getTime() < instant.getTime());
		},
	};

	const version_storage: VersionStorage = {
		async upsert(records) {
			for (const record of records) {
				version_store.set(version_key(record), { ...record, hooks: { ...record.hooks } });
			}
		},

		async *list(entity, opts) {
			const matching = [...version_store.values()]
				.filter(r => r.entity === entity)
				.filter(r => opts.unique_key === undefined || r.unique_key === opts.unique_key)
				.filter(r => !opts.current_only || r.is_current)
				.sort(compare_versions);
			for (const record of matching) yield record;
		},
	};

	const bridge_storage: BridgeStorage = {
		async upsert(rows) {
			for (const row of rows) bridge_store.set(bridge_key(row), row);
		},

		async *list(bridge) {
			const matching = [...bridge_store.values()]
				.filter(r => r.bridge === bridge)
				.sort((a, b) => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0));
			for (const row of matching) yield row;
		},
	};

	return {
		raw: create_raw_client(raw_storage, emit),
		versions: create_version_client(version_storage, emit),
		bridges: create_bridge_client(bridge_storage, emit),
		on_event,
	};
}
