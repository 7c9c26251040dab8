/**
 * @module strata
 * @description Incremental slowly-changing-dimension engine: fingerprinted raw history,
 * hooked versions with validity intervals, and bridges joined through shared hooks.
 */

export { create_warehouse, count_errors } from "./warehouse";
export type {
	Warehouse,
	WarehouseBuilder,
	WarehouseOptions,
	IngestOpts,
	IngestReport,
	RunOpts,
	RunReport,
	EntityRunReport,
	BridgeRunReport,
} from "./warehouse";

export { create_memory_backend, type MemoryBackendOptions } from "./backend/memory";
export { create_sqlite_backend, type SqliteBackendConfig } from "./backend/sqlite";
export type { RawStorage, VersionStorage, BridgeStorage } from "./backend/base";
export { create_raw_client, create_version_client, create_bridge_client } from "./backend/base";
export { create_emitter } from "./utils";

export { strata_observations, strata_versions, strata_bridges, STRATA_MIGRATION_SQL } from "./schema";
export type { ObservationRow, VersionRow, BridgeRowRecord } from "./schema";

export { parse_warehouse_config, load_warehouse_config, WarehouseConfigSchema, RunDefaultsSchema } from "./config";
export type { WarehouseConfig, RunDefaults, RunDefaultsInput } from "./config";

export {
	define_entity,
	derive_unique_key,
	apply_hooks,
	introspect_columns,
	primary_hook_name,
	pit_hook_name,
	entity_suffix,
	EntityDefinitionSchema,
	HookDefinitionSchema,
	CompositeHookDefinitionSchema,
} from "./entity";
export type { EntityDefinition, EntityDefinitionInput, HookDefinition, CompositeHookDefinition, HookApplication } from "./entity";

export {
	compose_primary,
	compose_from_keyset,
	compose_composite,
	compose_pit,
	parse_keyset,
	parse_primary,
	parse_composite,
	parse_pit,
	parse_hook,
	COMPONENT_SEPARATOR,
	VALUE_SEPARATOR,
	PIT_MARKER,
} from "./hooks";
export type { PrimaryHook, PitHook, ParsedHook } from "./hooks";

export { compute_hash, fingerprint, fingerprint_payload } from "./fingerprint";
export { EPOCH, END_OF_TIME, MIN_TIMESTAMP, is_representable, format_timestamp, parse_timestamp, load_id_to_timestamp, create_window, in_window } from "./time";
export { changed_keys, slice_history } from "./window";
export type { WindowSlices } from "./window";
export { build_versions, sort_history, compact_history, boundary_hashes, select_emitted, rebuild } from "./versions";
export type { BuildOpts, BuildResult, RebuildOpts, RebuildResult } from "./versions";
export { prepare_observations, PayloadSchema } from "./ingest";
export type { PrepareOpts, Prepared } from "./ingest";

export {
	define_bridge,
	to_segment,
	join,
	join_all,
	build_bridge,
	segment_identity,
	infer_bridge_joins,
	BridgeDefinitionSchema,
	BridgeJoinSchema,
	BridgeEventSchema,
} from "./bridge";
export type { BridgeDefinition, BridgeDefinitionInput, BridgeJoin, BridgeEvent, JoinKind, JoinOpts, JoinResult, JoinSide, BridgeBuild } from "./bridge";
export { as_of, find_by_pit, unpivot_events } from "./pit";
export type { EventRow } from "./pit";

export { Semaphore, parallel_map, partition_results } from "./concurrency";

export { ok, err } from "./types";
export type {
	StrataError,
	StrataErrorKind,
	StrataEvent,
	EventHandler,
	Result,
	Value,
	Payload,
	Window,
	RawObservation,
	VersionedRecord,
	HookedRecord,
	Segment,
	BridgeRow,
	Backend,
	RawClient,
	VersionClient,
	BridgeClient,
	HistoryOpts,
	VersionListOpts,
	BoundaryMode,
	CompactionMode,
	DedupeMode,
} from "./types";

export {
	match,
	unwrap,
	unwrap_or,
	unwrap_err,
	try_catch,
	try_catch_async,
	to_nullable,
	first,
	last,
	format_error,
	to_error,
} from "./result";
