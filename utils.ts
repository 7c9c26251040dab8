/**
 * @module Utilities
 * @description Event emission and storage row conversion.
 */

import { z } from "zod";
import type { BridgeRow, EventHandler, HookedRecord, RawObservation, StrataEvent } from "./types";
import type { BridgeRowInsert, BridgeRowRecord, ObservationInsert, ObservationRow, VersionInsert, VersionRow } from "./schema";
import { PayloadSchema } from "./ingest";

const StringMapSchema = z.record(z.string());

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: StrataEvent) => void {
	return (event: StrataEvent) => handler?.(event);
}

export function observation_to_row(observation: RawObservation): ObservationInsert {
	return {
		entity: observation.entity,
		unique_key: observation.unique_key,
		loaded_at: observation.loaded_at.toISOString(),
		content_hash: observation.content_hash,
		payload: JSON.stringify(observation.payload),
	};
}

/**
 * Parse a stored observation row. JSON columns are validated, so a corrupted row throws.
 */
export function parse_observation_row(row: ObservationRow): RawObservation {
	return {
		entity: row.entity,
		unique_key: row.unique_key,
		loaded_at: new Date(row.loaded_at),
		content_hash: row.content_hash,
		payload: PayloadSchema.parse(JSON.parse(row.payload)),
	};
}

export function version_to_row(record: HookedRecord): VersionInsert {
	return {
		...observation_to_row(record),
		valid_from: record.valid_from.toISOString(),
		valid_to: record.valid_to.toISOString(),
		updated_at: record.updated_at.toISOString(),
		version: record.version,
		is_current: record.is_current,
		hooks: JSON.stringify(record.hooks),
		pit_hook: record.pit_hook,
	};
}

export function parse_version_row(row: VersionRow): HookedRecord {
	return {
		entity: row.entity,
		unique_key: row.unique_key,
		loaded_at: new Date(row.loaded_at),
		content_hash: row.content_hash,
		payload: PayloadSchema.parse(JSON.parse(row.payload)),
		valid_from: new Date(row.valid_from),
		valid_to: new Date(row.valid_to),
		updated_at: new Date(row.updated_at),
		version: row.version,
		is_current: row.is_current,
		hooks: StringMapSchema.parse(JSON.parse(row.hooks)),
		pit_hook: row.pit_hook,
	};
}

export function bridge_to_row(row: BridgeRow): BridgeRowInsert {
	return {
		bridge: row.bridge,
		identity: row.identity,
		hooks: JSON.stringify(row.hooks),
		pit_hooks: JSON.stringify(row.pit_hooks),
		attributes: JSON.stringify(row.attributes),
		valid_from: row.valid_from.toISOString(),
		valid_to: row.valid_to.toISOString(),
		updated_at: row.updated_at.toISOString(),
		is_current: row.is_current,
	};
}

export function parse_bridge_row(row: BridgeRowRecord): BridgeRow {
	return {
		bridge: row.bridge,
		identity: row.identity,
		hooks: StringMapSchema.parse(JSON.parse(row.hooks)),
		pit_hooks: StringMapSchema.parse(JSON.parse(row.pit_hooks)),
		attributes: PayloadSchema.parse(JSON.parse(row.attributes)),
		valid_from: new Date(row.valid_from),
		valid_to: new Date(row.valid_to),
		updated_at: new Date(row.updated_at),
		is_current: row.is_current,
	};
}
