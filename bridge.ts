/**
 * @module Bridge
 * @description Joins versioned entity streams through shared hooks, intersecting validity.
 */

import { z } from "zod";
import type { BridgeRow, HookedRecord, Result, Segment, StrataError, Value } from "./types";
import { ok, err } from "./types";
import type { EntityDefinition } from "./entity";
import { entity_suffix, pit_hook_name, primary_hook_name } from "./entity";
import { parse_hook } from "./hooks";
import { format_timestamp, max_date, min_date } from "./time";

export const BridgeEventSchema = z.object({
	name: z.string().min(1),
	/** Suffixed attribute column holding the event instant. */
	column: z.string().min(1),
});

export const BridgeJoinSchema = z.object({
	entity: z.string().min(1),
	/** Hook name shared by the accumulated bridge and the joined entity. */
	on: z.string().min(1),
});

export const BridgeDefinitionSchema = z.object({
	name: z.string().regex(/^[A-Za-z0-9_]+$/, "must be alphanumeric or underscore"),
	/** The peripheral entity the bridge is built around. */
	frame: z.string().min(1),
	joins: z.array(BridgeJoinSchema).default([]),
	kind: z.enum(["inner", "left"]).default("inner"),
	events: z.array(BridgeEventSchema).default([]),
});

export type BridgeEvent = z.infer<typeof BridgeEventSchema>;
export type BridgeJoin = z.infer<typeof BridgeJoinSchema>;
export type BridgeDefinition = Readonly<z.infer<typeof BridgeDefinitionSchema>>;
export type BridgeDefinitionInput = z.input<typeof BridgeDefinitionSchema>;
export type JoinKind = BridgeDefinition["kind"];

export function define_bridge(input: BridgeDefinitionInput): Result<BridgeDefinition, StrataError> {
	const parsed = BridgeDefinitionSchema.safeParse(input);
	if (!parsed.success) {
		return err({ kind: "validation_error", cause: parsed.error, message: parsed.error.issues.map(i => i.message).join("; ") });
	}
	return ok(Object.freeze(parsed.data));
}

/**
 * Turns a hooked record into a joinable segment. Payload columns are suffixed with
 * `__<entity>` so that attributes from different sides never collide, and the
 * point-in-time hook is keyed by `_pit<primary hook>`.
 */
export function to_segment(entity: EntityDefinition, record: HookedRecord): Segment {
	const suffix = entity_suffix(entity);
	const attributes: Record<string, Value> = {};
	for (const [column, value] of Object.entries(record.payload)) {
		attributes[`${column}${suffix}`] = value;
	}
	const pit_hooks: Record<string, string> = {};
	if (record.pit_hook !== null) pit_hooks[pit_hook_name(primary_hook_name(entity))] = record.pit_hook;

	return {
		hooks: { ...record.hooks },
		pit_hooks,
		attributes,
		valid_from: record.valid_from,
		valid_to: record.valid_to,
		updated_at: record.updated_at,
		is_current: record.is_current,
	};
}

export type JoinOpts = {
	kind?: JoinKind;
};

export type JoinResult = {
	rows: Segment[];
	/** `malformed_hook` errors; each excluded the offending row from every pair. */
	excluded: StrataError[];
	/** Rows that do not carry the join hook at all (quarantined upstream). */
	unresolved: number;
};

function merge(left: Segment, right: Segment, valid_from: Date, valid_to: Date): Segment {
	return {
		hooks: { ...left.hooks, ...right.hooks },
		pit_hooks: { ...left.pit_hooks, ...right.pit_hooks },
		attributes: { ...left.attributes, ...right.attributes },
		valid_from,
		valid_to,
		updated_at: max_date(left.updated_at, right.updated_at),
		is_current: left.is_current && right.is_current,
	};
}

/**
 * Joins two segment streams on a shared hook.
 * @category Core
 * @group Bridges
 *
 * Every pair with equal hook strings whose intervals overlap yields one segment valid for
 * the intersection: `valid_from` is the later start, `valid_to` the earlier end, and
 * `is_current` holds only if both sides are current. Pairs that do not overlap yield
 * nothing. A hook value that fails to parse excludes its row and is reported with the
 * offending string; the rest of the join carries on.
 *
 * With `kind: 'left'`, left rows with no overlapping partner are kept unchanged. Such a row has
 * its own identity (no partner PIT hook), so once a partner arrives a stored bridge keeps the
 * unmatched row, still `is_current`, beside the new matched one for the same frame version.
 *
 * @example
 * ```ts
 * const { rows } = join(orders, customers, '_hook__customer__id')
 * ```
 */
export function join(left: Iterable<Segment>, right: Iterable<Segment>, on: string, opts: JoinOpts = {}): JoinResult {
	const kind = opts.kind ?? "inner";
	const excluded: StrataError[] = [];
	let unresolved = 0;

	const accept = (segment: Segment): string | null => {
		const value = segment.hooks[on];
		if (value === undefined) {
			unresolved++;
			return null;
		}
		const parsed = parse_hook(value);
		if (!parsed.ok) {
			excluded.push(parsed.error);
			return null;
		}
		return value;
	};

	const index = new Map<string, Segment[]>();
	for (const segment of right) {
		const value = accept(segment);
		if (value === null) continue;
		const bucket = index.get(value);
		if (bucket) bucket.push(segment);
		else index.set(value, [segment]);
	}

	const rows: Segment[] = [];
	for (const segment of left) {
		const value = accept(segment);
		if (value === null) {
			if (kind === "left" && segment.hooks[on] === undefined) rows.push(segment);
			continue;
		}

		let matched = false;
		for (const partner of index.get(value) ?? []) {
			const valid_from = max_date(segment.valid_from, partner.valid_from);
			const valid_to = min_date(segment.valid_to, partner.valid_to);
			if (valid_from.getTime() >= valid_to.getTime()) continue;
			rows.push(merge(segment, partner, valid_from, valid_to));
			matched = true;
		}
		if (!matched && kind === "left") rows.push(segment);
	}

	return { rows, excluded, unresolved };
}

export type JoinSide = {
	rows: Iterable<Segment>;
	on: string;
};

/**
 * Chains pairwise joins onto a frame. For inner joins the resulting set is the same
 * whichever order the sides are given in.
 */
export function join_all(frame: Iterable<Segment>, sides: readonly JoinSide[], opts: JoinOpts = {}): JoinResult {
	let rows = [...frame];
	const excluded: StrataError[] = [];
	let unresolved = 0;

	for (const side of sides) {
		const result = join(rows, side.rows, side.on, opts);
		rows = result.rows;
		excluded.push(...result.excluded);
		unresolved += result.unresolved;
	}

	return { rows, excluded, unresolved };
}

/**
 * Stable identity of a bridge row: its point-in-time hooks, which pin every constituent
 * version. Falls back to hooks and `valid_from` for rows without any.
 */
export function segment_identity(segment: Segment): string {
	const pits = Object.values(segment.pit_hooks).sort();
	if (pits.length > 0) return pits.join(" ");
	const hooks = Object.values(segment.hooks).sort();
	return [...hooks, format_timestamp(segment.valid_from)].join(" ");
}

const by_identity = (a: BridgeRow, b: BridgeRow): number => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0);

export type BridgeBuild = {
	rows: BridgeRow[];
	excluded: StrataError[];
	unresolved: number;
};

/**
 * Builds a bridge from hooked frames keyed by entity name.
 * @category Core
 * @group Bridges
 */
export function build_bridge(
	definition: BridgeDefinition,
	entities: ReadonlyMap<string, EntityDefinition>,
	frames: ReadonlyMap<string, readonly HookedRecord[]>
): Result<BridgeBuild, StrataError> {
	const to_segments = (name: string): Result<Segment[], StrataError> => {
		const entity = entities.get(name);
		if (!entity) return err({ kind: "unknown_entity", entity: name });
		return ok((frames.get(name) ?? []).map(record => to_segment(entity, record)));
	};

	const frame = to_segments(definition.frame);
	if (!frame.ok) return frame;

	const sides: JoinSide[] = [];
	for (const { entity, on } of definition.joins) {
		const rows = to_segments(entity);
		if (!rows.ok) return rows;
		sides.push({ rows: rows.value, on });
	}

	const joined = join_all(frame.value, sides, { kind: definition.kind });
	const rows = joined.rows
		.map((segment): BridgeRow => ({ ...segment, bridge: definition.name, identity: segment_identity(segment) }))
		.sort(by_identity);

	return ok({ rows, excluded: joined.excluded, unresolved: joined.unresolved });
}

/**
 * Finds a frame's foreign hooks: its hooks (other than its own primary) that are the
 * primary hook of another entity, and returns them as joins onto those entities.
 */
export function infer_bridge_joins(frame: EntityDefinition, entities: readonly EntityDefinition[]): BridgeJoin[] {
	const own_primary = primary_hook_name(frame);
	const owners = new Map<string, string>();
	for (const entity of entities) {
		if (entity.name === frame.name) continue;
		owners.set(primary_hook_name(entity), entity.name);
	}

	const joins: BridgeJoin[] = [];
	for (const hook of [...frame.hooks, ...frame.composite_hooks]) {
		if (hook.name === own_primary) continue;
		const owner = owners.get(hook.name);
		if (owner !== undefined) joins.push({ entity: owner, on: hook.name });
	}
	return joins;
}
