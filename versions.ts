/**
 * @module Versions
 * @description Reconstruction of per-key versions and validity intervals from raw history.
 */

import type {
	BoundaryMode,
	CompactionMode,
	RawClient,
	RawObservation,
	Result,
	StrataError,
	VersionedRecord,
	Window,
} from "./types";
import { ok } from "./types";
import { EPOCH, END_OF_TIME, in_window } from "./time";
import { slice_history } from "./window";
import { first } from "./result";

export type BuildOpts = {
	/**
	 * - `lagged` (default): `valid_from` is the previous observation's `loaded_at`.
	 * - `contiguous`: `valid_from` is the observation's own `loaded_at`, so adjacent
	 *   versions partition time without overlap.
	 */
	boundaries?: BoundaryMode;
	/** `consecutive` collapses runs of identical content into their first observation. */
	compaction?: CompactionMode;
};

export type BuildResult = {
	/** All versions of the key, ascending by `loaded_at`. */
	versions: VersionedRecord[];
	/** `ambiguous_order` issues for observations sharing a `loaded_at`. */
	issues: StrataError[];
};

/**
 * Sorts observations by `loaded_at` ascending. The sort is stable: observations sharing an
 * instant keep the order the store returned them in. No tie-break is invented for them.
 */
export function sort_history(history: readonly RawObservation[]): RawObservation[] {
	return [...history].sort((a, b) => a.loaded_at.getTime() - b.loaded_at.getTime());
}

/**
 * Drops observations whose content hash equals their predecessor's.
 */
export function compact_history(sorted: readonly RawObservation[]): RawObservation[] {
	return sorted.filter((observation, i) => i === 0 || sorted[i - 1]?.content_hash !== observation.content_hash);
}

function find_ties(sorted: readonly RawObservation[]): StrataError[] {
	const issues: StrataError[] = [];
	for (let i = 1; i < sorted.length; i++) {
		const prev = sorted[i - 1];
		const curr = sorted[i];
		if (!prev || !curr || prev.loaded_at.getTime() !== curr.loaded_at.getTime()) continue;
		const already = issues.some(issue => issue.kind === "ambiguous_order" && issue.loaded_at.getTime() === curr.loaded_at.getTime());
		if (!already) {
			issues.push({ kind: "ambiguous_order", entity: curr.entity, unique_key: curr.unique_key, loaded_at: curr.loaded_at });
		}
	}
	return issues;
}

function prepare(history: readonly RawObservation[], compaction: CompactionMode): { ordered: RawObservation[]; issues: StrataError[] } {
	const sorted = sort_history(history);
	const issues = find_ties(sorted);
	return { ordered: compaction === "consecutive" ? compact_history(sorted) : sorted, issues };
}

function derive(ordered: readonly RawObservation[], boundaries: BoundaryMode): VersionedRecord[] {
	const n = ordered.length;
	return ordered.map((observation, i) => {
		const prev = ordered[i - 1];
		const next = ordered[i + 1];
		const valid_from = i === 0 ? EPOCH : boundaries === "lagged" ? (prev?.loaded_at ?? EPOCH) : observation.loaded_at;
		return {
			...observation,
			valid_from,
			valid_to: next?.loaded_at ?? END_OF_TIME,
			updated_at: next?.loaded_at ?? observation.loaded_at,
			version: n - i,
			is_current: i === n - 1,
		};
	});
}

/**
 * Derives every version of one key from its full observation history.
 * @category Core
 * @group Versions
 *
 * For position `i` of `n` observations, ascending by `loaded_at`:
 * - `valid_to` is the next observation's `loaded_at`, or `END_OF_TIME` for the last
 * - `valid_from` is `EPOCH` for the first; after that it follows `boundaries`
 * - `updated_at` is the next observation's `loaded_at`, or the observation's own for the last
 * - `version` is `n - i` (1 is current), `is_current` marks the last
 *
 * @example
 * ```ts
 * const { versions } = build_versions(history)
 * const current = versions.find(v => v.is_current)
 * ```
 */
export function build_versions(history: readonly RawObservation[], opts: BuildOpts = {}): BuildResult {
	const { ordered, issues } = prepare(history, opts.compaction ?? "none");
	return { versions: derive(ordered, opts.boundaries ?? "lagged"), issues };
}

/**
 * Content hashes of the observations that can be affected by a window: the last one
 * before it, every one inside it, and the first one after it.
 */
export function boundary_hashes(sorted: readonly RawObservation[], window: Window): Set<string> {
	const { preceding, inside, following } = slice_history(sorted, window);
	const hashes = new Set(inside.map(o => o.content_hash));
	if (preceding) hashes.add(preceding.content_hash);
	if (following) hashes.add(following.content_hash);
	return hashes;
}

/**
 * Keeps the versions a window run writes: those whose hash is boundary-adjacent or
 * window-internal, and whose `updated_at` falls in `[start, end)`. A version is written
 * again only when a later observation closes it.
 */
export function select_emitted(versions: readonly VersionedRecord[], window: Window): VersionedRecord[] {
	const hashes = boundary_hashes(versions, window);
	return versions.filter(v => hashes.has(v.content_hash) && in_window(v.updated_at, window));
}

export type RebuildOpts = BuildOpts & {
	/** Retained history horizon; observations loaded before it are not read. */
	history_since?: Date;
};

export type RebuildResult = {
	unique_key: string;
	versions: VersionedRecord[];
	emitted: VersionedRecord[];
	/**
	 * Rows to store for the key. With the complete history this is every version, so ranks
	 * on closed rows stay exact; with a truncated history it is `emitted` only.
	 */
	written: VersionedRecord[];
	issues: StrataError[];
};

/**
 * Rebuilds one key touched by a window.
 * @category Core
 * @group Versions
 *
 * Reads the key's full retained history, not only the window: closing the version before
 * the window needs the preceding observation, and bounding a window-internal version needs
 * the following one. Cost is the number of touched keys times their history length.
 *
 * A new observation shifts the `version` rank of every older row, so when nothing was cut
 * off by `history_since` all versions are returned in `written`.
 *
 * When history is truncated by `history_since`, the key's first retained observation is
 * inside the window, and an older observation exists, the preceding boundary was dropped. That is reported as a
 * `window_boundary_gap` and the interval opens at `EPOCH`; the row is corrected by whichever
 * later run sees the boundary again.
 */
export async function rebuild(
	raw: RawClient,
	entity: string,
	unique_key: string,
	window: Window,
	opts: RebuildOpts = {}
): Promise<Result<RebuildResult, StrataError>> {
	const history = await raw.history(entity, unique_key, { since: opts.history_since });
	if (!history.ok) return history;

	const { versions, issues } = build_versions(history.value, opts);
	const emitted = select_emitted(versions, window);

	let complete = true;
	const since = opts.history_since;
	if (since && since.getTime() > EPOCH.getTime()) {
		const dropped = await raw.has_before(entity, unique_key, since);
		if (!dropped.ok) return dropped;
		complete = !dropped.value;

		const earliest = first(versions);
		if (!complete && earliest.ok && in_window(earliest.value.loaded_at, window)) {
			issues.push({ kind: "window_boundary_gap", entity, unique_key, side: "preceding" });
		}
	}

	return ok({ unique_key, versions, emitted, written: complete ? versions : emitted, issues });
}
