import { describe, it, expect } from "vitest";
import { boundary_hashes, build_versions, compact_history, rebuild, select_emitted, sort_history } from "../../versions";
import { create_memory_backend } from "../../backend/memory";
import { EPOCH, END_OF_TIME } from "../../time";
import { unwrap } from "../../result";
import type { RawObservation } from "../../types";

const T1 = new Date("2024-01-01T00:00:00.000Z");
const T2 = new Date("2024-01-02T00:00:00.000Z");
const T3 = new Date("2024-01-03T00:00:00.000Z");
const T4 = new Date("2024-01-04T00:00:00.000Z");

const obs = (loaded_at: Date, content_hash: string, unique_key = "K"): RawObservation => ({
	entity: "customers",
	unique_key,
	loaded_at,
	content_hash,
	payload: { id: unique_key, state: content_hash },
});

const summary = (v: { content_hash: string; valid_from: Date; valid_to: Date; updated_at: Date; version: number; is_current: boolean }) => ({
	hash: v.content_hash,
	valid_from: v.valid_from.toISOString(),
	valid_to: v.valid_to.toISOString(),
	updated_at: v.updated_at.toISOString(),
	version: v.version,
	is_current: v.is_current,
});

describe("build_versions", () => {
	const history = [obs(T3, "H3"), obs(T1, "H1"), obs(T2, "H2")];

	it("derives lagged validity intervals from neighbouring observations", () => {
		const { versions, issues } = build_versions(history);
		expect(issues).toEqual([]);
		expect(versions.map(summary)).toEqual([
			{ hash: "H1", valid_from: EPOCH.toISOString(), valid_to: T2.toISOString(), updated_at: T2.toISOString(), version: 3, is_current: false },
			{ hash: "H2", valid_from: T1.toISOString(), valid_to: T3.toISOString(), updated_at: T3.toISOString(), version: 2, is_current: false },
			{ hash: "H3", valid_from: T2.toISOString(), valid_to: END_OF_TIME.toISOString(), updated_at: T3.toISOString(), version: 1, is_current: true },
		]);
	});

	it("partitions time in contiguous mode", () => {
		const { versions } = build_versions(history, { boundaries: "contiguous" });
		expect(versions.map(v => [v.valid_from.toISOString(), v.valid_to.toISOString()])).toEqual([
			[EPOCH.toISOString(), T2.toISOString()],
			[T2.toISOString(), T3.toISOString()],
			[T3.toISOString(), END_OF_TIME.toISOString()],
		]);
		for (let i = 1; i < versions.length; i++) {
			expect(versions[i]?.valid_from.getTime()).toBe(versions[i - 1]?.valid_to.getTime());
		}
	});

	it("marks exactly one current version and numbers versions down to 1", () => {
		const { versions } = build_versions([obs(T1, "a"), obs(T2, "b"), obs(T3, "c"), obs(T4, "d")]);
		expect(versions.filter(v => v.is_current)).toHaveLength(1);
		expect(versions.map(v => v.version)).toEqual([4, 3, 2, 1]);
	});

	it("keeps consecutive identical hashes as separate versions by default", () => {
		const repeated = [obs(T1, "H1"), obs(T2, "H1"), obs(T3, "H2")];
		expect(build_versions(repeated).versions.map(v => v.content_hash)).toEqual(["H1", "H1", "H2"]);
	});

	it("collapses consecutive identical hashes with consecutive compaction", () => {
		const repeated = [obs(T1, "H1"), obs(T2, "H1"), obs(T3, "H2"), obs(T4, "H1")];
		const { versions } = build_versions(repeated, { compaction: "consecutive" });
		expect(versions.map(summary)).toEqual([
			{ hash: "H1", valid_from: EPOCH.toISOString(), valid_to: T3.toISOString(), updated_at: T3.toISOString(), version: 3, is_current: false },
			{ hash: "H2", valid_from: T1.toISOString(), valid_to: T4.toISOString(), updated_at: T4.toISOString(), version: 2, is_current: false },
			{ hash: "H1", valid_from: T3.toISOString(), valid_to: END_OF_TIME.toISOString(), updated_at: T4.toISOString(), version: 1, is_current: true },
		]);
	});

	it("reports ties on loaded_at without reordering them", () => {
		const { versions, issues } = build_versions([obs(T1, "H1"), obs(T2, "B"), obs(T2, "A")]);
		expect(versions.map(v => v.content_hash)).toEqual(["H1", "B", "A"]);
		expect(issues).toEqual([{ kind: "ambiguous_order", entity: "customers", unique_key: "K", loaded_at: T2 }]);
	});

	it("is deterministic", () => {
		expect(build_versions(history)).toEqual(build_versions(history));
	});

	it("handles a single observation", () => {
		const { versions } = build_versions([obs(T1, "H1")]);
		expect(versions.map(summary)).toEqual([
			{ hash: "H1", valid_from: EPOCH.toISOString(), valid_to: END_OF_TIME.toISOString(), updated_at: T1.toISOString(), version: 1, is_current: true },
		]);
	});
});

describe("history helpers", () => {
	it("sorts without mutating the input", () => {
		const input = [obs(T2, "b"), obs(T1, "a")];
		expect(sort_history(input).map(o => o.content_hash)).toEqual(["a", "b"]);
		expect(input.map(o => o.content_hash)).toEqual(["b", "a"]);
	});

	it("compacts only adjacent repeats", () => {
		const compacted = compact_history([obs(T1, "a"), obs(T2, "a"), obs(T3, "b"), obs(T4, "a")]);
		expect(compacted.map(o => o.content_hash)).toEqual(["a", "b", "a"]);
	});
});

describe("window selection", () => {
	const sorted = [obs(T1, "H1"), obs(T2, "H2"), obs(T3, "H3")];
	const { versions } = build_versions(sorted);

	it("collects the preceding, inside and following hashes", () => {
		expect([...boundary_hashes(sorted, { start: T2, end: T3 })].sort()).toEqual(["H1", "H2", "H3"]);
		expect([...boundary_hashes(sorted, { start: T3, end: T4 })].sort()).toEqual(["H2", "H3"]);
	});

	it("emits versions closed or opened inside the window", () => {
		expect(select_emitted(versions, { start: T3, end: T4 }).map(v => v.content_hash)).toEqual(["H2", "H3"]);
		expect(select_emitted(versions, { start: T2, end: T3 }).map(v => v.content_hash)).toEqual(["H1"]);
	});

	it("emits every version when one window covers the whole history", () => {
		expect(select_emitted(versions, { start: T1, end: T4 }).map(v => v.version)).toEqual([3, 2, 1]);
	});
});

describe("rebuild", () => {
	const seeded = async () => {
		const backend = create_memory_backend();
		unwrap(await backend.raw.append([obs(T1, "H1"), obs(T2, "H2"), obs(T3, "H3"), obs(T2, "X", "other")]));
		return backend;
	};

	it("rebuilds one key from its full history", async () => {
		const backend = await seeded();
		const result = unwrap(await rebuild(backend.raw, "customers", "K", { start: T3, end: T4 }));
		expect(result.unique_key).toBe("K");
		expect(result.versions).toHaveLength(3);
		expect(result.emitted.map(v => v.content_hash)).toEqual(["H2", "H3"]);
		expect(result.issues).toEqual([]);
	});

	it("writes every version of a key whose history is complete", async () => {
		const backend = await seeded();
		const result = unwrap(await rebuild(backend.raw, "customers", "K", { start: T3, end: T4 }, { history_since: T1 }));
		expect(result.written.map(v => [v.content_hash, v.version])).toEqual([
			["H1", 3],
			["H2", 2],
			["H3", 1],
		]);
	});

	it("reports a boundary gap when retained history starts inside the window", async () => {
		const backend = await seeded();
		const result = unwrap(await rebuild(backend.raw, "customers", "K", { start: T2, end: T3 }, { history_since: T2 }));
		expect(result.versions.map(v => v.content_hash)).toEqual(["H2", "H3"]);
		expect(result.versions[0]?.valid_from).toEqual(EPOCH);
		expect(result.issues).toEqual([{ kind: "window_boundary_gap", entity: "customers", unique_key: "K", side: "preceding" }]);
		expect(result.written).toBe(result.emitted);
	});

	it("does not report a gap when the horizon is before the window", async () => {
		const backend = await seeded();
		const result = unwrap(await rebuild(backend.raw, "customers", "K", { start: T2, end: T3 }, { history_since: T1 }));
		expect(result.issues).toEqual([]);
	});

	it("does not report a gap for a key first seen inside the window", async () => {
		const backend = await seeded();
		const result = unwrap(await rebuild(backend.raw, "customers", "other", { start: T2, end: T3 }, { history_since: T2 }));
		expect(result.versions.map(v => v.content_hash)).toEqual(["X"]);
		expect(result.issues).toEqual([]);
	});
});
