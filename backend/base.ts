/**
 * @module Backend Base
 * @description Base abstraction layer for backend implementations.
 */

import type {
  BridgeClient,
  BridgeRow,
  HistoryOpts,
  HookedRecord,
  RawClient,
  RawObservation,
  Result,
  StrataError,
  StrataEvent,
  VersionClient,
  VersionListOpts,
  Window,
} from "../types";
import { ok, err } from "../types";
import { to_error } from "../result";

/**
 * Thin storage adapters. Backends implement these; error mapping and events live in the
 * clients built over them.
 */
export type RawStorage = {
  append: (observations: RawObservation[]) => Promise<void>;
  changed_keys: (entity: string, window: Window) => Promise<string[]>;
  history: (entity: string, unique_key: string, since?: Date) => Promise<RawObservation[]>;
  has_hash: (entity: string, content_hash: string) => Promise<boolean>;
  has_before: (entity: string, unique_key: string, instant: Date) => Promise<boolean>;
};

export type VersionStorage = {
  upsert: (records: HookedRecord[]) => Promise<void>;
  list: (entity: string, opts: VersionListOpts) => AsyncIterable<HookedRecord>;
};

export type BridgeStorage = {
  upsert: (rows: BridgeRow[]) => Promise<void>;
  list: (bridge: string) => AsyncIterable<BridgeRow>;
};

type Emit = (event: StrataEvent) => void;

async function guard<T>(emit: Emit, operation: string, fn: () => Promise<T>): Promise<Result<T, StrataError>> {
  try {
    return ok(await fn());
  } catch (cause) {
    const error: StrataError = { kind: "storage_error", cause: to_error(cause), operation };
    emit({ type: "error", error });
    return err(error);
  }
}

export function create_raw_client(storage: RawStorage, emit: Emit): RawClient {
  return {
    async append(observations) {
      return guard(emit, "raw.append", async () => {
        if (observations.length > 0) await storage.append(observations);
        return observations.length;
      });
    },

    async changed_keys(entity, window) {
      return guard(emit, "raw.changed_keys", async () => new Set(await storage.changed_keys(entity, window)));
    },

    async history(entity, unique_key, opts?: HistoryOpts) {
      return guard(emit, "raw.history", () => storage.history(entity, unique_key, opts?.since));
    },

    async has_hash(entity, content_hash) {
      return guard(emit, "raw.has_hash", () => storage.has_hash(entity, content_hash));
    },

    async has_before(entity, unique_key, instant) {
      return guard(emit, "raw.has_before", () => storage.has_before(entity, unique_key, instant));
    },
  };
}

export function create_version_client(storage: VersionStorage, emit: Emit): VersionClient {
  return {
    async upsert(records) {
      return guard(emit, "versions.upsert", async () => {
        if (records.length > 0) await storage.upsert(records);
        return records.length;
      });
    },

    list(entity, opts = {}) {
      return storage.list(entity, opts);
    },
  };
}

export function create_bridge_client(storage: BridgeStorage, emit: Emit): BridgeClient {
  return {
    async upsert(rows) {
      return guard(emit, "bridges.upsert", async () => {
        if (rows.length > 0) await storage.upsert(rows);
        return rows.length;
      });
    },

    list(bridge) {
      return storage.list(bridge);
    },
  };
}

export const version_key = (record: Pick<HookedRecord, "entity" | "unique_key" | "loaded_at">): string =>
  `${record.entity}\u0000${record.unique_key}\u0000${record.loaded_at.toISOString()}`;

export const bridge_key = (row: Pick<BridgeRow, "bridge" | "identity">): string => `${row.bridge}\u0000${row.identity}`;

export function compare_versions(a: HookedRecord, b: HookedRecord): number {
  if (a.unique_key !== b.unique_key) return a.unique_key < b.unique_key ? -1 : 1;
  return a.loaded_at.getTime() - b.loaded_at.getTime();
}
