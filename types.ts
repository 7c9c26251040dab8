/**
 * @module Types
 * @description Type definitions for the strata library.
 */

/**
 * Error types that can occur during strata operations.
 * @category Types
 * @group Error Types
 *
 * Uses discriminated unions for type-safe error handling via the `kind` field:
 * - `missing_hook_component` - A hook's source column was null or absent (record is quarantined)
 * - `missing_key_component` - A unique key column was null or absent at ingestion
 * - `malformed_hook` - A hook string does not match the hook grammar
 * - `window_boundary_gap` - The boundary observation before a window is outside retained history
 * - `ambiguous_order` - Two observations of the same key share a `loaded_at`
 * - `invalid_window` / `invalid_timestamp` / `invalid_config` - Bad input
 * - `validation_error` - A definition or payload failed schema validation
 * - `unknown_entity` - A name that no definition registers
 * - `storage_error` - Backend storage operation failed (includes cause and operation name)
 *
 * @example
 * ```ts
 * const result = parse_primary(value)
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case 'malformed_hook':
 *       console.log(`Bad hook ${result.error.hook}: ${result.error.reason}`)
 *       break
 *   }
 * }
 * ```
 */
export type StrataError =
  | { kind: 'missing_hook_component'; entity: string; unique_key: string; hook: string; component: string }
  | { kind: 'missing_key_component'; entity: string; column: string }
  | { kind: 'malformed_hook'; hook: string; reason: string }
  | { kind: 'window_boundary_gap'; entity: string; unique_key: string; side: 'preceding' | 'following' }
  | { kind: 'ambiguous_order'; entity: string; unique_key: string; loaded_at: Date }
  | { kind: 'invalid_window'; start: Date; end: Date }
  | { kind: 'invalid_timestamp'; value: string }
  | { kind: 'invalid_config'; message: string }
  | { kind: 'validation_error'; cause: Error; message: string }
  | { kind: 'unknown_entity'; entity: string }
  | { kind: 'storage_error'; cause: Error; operation: string }

export type StrataErrorKind = StrataError['kind']

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = StrataError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 *
 * @category Core
 * @group Result Helpers
 *
 * @example
 * ```ts
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err('Division by zero')
 *   return ok(a / b)
 * }
 * ```
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 *
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/**
 * A single payload cell. Payloads are restricted to JSON scalars so that they
 * survive a storage roundtrip byte-for-byte.
 */
export type Value = string | number | boolean | null

export type Payload = Record<string, Value>

/**
 * Half-open processing interval `[start, end)` handled by one incremental run.
 * @category Types
 * @group Window Types
 */
export type Window = {
  start: Date
  end: Date
}

/**
 * One ingested snapshot of an entity's attributes at a point in time.
 *
 * Raw observations are append-only: created once at ingestion, never updated or deleted.
 * - `unique_key` - The entity key, composite keys joined with `|`
 * - `loaded_at` - Ingestion instant
 * - `content_hash` - Fingerprint of the entity's configured columns
 *
 * @category Types
 * @group Record Types
 */
export type RawObservation = {
  entity: string
  unique_key: string
  loaded_at: Date
  content_hash: string
  payload: Payload
}

/**
 * A historical slice of one `unique_key`, derived from its raw observations.
 *
 * - `valid_from` / `valid_to` - Validity interval (`valid_to` exclusive, `END_OF_TIME` when open)
 * - `updated_at` - Instant at which the slice was last closed or opened
 * - `version` - 1 for the current slice, increasing towards the oldest
 * - `is_current` - True only for the latest slice of the key
 *
 * @category Types
 * @group Record Types
 */
export type VersionedRecord = RawObservation & {
  valid_from: Date
  valid_to: Date
  updated_at: Date
  version: number
  is_current: boolean
}

/**
 * A versioned record carrying its composed hooks.
 *
 * `hooks` maps hook names (e.g. `_hook__customer__id`) to canonical hook strings.
 * A hook whose source column was missing is absent from the map. `pit_hook` is the
 * primary hook pinned to `valid_from`, or null when the primary hook is missing.
 *
 * @category Types
 * @group Record Types
 */
export type HookedRecord = VersionedRecord & {
  hooks: Record<string, string>
  pit_hook: string | null
}

/**
 * An interval-bearing row that the bridge resolver can join. Hooked records become
 * segments via `to_segment()`, and bridge rows are segments themselves, which is
 * what lets joins chain.
 *
 * @category Types
 * @group Bridge Types
 */
export type Segment = {
  hooks: Record<string, string>
  pit_hooks: Record<string, string>
  attributes: Record<string, Value>
  valid_from: Date
  valid_to: Date
  updated_at: Date
  is_current: boolean
}

/**
 * A denormalized fact produced by joining versioned entity streams through shared hooks.
 * Valid only while every joined side was valid.
 *
 * @category Types
 * @group Bridge Types
 */
export type BridgeRow = Segment & {
  bridge: string
  identity: string
}

export type StrataEvent =
  | { type: 'observations_ingested'; entity: string; count: number; rejected: number; deduplicated: number }
  | { type: 'window_scanned'; entity: string; start: Date; end: Date; changed_keys: number }
  | { type: 'key_rebuilt'; entity: string; unique_key: string; versions: number; emitted: number }
  | { type: 'versions_written'; entity: string; count: number }
  | { type: 'hook_quarantined'; entity: string; unique_key: string; hook: string; component: string }
  | { type: 'bridge_built'; bridge: string; rows: number; excluded: number; unresolved: number }
  | { type: 'bridge_written'; bridge: string; count: number }
  | { type: 'run_completed'; start: Date; end: Date; versions: number; bridge_rows: number; errors: number }
  | { type: 'error'; error: StrataError }

export type EventHandler = (event: StrataEvent) => void

/** How validity boundaries are derived from neighbouring observations. */
export type BoundaryMode = 'lagged' | 'contiguous'

/** Whether consecutive observations with identical content collapse into one version. */
export type CompactionMode = 'none' | 'consecutive'

export type DedupeMode = 'none' | 'hash'

/** @internal */
export type RawClient = {
  append: (observations: RawObservation[]) => Promise<Result<number, StrataError>>
  changed_keys: (entity: string, window: Window) => Promise<Result<Set<string>, StrataError>>
  history: (entity: string, unique_key: string, opts?: HistoryOpts) => Promise<Result<RawObservation[], StrataError>>
  has_hash: (entity: string, content_hash: string) => Promise<Result<boolean, StrataError>>
  /** Whether any observation of the key was loaded strictly before `instant`. */
  has_before: (entity: string, unique_key: string, instant: Date) => Promise<Result<boolean, StrataError>>
}

/** @internal */
export type VersionClient = {
  upsert: (records: HookedRecord[]) => Promise<Result<number, StrataError>>
  list: (entity: string, opts?: VersionListOpts) => AsyncIterable<HookedRecord>
}

/** @internal */
export type BridgeClient = {
  upsert: (rows: BridgeRow[]) => Promise<Result<number, StrataError>>
  list: (bridge: string) => AsyncIterable<BridgeRow>
}

export type HistoryOpts = {
  /** Only observations loaded at or after this instant are retained. */
  since?: Date
}

export type VersionListOpts = {
  unique_key?: string
  current_only?: boolean
}

/**
 * Interface that storage backends implement.
 *
 * A Backend provides three clients:
 * - `raw` - Append-only raw observations
 * - `versions` - Versioned, hooked records (upsert by entity, key and load instant)
 * - `bridges` - Bridge rows (upsert by bridge and identity)
 *
 * Built-in backends:
 * - `create_memory_backend()` - In-memory, ephemeral storage
 * - `create_sqlite_backend()` - SQLite via drizzle-orm and better-sqlite3
 *
 * @category Types
 * @group Backend Types
 */
export type Backend = {
  raw: RawClient
  versions: VersionClient
  bridges: BridgeClient
  on_event?: EventHandler
}
