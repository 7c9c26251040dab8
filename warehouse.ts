/**
 * @module Warehouse
 * @description Incremental runs over registered entities and bridges.
 */

import type {
  Backend,
  BoundaryMode,
  BridgeRow,
  CompactionMode,
  DedupeMode,
  HookedRecord,
  Result,
  StrataError,
  StrataErrorKind,
  StrataEvent,
  VersionListOpts,
  Window,
} from './types'
import { ok, err } from './types'
import type { EntityDefinition } from './entity'
import { apply_hooks } from './entity'
import type { BridgeDefinition } from './bridge'
import { build_bridge } from './bridge'
import type { WarehouseConfig } from './config'
import type { EventRow } from './pit'
import { unpivot_events } from './pit'
import { prepare_observations } from './ingest'
import { rebuild } from './versions'
import { create_window, in_window, is_representable, load_id_to_timestamp } from './time'
import { parallel_map, partition_results } from './concurrency'
import { to_error, try_catch_async } from './result'

export type WarehouseOptions = {
  boundaries: BoundaryMode
  compaction: CompactionMode
  dedupe: DedupeMode
  concurrency: number
  history_since?: Date
}

const DEFAULT_OPTIONS: WarehouseOptions = {
  boundaries: 'lagged',
  compaction: 'none',
  dedupe: 'none',
  concurrency: 8,
}

/** `loaded_at` is given directly, or derived from an extraction load id. */
export type IngestOpts = ({ loaded_at: Date } | { load_id: string | number }) & {
  dedupe?: DedupeMode
}

export type IngestReport = {
  entity: string
  loaded_at: Date
  appended: number
  rejected: StrataError[]
  deduplicated: number
}

export type RunOpts = Partial<Omit<WarehouseOptions, 'dedupe'>> & {
  /** Restricts the run to these entities; bridges still read every frame they need. */
  entities?: string[]
}

export type EntityRunReport = {
  entity: string
  changed_keys: number
  versions_written: number
  quarantined: number
}

export type BridgeRunReport = {
  bridge: string
  rows_written: number
  excluded: number
  unresolved: number
}

/**
 * Outcome of one window run. `errors` holds every non-fatal error in the order it was met;
 * `error_counts` tallies them by kind.
 */
export type RunReport = {
  window: Window
  entities: EntityRunReport[]
  bridges: BridgeRunReport[]
  errors: StrataError[]
  error_counts: Partial<Record<StrataErrorKind, number>>
}

export type Warehouse = {
  backend: Backend
  entities: ReadonlyMap<string, EntityDefinition>
  bridges: ReadonlyMap<string, BridgeDefinition>
  options: Readonly<WarehouseOptions>
  ingest: (entity: string, rows: readonly unknown[], opts: IngestOpts) => Promise<Result<IngestReport, StrataError>>
  run: (window: Window, opts?: RunOpts) => Promise<Result<RunReport, StrataError>>
  versions: (entity: string, opts?: VersionListOpts) => AsyncIterable<HookedRecord>
  bridge_rows: (bridge: string) => AsyncIterable<BridgeRow>
  bridge_events: (bridge: string) => Promise<Result<EventRow[], StrataError>>
}

export type WarehouseBuilder = {
  with_backend: (backend: Backend) => WarehouseBuilder
  with_entity: (entity: EntityDefinition) => WarehouseBuilder
  with_bridge: (bridge: BridgeDefinition) => WarehouseBuilder
  with_options: (options: Partial<WarehouseOptions>) => WarehouseBuilder
  with_config: (config: WarehouseConfig) => WarehouseBuilder
  build: () => Warehouse
}

export function count_errors(errors: readonly StrataError[]): Partial<Record<StrataErrorKind, number>> {
  const counts: Partial<Record<StrataErrorKind, number>> = {}
  for (const error of errors) counts[error.kind] = (counts[error.kind] ?? 0) + 1
  return counts
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const item of items) out.push(item)
  return out
}

function resolve_loaded_at(opts: IngestOpts): Result<Date, StrataError> {
  if (!('loaded_at' in opts)) return load_id_to_timestamp(opts.load_id)
  if (!is_representable(opts.loaded_at)) return err({ kind: 'invalid_timestamp', value: String(opts.loaded_at) })
  return ok(opts.loaded_at)
}

function create_warehouse_instance(
  backend: Backend,
  entities: ReadonlyMap<string, EntityDefinition>,
  bridges: ReadonlyMap<string, BridgeDefinition>,
  options: Readonly<WarehouseOptions>
): Warehouse {
  function emit(event: StrataEvent) {
    backend.on_event?.(event)
  }

  async function list_all<T>(items: AsyncIterable<T>, operation: string): Promise<Result<T[], StrataError>> {
    const listed = await try_catch_async(
      () => collect(items),
      (cause): StrataError => ({ kind: 'storage_error', cause: to_error(cause), operation })
    )
    if (!listed.ok) emit({ type: 'error', error: listed.error })
    return listed
  }

  async function run_entity(entity: EntityDefinition, window: Window, opts: WarehouseOptions, errors: StrataError[]): Promise<EntityRunReport> {
    const report: EntityRunReport = { entity: entity.name, changed_keys: 0, versions_written: 0, quarantined: 0 }

    const changed = await backend.raw.changed_keys(entity.name, window)
    if (!changed.ok) {
      errors.push(changed.error)
      return report
    }

    const keys = [...changed.value].sort()
    report.changed_keys = keys.length
    emit({ type: 'window_scanned', entity: entity.name, start: window.start, end: window.end, changed_keys: keys.length })

    const rebuilt = await parallel_map(keys, key => rebuild(backend.raw, entity.name, key, window, opts), opts.concurrency)
    const { values, errors: failed } = partition_results(rebuilt)
    errors.push(...failed)

    const records: HookedRecord[] = []
    for (const result of values) {
      errors.push(...result.issues)
      emit({ type: 'key_rebuilt', entity: entity.name, unique_key: result.unique_key, versions: result.versions.length, emitted: result.emitted.length })

      // rows written only to restate their rank were reported when first emitted
      const emitted = new Set(result.emitted)
      for (const version of result.written) {
        const { record, quarantined } = apply_hooks(entity, version)
        records.push(record)
        if (!emitted.has(version)) continue
        for (const issue of quarantined) {
          if (issue.kind === 'missing_hook_component') {
            emit({ type: 'hook_quarantined', entity: issue.entity, unique_key: issue.unique_key, hook: issue.hook, component: issue.component })
          }
          errors.push(issue)
        }
        report.quarantined += quarantined.length
      }
    }

    const written = await backend.versions.upsert(records)
    if (!written.ok) {
      errors.push(written.error)
      return report
    }
    report.versions_written = written.value
    emit({ type: 'versions_written', entity: entity.name, count: written.value })
    return report
  }

  async function run_bridge(definition: BridgeDefinition, window: Window, errors: StrataError[]): Promise<BridgeRunReport> {
    const report: BridgeRunReport = { bridge: definition.name, rows_written: 0, excluded: 0, unresolved: 0 }

    const frames = new Map<string, HookedRecord[]>()
    for (const name of [definition.frame, ...definition.joins.map(j => j.entity)]) {
      if (frames.has(name)) continue
      const listed = await list_all(backend.versions.list(name), 'versions.list')
      if (!listed.ok) {
        errors.push(listed.error)
        return report
      }
      frames.set(name, listed.value)
    }

    const built = build_bridge(definition, entities, frames)
    if (!built.ok) {
      errors.push(built.error)
      return report
    }

    const { excluded, unresolved } = built.value
    errors.push(...excluded)
    report.excluded = excluded.length
    report.unresolved = unresolved
    emit({ type: 'bridge_built', bridge: definition.name, rows: built.value.rows.length, excluded: excluded.length, unresolved })

    const rows = built.value.rows.filter(row => in_window(row.updated_at, window))
    const written = await backend.bridges.upsert(rows)
    if (!written.ok) {
      errors.push(written.error)
      return report
    }
    report.rows_written = written.value
    emit({ type: 'bridge_written', bridge: definition.name, count: written.value })
    return report
  }

  return {
    backend,
    entities,
    bridges,
    options,

    async ingest(name, rows, opts) {
      const entity = entities.get(name)
      if (!entity) return err({ kind: 'unknown_entity', entity: name })

      const loaded_at = resolve_loaded_at(opts)
      if (!loaded_at.ok) return loaded_at

      const prepared = await prepare_observations(entity, rows, {
        loaded_at: loaded_at.value,
        dedupe: opts.dedupe ?? options.dedupe,
        known_hash: content_hash => backend.raw.has_hash(name, content_hash),
      })
      if (!prepared.ok) return prepared

      const { observations, rejected, deduplicated } = prepared.value

      const appended = await backend.raw.append(observations)
      if (!appended.ok) return appended

      emit({
        type: 'observations_ingested',
        entity: name,
        count: appended.value,
        rejected: rejected.length,
        deduplicated,
      })

      return ok({
        entity: name,
        loaded_at: loaded_at.value,
        appended: appended.value,
        rejected,
        deduplicated,
      })
    },

    async run(window, opts = {}) {
      const valid = create_window(window.start, window.end)
      if (!valid.ok) return valid

      const { entities: only, ...overrides } = opts
      const run_options: WarehouseOptions = { ...options, ...overrides }

      const selected: EntityDefinition[] = []
      for (const name of only ?? [...entities.keys()]) {
        const entity = entities.get(name)
        if (!entity) return err({ kind: 'unknown_entity', entity: name })
        selected.push(entity)
      }

      const errors: StrataError[] = []
      const entity_reports: EntityRunReport[] = []
      for (const entity of selected) {
        entity_reports.push(await run_entity(entity, valid.value, run_options, errors))
      }

      const bridge_reports: BridgeRunReport[] = []
      for (const definition of bridges.values()) {
        bridge_reports.push(await run_bridge(definition, valid.value, errors))
      }

      emit({
        type: 'run_completed',
        start: window.start,
        end: window.end,
        versions: entity_reports.reduce((sum, r) => sum + r.versions_written, 0),
        bridge_rows: bridge_reports.reduce((sum, r) => sum + r.rows_written, 0),
        errors: errors.length,
      })

      return ok({
        window: valid.value,
        entities: entity_reports,
        bridges: bridge_reports,
        errors,
        error_counts: count_errors(errors),
      })
    },

    versions(entity, opts) {
      return backend.versions.list(entity, opts)
    },

    bridge_rows(bridge) {
      return backend.bridges.list(bridge)
    },

    async bridge_events(name) {
      const definition = bridges.get(name)
      if (!definition) return err({ kind: 'unknown_entity', entity: name })
      const rows = await list_all(backend.bridges.list(name), 'bridges.list')
      if (!rows.ok) return rows
      return ok(unpivot_events(rows.value, definition.events))
    },
  }
}

/**
 * Creates a new Warehouse instance using the builder pattern.
 *
 * A Warehouse runs the incremental pipeline for its registered entities and bridges over
 * a storage backend. Use the builder chain to configure:
 * `with_backend()` → `with_entity()` / `with_bridge()` → `build()`.
 *
 * @category Core
 * @group Builders
 *
 * @example
 * ```ts
 * const warehouse = create_warehouse()
 *   .with_backend(create_memory_backend())
 *   .with_entity(customers)
 *   .with_entity(orders)
 *   .with_bridge(order_bridge)
 *   .with_options({ concurrency: 4 })
 *   .build()
 *
 * await warehouse.ingest('customers', rows, { load_id: '1724152321.5' })
 * const report = await warehouse.run({ start, end })
 * ```
 */
export function create_warehouse(): WarehouseBuilder {
  let backend: Backend | null = null
  const entities = new Map<string, EntityDefinition>()
  const bridges = new Map<string, BridgeDefinition>()
  let options: WarehouseOptions = { ...DEFAULT_OPTIONS }

  const builder: WarehouseBuilder = {
    with_backend(b) {
      backend = b
      return builder
    },

    with_entity(entity) {
      entities.set(entity.name, entity)
      return builder
    },

    with_bridge(bridge) {
      bridges.set(bridge.name, bridge)
      return builder
    },

    with_options(overrides) {
      options = { ...options, ...overrides }
      return builder
    },

    with_config(config) {
      for (const entity of config.entities) entities.set(entity.name, entity)
      for (const bridge of config.bridges) bridges.set(bridge.name, bridge)
      options = { ...options, ...config.defaults }
      return builder
    },

    build() {
      if (!backend) {
        throw new Error('Backend is required. Call with_backend() first.')
      }
      return create_warehouse_instance(backend, new Map(entities), new Map(bridges), Object.freeze({ ...options }))
    },
  }

  return builder
}
