import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'
import {
  create_warehouse,
  create_memory_backend,
  create_sqlite_backend,
  load_warehouse_config,
  unwrap,
  unwrap_err,
  EPOCH,
  END_OF_TIME,
  type Backend,
  type StrataEvent,
  type Warehouse,
  type WarehouseConfig,
} from '../index'

const T1 = new Date('2024-01-01T00:00:00.000Z')
const T2 = new Date('2024-01-02T00:00:00.000Z')
const T3 = new Date('2024-01-03T00:00:00.000Z')
const T4 = new Date('2024-01-04T00:00:00.000Z')

const CUSTOMER_PIT = 'northwind.customer.id|ALFKI~epoch__valid_from|1970-01-01T00:00:00.000Z'

const customer = (city: string) => ({ customer_id: 'ALFKI', company_name: 'Alfreds Futterkiste', city })
const order = (shipped_at: string | null) => ({
  order_id: 10248,
  customer_id: 'ALFKI',
  ordered_at: '2023-12-30T00:00:00.000Z',
  shipped_at,
})

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const item of items) out.push(item)
  return out
}

const fixture = fileURLToPath(new URL('./fixtures/warehouse.json', import.meta.url))

describe('warehouse', () => {
  let config: WarehouseConfig
  let events: StrataEvent[]
  let warehouse: Warehouse

  const build = (backend: Backend) => create_warehouse().with_backend(backend).with_config(config).build()

  beforeEach(async () => {
    config = unwrap(await load_warehouse_config(fixture))
    events = []
    warehouse = build(create_memory_backend({ on_event: e => events.push(e) }))
  })

  describe('builder', () => {
    it('requires a backend', () => {
      expect(() => create_warehouse().build()).toThrow('Backend is required. Call with_backend() first.')
    })

    it('takes entities, bridges and defaults from config', () => {
      expect([...warehouse.entities.keys()]).toEqual(['customers', 'orders'])
      expect([...warehouse.bridges.keys()]).toEqual(['orders_bridge'])
      expect(warehouse.options).toEqual({
        boundaries: 'lagged',
        compaction: 'none',
        dedupe: 'none',
        concurrency: 4,
        history_since: new Date('2020-01-01T00:00:00.000Z'),
      })
    })

    it('lets later options override config defaults', () => {
      const tuned = create_warehouse()
        .with_backend(create_memory_backend())
        .with_config(config)
        .with_options({ concurrency: 1, boundaries: 'contiguous' })
        .build()
      expect(tuned.options.concurrency).toBe(1)
      expect(tuned.options.boundaries).toBe('contiguous')
    })
  })

  describe('ingest', () => {
    it('derives loaded_at from a load id', async () => {
      const report = unwrap(await warehouse.ingest('customers', [customer('Berlin')], { load_id: '1704067200' }))
      expect(report).toEqual({ entity: 'customers', loaded_at: T1, appended: 1, rejected: [], deduplicated: 0 })
      expect(events).toEqual([
        { type: 'observations_ingested', entity: 'customers', count: 1, rejected: 0, deduplicated: 0 },
      ])
    })

    it('rejects rows without a key or with nested values, keeping the rest', async () => {
      const report = unwrap(
        await warehouse.ingest(
          'orders',
          [order(null), { customer_id: 'ALFKI' }, { order_id: 1, lines: [1, 2] }],
          { loaded_at: T1 }
        )
      )
      expect(report.appended).toBe(1)
      expect(report.rejected.map(e => e.kind)).toEqual(['missing_key_component', 'validation_error'])
      expect(report.rejected[0]).toEqual({ kind: 'missing_key_component', entity: 'orders', column: 'order_id' })
    })

    it('drops rows whose content is already stored when deduplicating by hash', async () => {
      await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T1, dedupe: 'hash' })
      const again = unwrap(await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T2, dedupe: 'hash' }))
      expect(again.appended).toBe(0)
      expect(again.deduplicated).toBe(1)
    })

    it('fails for unknown entities and bad load ids', async () => {
      expect(unwrap_err(await warehouse.ingest('suppliers', [], { loaded_at: T1 }))).toEqual({
        kind: 'unknown_entity',
        entity: 'suppliers',
      })
      expect(unwrap_err(await warehouse.ingest('customers', [], { load_id: 'abc' }))).toEqual({
        kind: 'invalid_timestamp',
        value: 'abc',
      })
    })

    it('refuses load instants that storage cannot order', async () => {
      expect(unwrap_err(await warehouse.ingest('customers', [customer('Berlin')], { load_id: '1e20' }))).toEqual({
        kind: 'invalid_timestamp',
        value: '1e20',
      })
      expect(unwrap_err(await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: new Date(Number.NaN) }))).toEqual({
        kind: 'invalid_timestamp',
        value: 'Invalid Date',
      })
      expect(events).toEqual([])
      expect(unwrap(await warehouse.run({ start: EPOCH, end: END_OF_TIME }, { entities: ['customers'] })).entities).toEqual([
        { entity: 'customers', changed_keys: 0, versions_written: 0, quarantined: 0 },
      ])
    })
  })

  describe('versions', () => {
    const ingest_three = async () => {
      await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
      await warehouse.ingest('customers', [customer('Hamburg')], { loaded_at: T2 })
      await warehouse.ingest('customers', [customer('Lyon')], { loaded_at: T3 })
    }

    const shape = async (w: Warehouse) =>
      (await collect(w.versions('customers'))).map(v => [v.payload.city, v.valid_from, v.valid_to, v.version, v.is_current])

    it('builds lagged intervals when one window covers the whole history', async () => {
      await ingest_three()
      const report = unwrap(await warehouse.run({ start: T1, end: T4 }, { entities: ['customers'] }))

      expect(report.entities).toEqual([{ entity: 'customers', changed_keys: 1, versions_written: 3, quarantined: 0 }])
      expect(await shape(warehouse)).toEqual([
        ['Berlin', EPOCH, T2, 3, false],
        ['Hamburg', T1, T3, 2, false],
        ['Lyon', T2, END_OF_TIME, 1, true],
      ])
    })

    it('builds contiguous intervals when asked to', async () => {
      await ingest_three()
      unwrap(await warehouse.run({ start: T1, end: T4 }, { entities: ['customers'], boundaries: 'contiguous' }))

      expect(await shape(warehouse)).toEqual([
        ['Berlin', EPOCH, T2, 3, false],
        ['Hamburg', T2, T3, 2, false],
        ['Lyon', T3, END_OF_TIME, 1, true],
      ])
    })

    it('closes earlier versions across incremental windows', async () => {
      await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
      unwrap(await warehouse.run({ start: T1, end: T2 }))
      await warehouse.ingest('customers', [customer('Hamburg')], { loaded_at: T2 })
      unwrap(await warehouse.run({ start: T2, end: T3 }))
      await warehouse.ingest('customers', [customer('Lyon')], { loaded_at: T3 })
      const last = unwrap(await warehouse.run({ start: T3, end: T4 }))

      expect(last.entities[0]).toEqual({ entity: 'customers', changed_keys: 1, versions_written: 3, quarantined: 0 })
      expect(await shape(warehouse)).toEqual([
        ['Berlin', EPOCH, T2, 3, false],
        ['Hamburg', T1, T3, 2, false],
        ['Lyon', T2, END_OF_TIME, 1, true],
      ])

      const current = await collect(warehouse.versions('customers', { current_only: true }))
      expect(current.map(v => v.pit_hook)).toEqual(['northwind.customer.id|ALFKI~epoch__valid_from|2024-01-02T00:00:00.000Z'])
    })

    it('reports a boundary gap only when the horizon dropped older history', async () => {
      await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
      await warehouse.ingest('customers', [customer('Hamburg')], { loaded_at: T2 })
      await warehouse.ingest('customers', [{ ...customer('Paris'), customer_id: 'BONAP' }], { loaded_at: T2 })

      const report = unwrap(await warehouse.run({ start: T2, end: T3 }, { entities: ['customers'], history_since: T2 }))
      expect(report.error_counts).toEqual({ window_boundary_gap: 1 })
      expect(report.errors).toEqual([
        { kind: 'window_boundary_gap', entity: 'customers', unique_key: 'ALFKI', side: 'preceding' },
      ])
    })

    it('quarantines records with a missing hook component but still writes them', async () => {
      await warehouse.ingest('orders', [{ ...order(null), customer_id: null }], { loaded_at: T1 })
      events.length = 0

      const report = unwrap(await warehouse.run({ start: T1, end: T2 }))
      expect(report.entities[1]).toEqual({ entity: 'orders', changed_keys: 1, versions_written: 1, quarantined: 1 })
      expect(report.bridges).toEqual([{ bridge: 'orders_bridge', rows_written: 0, excluded: 0, unresolved: 1 }])
      expect(report.error_counts).toEqual({ missing_hook_component: 1 })
      expect(events).toContainEqual({
        type: 'hook_quarantined',
        entity: 'orders',
        unique_key: '10248',
        hook: '_hook__customer__id',
        component: 'customer_id',
      })

      const [stored] = await collect(warehouse.versions('orders'))
      expect(stored?.hooks).toEqual({ _hook__order__id: 'northwind.order.id|10248' })
    })

    it('reports a quarantined version once, not again when its rank is restated', async () => {
      const unassigned = (shipped_at: string | null) => ({ ...order(shipped_at), customer_id: null })
      await warehouse.ingest('orders', [unassigned(null)], { loaded_at: T1 })
      unwrap(await warehouse.run({ start: T1, end: T2 }))
      await warehouse.ingest('orders', [unassigned('2024-01-02T00:00:00.000Z')], { loaded_at: T2 })
      unwrap(await warehouse.run({ start: T2, end: T3 }))
      await warehouse.ingest('orders', [unassigned('2024-01-03T00:00:00.000Z')], { loaded_at: T3 })
      events.length = 0

      const report = unwrap(await warehouse.run({ start: T3, end: T4 }))
      expect(report.entities[1]).toEqual({ entity: 'orders', changed_keys: 1, versions_written: 3, quarantined: 2 })
      expect(events.filter(e => e.type === 'hook_quarantined')).toHaveLength(2)
      expect((await collect(warehouse.versions('orders'))).map(v => v.version)).toEqual([3, 2, 1])
    })
  })

  describe('run', () => {
    it('rejects empty windows and unknown entities', async () => {
      expect(unwrap_err(await warehouse.run({ start: T2, end: T2 }))).toEqual({ kind: 'invalid_window', start: T2, end: T2 })
      expect(unwrap_err(await warehouse.run({ start: T1, end: T2 }, { entities: ['suppliers'] }))).toEqual({
        kind: 'unknown_entity',
        entity: 'suppliers',
      })
    })

    it('emits run progress in order', async () => {
      await warehouse.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
      await warehouse.ingest('orders', [order(null)], { loaded_at: T1 })
      events.length = 0

      const report = unwrap(await warehouse.run({ start: T1, end: T2 }))
      expect(report).toEqual({
        window: { start: T1, end: T2 },
        entities: [
          { entity: 'customers', changed_keys: 1, versions_written: 1, quarantined: 0 },
          { entity: 'orders', changed_keys: 1, versions_written: 1, quarantined: 0 },
        ],
        bridges: [{ bridge: 'orders_bridge', rows_written: 1, excluded: 0, unresolved: 0 }],
        errors: [],
        error_counts: {},
      })
      expect(events.map(e => e.type)).toEqual([
        'window_scanned',
        'key_rebuilt',
        'versions_written',
        'window_scanned',
        'key_rebuilt',
        'versions_written',
        'bridge_built',
        'bridge_written',
        'run_completed',
      ])
      expect(events.at(-1)).toEqual({ type: 'run_completed', start: T1, end: T2, versions: 2, bridge_rows: 1, errors: 0 })
    })
  })

  describe('bridges', () => {
    const ship_order = async (w: Warehouse) => {
      await w.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
      await w.ingest('orders', [order(null)], { loaded_at: T1 })
      unwrap(await w.run({ start: T1, end: T2 }))
      await w.ingest('orders', [order('2024-01-02T00:00:00.000Z')], { loaded_at: T2 })
      return unwrap(await w.run({ start: T2, end: T3 }))
    }

    it('closes the bridge row of a superseded order version', async () => {
      const report = await ship_order(warehouse)
      expect(report.entities).toEqual([
        { entity: 'customers', changed_keys: 0, versions_written: 0, quarantined: 0 },
        { entity: 'orders', changed_keys: 1, versions_written: 2, quarantined: 0 },
      ])
      expect(report.bridges).toEqual([{ bridge: 'orders_bridge', rows_written: 2, excluded: 0, unresolved: 0 }])

      const rows = await collect(warehouse.bridge_rows('orders_bridge'))
      expect(rows.map(r => [r.identity, r.valid_from, r.valid_to, r.updated_at, r.is_current])).toEqual([
        [`${CUSTOMER_PIT} northwind.order.id|10248~epoch__valid_from|1970-01-01T00:00:00.000Z`, EPOCH, T2, T2, false],
        [`${CUSTOMER_PIT} northwind.order.id|10248~epoch__valid_from|2024-01-01T00:00:00.000Z`, T1, END_OF_TIME, T2, true],
      ])
      expect(rows[1]?.hooks).toEqual({
        _hook__order__id: 'northwind.order.id|10248',
        _hook__customer__id: 'northwind.customer.id|ALFKI',
      })
      expect(rows[1]?.attributes).toEqual({
        order_id__orders: 10248,
        customer_id__orders: 'ALFKI',
        ordered_at__orders: '2023-12-30T00:00:00.000Z',
        shipped_at__orders: '2024-01-02T00:00:00.000Z',
        customer_id__customers: 'ALFKI',
        company_name__customers: 'Alfreds Futterkiste',
        city__customers: 'Berlin',
      })
    })

    it('unpivots configured event columns', async () => {
      await ship_order(warehouse)
      const rows = unwrap(await warehouse.bridge_events('orders_bridge'))
      expect(rows.map(r => [r.event, r.event_occurred_at.toISOString(), r.is_current])).toEqual([
        ['order_placed', '2023-12-30T00:00:00.000Z', false],
        ['order_placed', '2023-12-30T00:00:00.000Z', true],
        ['order_shipped', '2024-01-02T00:00:00.000Z', true],
      ])
      expect(unwrap_err(await warehouse.bridge_events('suppliers_bridge'))).toEqual({
        kind: 'unknown_entity',
        entity: 'suppliers_bridge',
      })
    })

    it('leaves the stores unchanged when a window is run again', async () => {
      const first = await ship_order(warehouse)
      const versions = await collect(warehouse.versions('orders'))
      const rows = await collect(warehouse.bridge_rows('orders_bridge'))

      const again = unwrap(await warehouse.run({ start: T2, end: T3 }))
      expect(again).toEqual(first)
      expect(await collect(warehouse.versions('orders'))).toEqual(versions)
      expect(await collect(warehouse.bridge_rows('orders_bridge'))).toEqual(rows)
    })
  })

  describe('on sqlite', () => {
    const open: Database.Database[] = []
    const sqlite = (on_event?: (e: StrataEvent) => void) => {
      const database = new Database(':memory:')
      open.push(database)
      return { database, backend: create_sqlite_backend({ database, on_event }) }
    }

    afterEach(() => {
      for (const database of open.splice(0)) {
        if (database.open) database.close()
      }
    })

    it('produces the same versions and bridge rows as the memory backend', async () => {
      const on_sqlite = build(sqlite().backend)
      for (const w of [warehouse, on_sqlite]) {
        await w.ingest('customers', [customer('Berlin')], { loaded_at: T1 })
        await w.ingest('orders', [order(null)], { loaded_at: T1 })
        unwrap(await w.run({ start: T1, end: T2 }))
        await w.ingest('orders', [order('2024-01-02T00:00:00.000Z')], { loaded_at: T2 })
        unwrap(await w.run({ start: T2, end: T3 }))
        unwrap(await w.run({ start: T2, end: T3 }))
      }

      expect(await collect(on_sqlite.versions('customers'))).toEqual(await collect(warehouse.versions('customers')))
      expect(await collect(on_sqlite.versions('orders'))).toEqual(await collect(warehouse.versions('orders')))
      expect(await collect(on_sqlite.bridge_rows('orders_bridge'))).toEqual(
        await collect(warehouse.bridge_rows('orders_bridge'))
      )
    })

    it('collects storage failures in the report instead of failing the run', async () => {
      const sqlite_events: StrataEvent[] = []
      const { database, backend } = sqlite(e => sqlite_events.push(e))
      const broken = build(backend)
      database.close()

      const report = unwrap(await broken.run({ start: T1, end: T2 }))
      expect(report.error_counts).toEqual({ storage_error: 3 })
      expect(report.errors.map(e => (e.kind === 'storage_error' ? e.operation : e.kind))).toEqual([
        'raw.changed_keys',
        'raw.changed_keys',
        'versions.list',
      ])
      expect(sqlite_events.map(e => e.type)).toEqual(['error', 'error', 'error', 'run_completed'])
    })

    it('fails a deduplicating ingest when stored hashes cannot be read', async () => {
      const { database, backend } = sqlite()
      const broken = build(backend)
      database.close()

      const error = unwrap_err(await broken.ingest('customers', [customer('Berlin')], { loaded_at: T1, dedupe: 'hash' }))
      expect(error.kind === 'storage_error' && error.operation).toBe('raw.has_hash')
    })
  })
})
