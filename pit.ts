/**
 * @module PointInTime
 * @description As-of lookups over versioned rows and event unpivoting of bridge rows.
 */

import type { BridgeRow, Value } from './types'
import type { BridgeEvent } from './bridge'

type Interval = { valid_from: Date; valid_to: Date }

/**
 * Rows valid at `instant`, i.e. `valid_from <= instant < valid_to`.
 *
 * @example
 * ```ts
 * const then = as_of(versions, new Date('2024-03-01T00:00:00.000Z'))
 * ```
 */
export function as_of<T extends Interval>(rows: Iterable<T>, instant: Date): T[] {
  const t = instant.getTime()
  const found: T[] = []
  for (const row of rows) {
    if (row.valid_from.getTime() <= t && t < row.valid_to.getTime()) found.push(row)
  }
  return found
}

/**
 * The row carrying exactly `pit_hook`, compared byte for byte.
 */
export function find_by_pit<T extends { pit_hook: string | null }>(rows: Iterable<T>, pit_hook: string): T | null {
  for (const row of rows) {
    if (row.pit_hook === pit_hook) return row
  }
  return null
}

export type EventRow = BridgeRow & {
  event: string
  event_occurred_at: Date
}

function to_instant(value: Value | undefined): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null
  const instant = new Date(value)
  return Number.isNaN(instant.getTime()) ? null : instant
}

/**
 * One row per bridge row and configured event whose column holds an instant. Rows where
 * the column is null or not a date are skipped for that event.
 */
export function unpivot_events(rows: Iterable<BridgeRow>, events: readonly BridgeEvent[]): EventRow[] {
  const out: EventRow[] = []
  for (const row of rows) {
    for (const event of events) {
      const occurred = to_instant(row.attributes[event.column])
      if (occurred === null) continue
      out.push({ ...row, event: event.name, event_occurred_at: occurred })
    }
  }
  return out
}
