/**
 * @module Time
 * @description Timestamp sentinels, canonical formatting and processing windows.
 */

import type { Result, StrataError, Window } from './types'
import { ok, err } from './types'

/** Lower sentinel: `valid_from` of a key's first version. */
export const EPOCH = new Date('1970-01-01T00:00:00.000Z')

/** Upper sentinel: `valid_to` of a key's open-ended version. */
export const END_OF_TIME = new Date('9999-12-31T23:59:59.000Z')

/** Earliest instant `format_timestamp` writes with a four-digit year. */
export const MIN_TIMESTAMP = new Date('0000-01-01T00:00:00.000Z')

/**
 * Whether an instant lies in `[MIN_TIMESTAMP, END_OF_TIME]`, the range whose canonical text
 * `parse_timestamp` reads back.
 */
export function is_representable(instant: Date): boolean {
  const t = instant.getTime()
  return !Number.isNaN(t) && t >= MIN_TIMESTAMP.getTime() && t <= END_OF_TIME.getTime()
}

/**
 * Formats an instant in the canonical textual form used inside hooks and storage.
 * @category Utilities
 * @group Time
 *
 * ISO 8601 in UTC with millisecond precision. For years 0000-9999 the text sorts
 * lexicographically in chronological order, which is what lets storage compare
 * timestamps as strings.
 *
 * @example
 * ```ts
 * format_timestamp(new Date(Date.UTC(2024, 0, 15, 10, 30))) // => '2024-01-15T10:30:00.000Z'
 * ```
 */
export function format_timestamp(instant: Date): string {
  return instant.toISOString()
}

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/

/**
 * Parses the canonical form produced by `format_timestamp`. Any other shape is rejected,
 * so that a parsed instant always formats back to the same text.
 */
export function parse_timestamp(text: string): Result<Date, StrataError> {
  if (!TIMESTAMP_PATTERN.test(text)) return err({ kind: 'invalid_timestamp', value: text })
  const instant = new Date(text)
  if (Number.isNaN(instant.getTime()) || instant.toISOString() !== text) {
    return err({ kind: 'invalid_timestamp', value: text })
  }
  return ok(instant)
}

/**
 * Converts an extraction load id (seconds since the epoch, possibly fractional) to the
 * instant used as `loaded_at`. Sub-millisecond precision is rounded away.
 *
 * @example
 * ```ts
 * load_id_to_timestamp('1724152321.5') // => ok(2024-08-20T11:12:01.500Z)
 * ```
 */
export function load_id_to_timestamp(load_id: string | number): Result<Date, StrataError> {
  const seconds = typeof load_id === 'number' ? load_id : Number(load_id.trim())
  if (!Number.isFinite(seconds) || (typeof load_id === 'string' && load_id.trim() === '')) {
    return err({ kind: 'invalid_timestamp', value: String(load_id) })
  }
  const instant = new Date(Math.round(seconds * 1000))
  if (!is_representable(instant)) return err({ kind: 'invalid_timestamp', value: String(load_id) })
  return ok(instant)
}

/**
 * Creates a half-open processing window `[start, end)`.
 */
export function create_window(start: Date, end: Date): Result<Window, StrataError> {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start.getTime() >= end.getTime()) {
    return err({ kind: 'invalid_window', start, end })
  }
  return ok({ start, end })
}

export function in_window(instant: Date, window: Window): boolean {
  const t = instant.getTime()
  return t >= window.start.getTime() && t < window.end.getTime()
}

export const max_date = (a: Date, b: Date): Date => (a.getTime() >= b.getTime() ? a : b)
export const min_date = (a: Date, b: Date): Date => (a.getTime() <= b.getTime() ? a : b)
