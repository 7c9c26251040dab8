/**
 * @module Window
 * @description Change window detection: which keys were touched by a run's window.
 */

import type { RawObservation, Window } from './types'
import { in_window } from './time'

/**
 * Returns the distinct unique keys with at least one observation loaded inside `[start, end)`.
 * @category Core
 * @group Windows
 *
 * Each run examines only the newly arrived slice, so its cost follows arrival volume
 * rather than history size. Pure read.
 *
 * @example
 * ```ts
 * const keys = changed_keys(observations, { start: t0, end: t1 })
 * for (const key of keys) console.log(key)
 * ```
 */
export function changed_keys(observations: Iterable<RawObservation>, window: Window): Set<string> {
  const keys = new Set<string>()
  for (const observation of observations) {
    if (in_window(observation.loaded_at, window)) keys.add(observation.unique_key)
  }
  return keys
}

export type WindowSlices = {
  /** Last observation loaded before the window, if any. */
  preceding: RawObservation | null
  /** Observations loaded inside the window, ascending. */
  inside: RawObservation[]
  /** First observation loaded at or after the window end, if any. */
  following: RawObservation | null
}

/**
 * Splits one key's history, already sorted by `loaded_at` ascending, around a window.
 */
export function slice_history(sorted: readonly RawObservation[], window: Window): WindowSlices {
  const start = window.start.getTime()
  const end = window.end.getTime()

  let preceding: RawObservation | null = null
  let following: RawObservation | null = null
  const inside: RawObservation[] = []

  for (const observation of sorted) {
    const t = observation.loaded_at.getTime()
    if (t < start) preceding = observation
    else if (t < end) inside.push(observation)
    else if (following === null) following = observation
  }

  return { preceding, inside, following }
}
