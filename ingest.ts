/**
 * @module Ingest
 * @description Turns extracted rows into fingerprinted raw observations.
 */

import { z } from 'zod'
import type { DedupeMode, Payload, RawObservation, Result, StrataError } from './types'
import { ok } from './types'
import type { EntityDefinition } from './entity'
import { derive_unique_key } from './entity'
import { fingerprint_payload } from './fingerprint'

export const PayloadSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))

export type PrepareOpts = {
  loaded_at: Date
  /**
   * - `none` (default): every row becomes an observation.
   * - `hash`: rows whose content hash is already stored for the entity, or repeats within
   *   the batch, are dropped. A key that reverts to an earlier state is then not recorded.
   */
  dedupe?: DedupeMode
  /** Lookup used by `dedupe: 'hash'` to test hashes already stored. */
  known_hash?: (content_hash: string) => Promise<Result<boolean, StrataError>>
}

export type Prepared = {
  observations: RawObservation[]
  rejected: StrataError[]
  deduplicated: number
}

/**
 * Derives `unique_key`, `content_hash` and `loaded_at` for each extracted row.
 * @category Core
 * @group Ingestion
 *
 * Rows that are not flat JSON-scalar records are rejected with `validation_error`, and
 * rows missing a key column with `missing_key_component`. Neither stops the batch; a failed
 * `known_hash` lookup does, since the row could not be checked for duplicates.
 *
 * @example
 * ```ts
 * const prepared = await prepare_observations(customers, rows, {
 *   loaded_at: unwrap(load_id_to_timestamp(load_id)),
 * })
 * ```
 */
export async function prepare_observations(
  entity: EntityDefinition,
  rows: readonly unknown[],
  opts: PrepareOpts
): Promise<Result<Prepared, StrataError>> {
  const observations: RawObservation[] = []
  const rejected: StrataError[] = []
  const batch_hashes = new Set<string>()
  let deduplicated = 0

  for (const row of rows) {
    const parsed = PayloadSchema.safeParse(row)
    if (!parsed.success) {
      rejected.push({ kind: 'validation_error', cause: parsed.error, message: parsed.error.issues.map(i => i.message).join('; ') })
      continue
    }
    const payload: Payload = parsed.data

    const unique_key = derive_unique_key(entity, payload)
    if (!unique_key.ok) {
      rejected.push(unique_key.error)
      continue
    }

    const content_hash = await fingerprint_payload(entity.columns, payload)

    if (opts.dedupe === 'hash') {
      const stored = opts.known_hash ? await opts.known_hash(content_hash) : ok(false)
      if (!stored.ok) return stored
      if (stored.value || batch_hashes.has(content_hash)) {
        deduplicated++
        continue
      }
      batch_hashes.add(content_hash)
    }

    observations.push({ entity: entity.name, unique_key: unique_key.value, loaded_at: opts.loaded_at, content_hash, payload })
  }

  return ok({ observations, rejected, deduplicated })
}
