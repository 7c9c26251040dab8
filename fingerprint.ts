/**
 * @module Fingerprint
 * @description Stable content hashes used as the change-equality test between observations.
 */

import { webcrypto } from 'node:crypto'
import type { Payload, Value } from './types'

/**
 * Computes the SHA-256 hash of text or binary data.
 * @category Utilities
 * @group Hashing
 *
 * Returns a lowercase hexadecimal string (64 characters).
 *
 * @example
 * ```ts
 * await compute_hash('Hello, world!')
 * // => '315f5bdb76d078c43b8ac0064e4a0164612b1fce77c869345bfc94c75894edd3'
 * ```
 */
export async function compute_hash(data: string | Uint8Array): Promise<string> {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data
  const hash_buffer = await webcrypto.subtle.digest('SHA-256', bytes)
  const hash_array = new Uint8Array(hash_buffer)
  return Array.from(hash_array).map(b => b.toString(16).padStart(2, '0')).join('')
}

/**
 * Fingerprints an ordered list of `(name, value)` attributes.
 * @category Core
 * @group Hashing
 *
 * The pairs are serialized as a JSON array, which keeps names, values and nulls
 * unambiguous (`'a|b', 'c'` and `'a', 'b|c'` serialize differently). Attribute order
 * is part of the fingerprint; entities fix it once at configuration time.
 *
 * Two different payloads mapping to one hash would be read as "no change". There is no
 * detection path for that; with SHA-256 it is accepted as a risk.
 */
export async function fingerprint(attributes: ReadonlyArray<readonly [string, Value]>): Promise<string> {
  const canonical = JSON.stringify(attributes.map(([name, value]) => [name, value]))
  return compute_hash(canonical)
}

/**
 * Fingerprints `payload` over an entity's static column list. Columns absent from the
 * payload count as null, so adding a column to a definition changes the hash domain for
 * future observations while stored hashes stay as they were.
 */
export async function fingerprint_payload(columns: readonly string[], payload: Payload): Promise<string> {
  return fingerprint(columns.map(column => [column, payload[column] ?? null] as const))
}
