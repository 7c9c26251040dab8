/**
 * @module Config
 * @description Warehouse configuration documents: entities, bridges and run defaults.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { Result, StrataError } from './types'
import { ok, err } from './types'
import { EntityDefinitionSchema } from './entity'
import type { EntityDefinition } from './entity'
import { BridgeDefinitionSchema } from './bridge'
import type { BridgeDefinition } from './bridge'
import { format_error, try_catch, try_catch_async } from './result'

export const RunDefaultsSchema = z.object({
  boundaries: z.enum(['lagged', 'contiguous']).default('lagged'),
  compaction: z.enum(['none', 'consecutive']).default('none'),
  dedupe: z.enum(['none', 'hash']).default('none'),
  /** Keys rebuilt at once within a run. */
  concurrency: z.number().int().positive().default(8),
  /** Retained history horizon, ISO 8601. Observations loaded earlier are not read. */
  history_since: z
    .string()
    .datetime()
    .transform(text => new Date(text))
    .optional(),
})

export const WarehouseConfigSchema = z
  .object({
    entities: z.array(EntityDefinitionSchema).min(1),
    bridges: z.array(BridgeDefinitionSchema).default([]),
    defaults: RunDefaultsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const names = new Set<string>()
    for (const entity of config.entities) {
      if (names.has(entity.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate entity '${entity.name}'`, path: ['entities'] })
      }
      names.add(entity.name)
    }

    const bridges = new Set<string>()
    for (const bridge of config.bridges) {
      if (bridges.has(bridge.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate bridge '${bridge.name}'`, path: ['bridges'] })
      }
      bridges.add(bridge.name)
      for (const entity of [bridge.frame, ...bridge.joins.map(j => j.entity)]) {
        if (!names.has(entity)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bridge '${bridge.name}' references unknown entity '${entity}'`, path: ['bridges'] })
        }
      }
    }
  })

export type RunDefaults = z.infer<typeof RunDefaultsSchema>
export type RunDefaultsInput = z.input<typeof RunDefaultsSchema>

export type WarehouseConfig = {
  entities: readonly EntityDefinition[]
  bridges: readonly BridgeDefinition[]
  defaults: RunDefaults
}

const describe_issues = (error: z.ZodError): string =>
  error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ')

/**
 * Validates a parsed configuration document.
 * @category Core
 * @group Configuration
 *
 * Definitions come back frozen, the same as from `define_entity()` and `define_bridge()`.
 *
 * @example
 * ```ts
 * const config = parse_warehouse_config({
 *   entities: [{ name: 'customers', unique_key: ['id'], columns: ['id', 'name'],
 *     hooks: [{ name: '_hook__customer__id', keyset: 'shop.customer.id', column: 'id', primary: true }] }],
 *   defaults: { concurrency: 4 },
 * })
 * ```
 */
export function parse_warehouse_config(raw: unknown): Result<WarehouseConfig, StrataError> {
  const parsed = WarehouseConfigSchema.safeParse(raw)
  if (!parsed.success) return err({ kind: 'invalid_config', message: describe_issues(parsed.error) })

  return ok({
    entities: parsed.data.entities.map(entity => Object.freeze(entity)),
    bridges: parsed.data.bridges.map(bridge => Object.freeze(bridge)),
    defaults: parsed.data.defaults,
  })
}

/**
 * Reads and validates a JSON configuration file.
 */
export async function load_warehouse_config(path: string): Promise<Result<WarehouseConfig, StrataError>> {
  const text = await try_catch_async(
    () => readFile(path, 'utf8'),
    (e): StrataError => ({ kind: 'invalid_config', message: `cannot read ${path}: ${format_error(e)}` })
  )
  if (!text.ok) return text

  const json = try_catch(
    (): unknown => JSON.parse(text.value),
    (e): StrataError => ({ kind: 'invalid_config', message: `${path} is not valid JSON: ${format_error(e)}` })
  )
  if (!json.ok) return json

  return parse_warehouse_config(json.value)
}
