/**
 * @module Entity
 * @description Entity definitions, unique key derivation and hook application.
 */

import { z } from 'zod'
import type { HookedRecord, Payload, Result, StrataError, Value, VersionedRecord } from './types'
import { ok, err } from './types'
import { compose_composite, compose_from_keyset, compose_pit, parse_keyset } from './hooks'

const IdentifierSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier')

export const HookDefinitionSchema = z.object({
  name: IdentifierSchema,
  /** `namespace.concept.qualifier` */
  keyset: z.string().min(1),
  /** Payload column holding the key value. */
  column: z.string().min(1),
  primary: z.boolean().default(false),
})

export const CompositeHookDefinitionSchema = z.object({
  name: IdentifierSchema,
  /** Component hook names, in the fixed order this relationship is always composed in. */
  hooks: z.array(IdentifierSchema).min(2),
  primary: z.boolean().default(false),
})

export const EntityDefinitionSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9_]+$/, 'must be alphanumeric or underscore'),
    unique_key: z.array(z.string().min(1)).min(1),
    columns: z.array(z.string().min(1)).min(1),
    hooks: z.array(HookDefinitionSchema).default([]),
    composite_hooks: z.array(CompositeHookDefinitionSchema).default([]),
  })
  .superRefine((entity, ctx) => {
    const columns = new Set(entity.columns)
    if (columns.size !== entity.columns.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'columns must be unique', path: ['columns'] })
    }
    for (const column of entity.unique_key) {
      if (!columns.has(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unique_key column '${column}' is not a declared column`, path: ['unique_key'] })
      }
    }

    const names = new Set<string>()
    for (const hook of [...entity.hooks, ...entity.composite_hooks]) {
      if (names.has(hook.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate hook name '${hook.name}'`, path: ['hooks'] })
      }
      names.add(hook.name)
    }

    for (const hook of entity.hooks) {
      if (!parse_keyset(hook.keyset).ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `hook '${hook.name}' has an invalid keyset '${hook.keyset}'`, path: ['hooks'] })
      }
    }

    const primitive = new Set(entity.hooks.map(h => h.name))
    for (const composite of entity.composite_hooks) {
      for (const part of composite.hooks) {
        if (!primitive.has(part)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `composite hook '${composite.name}' references unknown hook '${part}'`, path: ['composite_hooks'] })
        }
      }
    }

    const primaries = [...entity.hooks, ...entity.composite_hooks].filter(h => h.primary)
    if (primaries.length !== 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected exactly one primary hook, found ${primaries.length}`, path: ['hooks'] })
    }
  })

export type HookDefinition = z.infer<typeof HookDefinitionSchema>
export type CompositeHookDefinition = z.infer<typeof CompositeHookDefinitionSchema>
export type EntityDefinition = Readonly<z.infer<typeof EntityDefinitionSchema>>
export type EntityDefinitionInput = z.input<typeof EntityDefinitionSchema>

/**
 * Validates and freezes an entity definition.
 * @category Core
 * @group Definitions
 *
 * An entity is configured once at process start: its unique key columns, the static
 * column list its fingerprint covers, and the hooks composed from its payload. The
 * engine is a generic function over this record.
 *
 * @example
 * ```ts
 * const customers = define_entity({
 *   name: 'northwind__customers',
 *   unique_key: ['customer_id'],
 *   columns: ['customer_id', 'company_name', 'city'],
 *   hooks: [{ name: '_hook__customer__id', keyset: 'northwind.customer.id', column: 'customer_id', primary: true }],
 * })
 * ```
 */
export function define_entity(input: EntityDefinitionInput): Result<EntityDefinition, StrataError> {
  const parsed = EntityDefinitionSchema.safeParse(input)
  if (!parsed.success) {
    return err({ kind: 'validation_error', cause: parsed.error, message: parsed.error.issues.map(i => i.message).join('; ') })
  }
  return ok(Object.freeze(parsed.data))
}

/** Name of the entity's primary hook (plain or composite). */
export function primary_hook_name(entity: EntityDefinition): string {
  const primary = [...entity.hooks, ...entity.composite_hooks].find(h => h.primary)
  return primary?.name ?? ''
}

export const pit_hook_name = (hook_name: string): string => `_pit${hook_name}`

export const entity_suffix = (entity: EntityDefinition | string): string =>
  `__${typeof entity === 'string' ? entity : entity.name}`

export function value_to_text(value: Value): string {
  return typeof value === 'string' ? value : String(value)
}

const is_missing = (value: Value | undefined): value is null | undefined | '' =>
  value === null || value === undefined || value === ''

/**
 * Derives an observation's unique key: the key columns' text joined by `|`.
 */
export function derive_unique_key(entity: EntityDefinition, payload: Payload): Result<string, StrataError> {
  const parts: string[] = []
  for (const column of entity.unique_key) {
    const value = payload[column]
    if (is_missing(value)) return err({ kind: 'missing_key_component', entity: entity.name, column })
    parts.push(value_to_text(value))
  }
  return ok(parts.join('|'))
}

export type HookApplication = {
  record: HookedRecord
  /** Errors for the hooks that could not be composed; empty when the record is fully resolved. */
  quarantined: StrataError[]
}

/**
 * Composes every configured hook for a versioned record.
 * @category Core
 * @group Hooks
 *
 * A hook whose column is null or absent is left out of `hooks` and reported as
 * `missing_hook_component`; the record itself is kept. Composite hooks need all of
 * their components, and the point-in-time hook needs the primary hook.
 */
export function apply_hooks(entity: EntityDefinition, record: VersionedRecord): HookApplication {
  const hooks: Record<string, string> = {}
  const quarantined: StrataError[] = []
  const base = { entity: entity.name, unique_key: record.unique_key }

  for (const hook of entity.hooks) {
    const value = record.payload[hook.column]
    if (is_missing(value)) {
      quarantined.push({ kind: 'missing_hook_component', ...base, hook: hook.name, component: hook.column })
      continue
    }
    const composed = compose_from_keyset(hook.keyset, value_to_text(value))
    if (!composed.ok) {
      quarantined.push(composed.error)
      continue
    }
    hooks[hook.name] = composed.value
  }

  for (const composite of entity.composite_hooks) {
    const missing = composite.hooks.find(name => hooks[name] === undefined)
    if (missing !== undefined) {
      quarantined.push({ kind: 'missing_hook_component', ...base, hook: composite.name, component: missing })
      continue
    }
    const composed = compose_composite(composite.hooks.map(name => hooks[name] ?? ''))
    if (!composed.ok) {
      quarantined.push(composed.error)
      continue
    }
    hooks[composite.name] = composed.value
  }

  const primary = hooks[primary_hook_name(entity)]
  const pit = primary === undefined ? null : compose_pit(primary, record.valid_from)
  const pit_hook = pit !== null && pit.ok ? pit.value : null

  return { record: { ...record, hooks, pit_hook }, quarantined }
}

/**
 * Derives a static column list from sample rows, once, at configuration time.
 * Columns are returned in first-seen order; metadata columns (by default those with a
 * leading underscore, as loaders add) are left out of the fingerprint domain.
 */
export function introspect_columns(rows: readonly Payload[], opts: { exclude_prefix?: string } = {}): string[] {
  const prefix = opts.exclude_prefix ?? '_'
  const seen = new Set<string>()
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      if (prefix !== '' && column.startsWith(prefix)) continue
      seen.add(column)
    }
  }
  return [...seen]
}
