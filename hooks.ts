/**
 * @module Hooks
 * @description Composition and parsing of hooks, the canonical identifiers used as join keys.
 *
 * Grammar:
 * - primary:   `namespace.concept.qualifier|value`
 * - composite: `primary~primary[~primary...]`
 * - pit:       `(primary | composite)~epoch__valid_from|<timestamp>`
 *
 * Keyset parts match `[A-Za-z0-9_]+`. Values are non-empty and never contain `~`.
 * Hook string equality is the only identity test, so every composer here is
 * deterministic and every parser is its exact left-inverse.
 */

import type { Result, StrataError } from "./types";
import { ok, err } from "./types";
import { format_timestamp, is_representable, parse_timestamp } from "./time";

export const COMPONENT_SEPARATOR = "~";
export const VALUE_SEPARATOR = "|";
export const PIT_MARKER = "~epoch__valid_from|";

const KEYSET_PART = /^[A-Za-z0-9_]+$/;
const PRIMARY_PATTERN = /^([A-Za-z0-9_]+)\.([A-Za-z0-9_]+)\.([A-Za-z0-9_]+)\|([^~]+)$/;

export type PrimaryHook = {
	namespace: string;
	concept: string;
	qualifier: string;
	value: string;
};

export type PitHook = {
	/** The primary or composite hook the instant is pinned to. */
	hook: string;
	components: PrimaryHook[];
	valid_from: Date;
};

export type ParsedHook =
	| { type: "primary"; hook: PrimaryHook }
	| { type: "composite"; components: PrimaryHook[] }
	| { type: "pit"; pit: PitHook };

const malformed = (hook: string, reason: string): Result<never, StrataError> => err({ kind: "malformed_hook", hook, reason });

/**
 * Composes a primary hook for a single entity instance.
 * @category Core
 * @group Hooks
 *
 * @example
 * ```ts
 * compose_primary('northwind', 'customer', 'id', 'ALFKI')
 * // => ok('northwind.customer.id|ALFKI')
 * ```
 */
export function compose_primary(namespace: string, concept: string, qualifier: string, value: string): Result<string, StrataError> {
	const keyset = `${namespace}.${concept}.${qualifier}`;
	for (const part of [namespace, concept, qualifier]) {
		if (!KEYSET_PART.test(part)) return malformed(`${keyset}${VALUE_SEPARATOR}${value}`, `invalid keyset part '${part}'`);
	}
	if (value.length === 0) return malformed(`${keyset}${VALUE_SEPARATOR}`, "empty value");
	if (value.includes(COMPONENT_SEPARATOR)) {
		return malformed(`${keyset}${VALUE_SEPARATOR}${value}`, `value contains '${COMPONENT_SEPARATOR}'`);
	}
	return ok(`${keyset}${VALUE_SEPARATOR}${value}`);
}

/**
 * Splits a keyset (`namespace.concept.qualifier`) into its three parts.
 */
export function parse_keyset(keyset: string): Result<[string, string, string], StrataError> {
	const parts = keyset.split(".");
	const [namespace, concept, qualifier] = parts;
	if (parts.length !== 3 || namespace === undefined || concept === undefined || qualifier === undefined) {
		return malformed(keyset, "keyset must have exactly three dot-separated parts");
	}
	if (!parts.every(part => KEYSET_PART.test(part))) return malformed(keyset, "invalid keyset part");
	return ok([namespace, concept, qualifier]);
}

/**
 * Composes a primary hook from a configured keyset and a key value.
 */
export function compose_from_keyset(keyset: string, value: string): Result<string, StrataError> {
	const parts = parse_keyset(keyset);
	if (!parts.ok) return parts;
	return compose_primary(...parts.value, value);
}

export function parse_primary(hook: string): Result<PrimaryHook, StrataError> {
	const found = PRIMARY_PATTERN.exec(hook);
	if (!found) return malformed(hook, "not a primary hook");
	const [, namespace, concept, qualifier, value] = found;
	if (namespace === undefined || concept === undefined || qualifier === undefined || value === undefined) {
		return malformed(hook, "not a primary hook");
	}
	return ok({ namespace, concept, qualifier, value });
}

/**
 * Composes a composite hook for a relationship between entities.
 * @category Core
 * @group Hooks
 *
 * Components are joined in exactly the order given. Each relationship type fixes that
 * order once in its configuration; it is never sorted here, so `[A, B]` and `[B, A]`
 * are different relationships.
 *
 * @example
 * ```ts
 * compose_composite(['northwind.order.id|10248', 'northwind.product.id|11'])
 * // => ok('northwind.order.id|10248~northwind.product.id|11')
 * ```
 */
export function compose_composite(hooks: readonly string[]): Result<string, StrataError> {
	const joined = hooks.join(COMPONENT_SEPARATOR);
	if (hooks.length < 2) return malformed(joined, "composite hook needs at least two components");
	for (const hook of hooks) {
		const parsed = parse_primary(hook);
		if (!parsed.ok) return malformed(joined, `component '${hook}' is not a primary hook`);
	}
	return ok(joined);
}

export function parse_composite(hook: string): Result<PrimaryHook[], StrataError> {
	const parts = hook.split(COMPONENT_SEPARATOR);
	if (parts.length < 2) return malformed(hook, "composite hook needs at least two components");

	const components: PrimaryHook[] = [];
	for (const part of parts) {
		const parsed = parse_primary(part);
		if (!parsed.ok) return malformed(hook, `component '${part}' is not a primary hook`);
		components.push(parsed.value);
	}
	return ok(components);
}

function parse_base(hook: string): Result<PrimaryHook[], StrataError> {
	if (hook.includes(COMPONENT_SEPARATOR)) return parse_composite(hook);
	const primary = parse_primary(hook);
	if (!primary.ok) return primary;
	return ok([primary.value]);
}

/**
 * Pins a primary or composite hook to a validity instant, for as-of lookups.
 * @category Core
 * @group Hooks
 *
 * @example
 * ```ts
 * compose_pit('northwind.customer.id|ALFKI', new Date('2024-01-15T00:00:00.000Z'))
 * // => ok('northwind.customer.id|ALFKI~epoch__valid_from|2024-01-15T00:00:00.000Z')
 * ```
 */
export function compose_pit(hook: string, instant: Date): Result<string, StrataError> {
	if (hook.includes(PIT_MARKER)) return malformed(hook, "hook is already pinned");
	const base = parse_base(hook);
	if (!base.ok) return base;
	if (!is_representable(instant)) return malformed(hook, "instant outside 0000-01-01 to END_OF_TIME");
	return ok(`${hook}${PIT_MARKER}${format_timestamp(instant)}`);
}

export function parse_pit(hook: string): Result<PitHook, StrataError> {
	const at = hook.lastIndexOf(PIT_MARKER);
	if (at <= 0) return malformed(hook, "missing point-in-time suffix");

	const base = hook.slice(0, at);
	const components = parse_base(base);
	if (!components.ok) return malformed(hook, `invalid base hook '${base}'`);

	const instant = parse_timestamp(hook.slice(at + PIT_MARKER.length));
	if (!instant.ok) return malformed(hook, "invalid point-in-time instant");

	return ok({ hook: base, components: components.value, valid_from: instant.value });
}

/**
 * Parses a hook of any variant.
 */
export function parse_hook(hook: string): Result<ParsedHook, StrataError> {
	if (hook.includes(PIT_MARKER)) {
		const pit = parse_pit(hook);
		return pit.ok ? ok({ type: "pit", pit: pit.value }) : pit;
	}
	if (hook.includes(COMPONENT_SEPARATOR)) {
		const components = parse_composite(hook);
		return components.ok ? ok({ type: "composite", components: components.value }) : components;
	}
	const primary = parse_primary(hook);
	return primary.ok ? ok({ type: "primary", hook: primary.value }) : primary;
}
