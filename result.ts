/**
 * @module Result
 * @description Extended utilities for working with Result types.
 *
 * Provides functional utilities for error handling without exceptions:
 * - Pattern matching with `match`
 * - Safe unwrapping with `unwrap_or`, `unwrap`, `unwrap_err`
 * - Exception-to-Result conversion with `try_catch`, `try_catch_async`
 * - Array access with `first`, `last`
 */

import { ok, err, type Result } from "./types";

/**
 * Pattern match on a Result, extracting the value with appropriate handler.
 *
 * @example
 * ```ts
 * const label = match(
 *   parse_primary(hook),
 *   parts => `${parts.concept}:${parts.value}`,
 *   error => `malformed (${error.kind})`
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, returning default if error.
 *
 * @example
 * ```ts
 * const keys = unwrap_or(await backend.raw.changed_keys('customers', window), new Set<string>())
 * ```
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 *
 * @throws Error if Result is an error
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 *
 * @throws Error if Result is Ok
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Execute a function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = try_catch(
 *   () => JSON.parse(input),
 *   e => ({ kind: 'invalid_config', message: format_error(e) })
 * )
 * ```
 */
export const try_catch = <T, E>(fn: () => T, on_error: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Execute an async function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = await try_catch_async(
 *   () => readFile(path, 'utf8'),
 *   e => ({ kind: 'invalid_config', message: format_error(e) })
 * )
 * ```
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Extract value from Result, returning null for any error.
 * Use for "fetch single resource" patterns where not-found is expected.
 */
export const to_nullable = <T, E>(result: Result<T, E>): T | null => (result.ok ? result.value : null);

/**
 * First element of an array, or an error for an empty array.
 */
export const first = <T>(items: readonly T[]): Result<T, "empty"> => {
	const item = items[0];
	return item === undefined ? err("empty") : ok(item);
};

/**
 * Last element of an array, or an error for an empty array.
 */
export const last = <T>(items: readonly T[]): Result<T, "empty"> => {
	const item = items[items.length - 1];
	return item === undefined ? err("empty") : ok(item);
};

/**
 * Format an unknown error to a string message.
 *
 * @example
 * ```ts
 * format_error(new Error('disk full')) // => 'disk full'
 * format_error('oops')                 // => 'oops'
 * ```
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Normalize an unknown thrown value to an Error instance.
 */
export const to_error = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
