/**
 * @module Concurrency
 * @description Bounded fan-out for per-key work within a run.
 */

import type { Result } from "./types";

/**
 * Semaphore for controlling concurrent operations.
 *
 * Callers acquire a permit before proceeding; when all permits are taken, further
 * acquires wait in FIFO order until one is released.
 *
 * @example
 * ```ts
 * const semaphore = new Semaphore(4)
 * await semaphore.acquire()
 * try {
 *   await rebuild(raw, entity, key, window)
 * } finally {
 *   semaphore.release()
 * }
 * ```
 */
export class Semaphore {
	private permits: number;
	private waiting: Array<() => void> = [];

	constructor(permits: number) {
		this.permits = Math.max(1, Math.floor(permits));
	}

	async acquire(): Promise<void> {
		if (this.permits > 0) {
			this.permits--;
			return;
		}
		return new Promise<void>(resolve => {
			this.waiting.push(resolve);
		});
	}

	release(): void {
		const next = this.waiting.shift();
		if (next) {
			next();
		} else {
			this.permits++;
		}
	}
}

/**
 * Map over items with at most `concurrency` mappers in flight. Results keep input order.
 *
 * Keys within a run are independent, so they are rebuilt this way; the bound keeps the
 * number of history slices held in memory at once small.
 *
 * @example
 * ```ts
 * const results = await parallel_map([...keys], key => rebuild(raw, 'customers', key, window), 8)
 * ```
 */
export const parallel_map = async <T, R>(items: readonly T[], mapper: (item: T, index: number) => Promise<R>, concurrency: number): Promise<R[]> => {
	const semaphore = new Semaphore(concurrency);
	const results: R[] = new Array(items.length);

	await Promise.all(
		items.map(async (item, index) => {
			await semaphore.acquire();
			try {
				results[index] = await mapper(item, index);
			} finally {
				semaphore.release();
			}
		})
	);

	return results;
};

/**
 * Splits Results into their values and errors, each in input order.
 */
export const partition_results = <T, E>(results: readonly Result<T, E>[]): { values: T[]; errors: E[] } => {
	const values: T[] = [];
	const errors: E[] = [];
	for (const result of results) {
		if (result.ok) values.push(result.value);
		else errors.push(result.error);
	}
	return { values, errors };
};
