/**
 * @module Concurrency
 * @description Bounded concurrency for the refresh loop.
 */

/**
 * Counting semaphore. `acquire` resolves once a permit is free; waiters are
 * served in arrival order.
 */
export class Semaphore {
	private permits: number;
	private waiting: Array<() => void> = [];

	constructor(permits: number) {
		this.permits = permits;
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

	/**
	 * Hand the permit to the next waiter, or return it to the pool.
	 */
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
 * Map over an array with at most `concurrency` mappers in flight.
 * Results keep the input order. A limit below 1 (or not an integer) runs one at a time.
 *
 * @example
 * ```ts
 * // Fetch saved locations two at a time
 * const outcomes = await parallel_map(saved, location => fetcher.fetch_current(location), 2)
 * ```
 */
export const parallel_map = async <T, R>(items: readonly T[], mapper: (item: T, index: number) => Promise<R>, concurrency: number): Promise<R[]> => {
	const limit = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : 1;
	const semaphore = new Semaphore(limit);
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
