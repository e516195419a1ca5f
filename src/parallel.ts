/**
 * Simple concurrency limiter for parallel operations.
 * Limits the number of concurrent promises to avoid overwhelming the network and filesystem.
 * Results keep the order of `items`.
 */
export async function parallelLimit<T, R>(items: readonly T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
	const results: R[] = new Array(items.length);
	// Shared iterator: each worker pulls the next pending item
	const pending = items.entries();

	async function worker(): Promise<void> {
		for (const [index, item] of pending) {
			results[index] = await fn(item, index);
		}
	}

	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
	await Promise.all(workers);
	return results;
}
