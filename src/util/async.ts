/**
 * Promise utilities shared by the probe fan-out and the connection loop.
 */

export class TimeoutError extends Error {
	constructor(label: string, timeout: number) {
		super(`${label} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Race a promise against a timeout. The loser is abandoned, not cancelled;
 * the timer is cleared either way so nothing keeps the process alive.
 */
export const withTimeout = <T>(
	promise: Promise<T>,
	timeout: number,
	label = "Operation",
): Promise<T> => {
	let timer: NodeJS.Timeout | undefined;
	const expiry = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(label, timeout)), timeout);
	});
	return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
};

/**
 * Map over items with at most `limit` calls in flight. Results keep input
 * order; completion order does not matter. A rejection from `fn` rejects the
 * whole map, so callers that want per-item failures settle inside `fn`.
 */
export const mapConcurrent = async <T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
	const results = new Array<R>(items.length);
	let next = 0;

	const worker = async () => {
		while (next < items.length) {
			const index = next++;
			results[index] = await fn(items[index], index);
		}
	};

	const workers = Math.max(1, Math.min(limit, items.length));
	await Promise.all(Array.from({ length: workers }, worker));
	return results;
};

/** Monotonic id source, e.g. for connection log correlation. */
export type Sequence = { readonly next: () => number };

export const createSequence = (start = 0): Sequence => {
	let value = start;
	return { next: () => value++ };
};
