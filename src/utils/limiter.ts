export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Cap how many async tasks run at once. Each call returns a limiter with its
 * own queue, so separate runs never share slots.
 *
 * @example
 *
 * ```ts
 * const limit = createLimiter(8);
 * const sizes = await Promise.all(paths.map(async (p) => limit(async () => measure(p))));
 * ```
 *
 * @param concurrency - Maximum number of tasks in flight (at least 1).
 * @returns A function that runs a task once a slot is free.
 */
export function createLimiter(concurrency: number): Limiter {
	const maxActive = Math.max(1, Math.floor(concurrency));
	const queue: Array<() => void> = [];
	let active = 0;

	async function acquire(): Promise<void> {
		if (active < maxActive) {
			active++;
			return;
		}

		await new Promise<void>((resolve) => {
			queue.push(resolve);
		});
	}

	function release(): void {
		const next = queue.shift();
		if (next) {
			next();
		} else {
			active--;
		}
	}

	return async <T>(task: () => Promise<T>): Promise<T> => {
		await acquire();
		try {
			return await task();
		} finally {
			release();
		}
	};
}
