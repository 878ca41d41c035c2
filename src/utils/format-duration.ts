const MS_PER_SECOND = 1000;

/**
 * Format the time elapsed since `startTime`: milliseconds below one second,
 * tenths of a second above.
 *
 * @example
 *
 * ```ts
 * const startTime = performance.now();
 * await runScan(config, collaborators);
 * formatDuration(startTime); // "1.2s"
 * ```
 *
 * @param startTime - A `performance.now()` reading.
 * @param endTime - Defaults to now.
 */
export function formatDuration(startTime: number, endTime: number = performance.now()): string {
	const elapsed = Math.max(0, endTime - startTime);
	if (elapsed < MS_PER_SECOND) {
		return `${Math.round(elapsed)}ms`;
	}

	return `${(elapsed / MS_PER_SECOND).toFixed(1)}s`;
}
