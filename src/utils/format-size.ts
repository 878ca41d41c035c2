const UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"] as const;

/**
 * Format a byte count with binary units.
 *
 * @example
 *
 * ```ts
 * formatSize(512); // "512 B"
 * formatSize(2 * 1024 * 1024); // "2.00 MiB"
 * ```
 *
 * @param sizeBytes - Non-negative byte count.
 * @returns Human-readable size.
 */
export function formatSize(sizeBytes: number): string {
	if (sizeBytes < 1024) {
		return `${sizeBytes} B`;
	}

	let unitIndex = 0;
	let value = sizeBytes;
	while (value >= 1024 && unitIndex < UNITS.length - 1) {
		value /= 1024;
		unitIndex++;
	}

	// 1023.999 KiB rounds to "1024.00 KiB"; bump it to the next unit
	if (Number(value.toFixed(2)) >= 1024 && unitIndex < UNITS.length - 1) {
		value /= 1024;
		unitIndex++;
	}

	return `${value.toFixed(2)} ${UNITS[unitIndex] ?? "B"}`;
}
