import { isExempt } from "./inclusion";
import type { ScanConfig, SizedEntry } from "./types";

type FilterConfig = Pick<
	ScanConfig,
	"all" | "blacklist" | "cut" | "minSize" | "root" | "whitelist" | "whitelistPaths"
>;

/**
 * Drop measured directories smaller than `minSize`. Files are never pruned
 * here, and `all` disables the prune entirely.
 *
 * @param entries - Measured entries, in any order.
 * @param config - The run's configuration.
 * @returns The surviving entries in their original order.
 */
export function pruneBelowMinSize(
	entries: ReadonlyArray<SizedEntry>,
	config: FilterConfig,
): Array<SizedEntry> {
	if (config.all || config.minSize === 0) {
		return [...entries];
	}

	return entries.filter(
		(entry) =>
			entry.type !== "directory" ||
			entry.sizeBytes >= config.minSize ||
			isProtected(entry, config),
	);
}

/**
 * Drop entries smaller than `cut`. Applies regardless of `all`.
 *
 * @param entries - Sorted entries.
 * @param config - The run's configuration.
 * @returns The surviving entries, order preserved.
 */
export function applyCut(
	entries: ReadonlyArray<SizedEntry>,
	config: FilterConfig,
): Array<SizedEntry> {
	if (config.cut === 0) {
		return [...entries];
	}

	return entries.filter((entry) => entry.sizeBytes >= config.cut || isProtected(entry, config));
}

function isProtected(entry: SizedEntry, config: FilterConfig): boolean {
	return entry.connector || isExempt(entry.path, config);
}
