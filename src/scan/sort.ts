import type { SizedEntry, SortKey } from "./types";

export type EntryComparator = (a: SizedEntry, b: SizedEntry) => number;

/**
 * Build the comparator for a sort key. Size ties always fall back to the path
 * in ascending order, whichever direction the sizes run.
 *
 * @param key - What to order by.
 * @param isReversed - Descending instead of ascending.
 * @returns A comparator usable with `Array#sort`.
 */
export function compareEntries(key: SortKey, isReversed: boolean): EntryComparator {
	const direction = isReversed ? -1 : 1;

	if (key === "name") {
		return (a, b) => direction * comparePaths(a.path, b.path);
	}

	return (a, b) => {
		if (a.sizeBytes !== b.sizeBytes) {
			return direction * (a.sizeBytes < b.sizeBytes ? -1 : 1);
		}

		return comparePaths(a.path, b.path);
	};
}

/** Code-unit order, independent of the current locale. */
export function comparePaths(a: string, b: string): number {
	if (a === b) {
		return 0;
	}

	return a < b ? -1 : 1;
}

/**
 * Return a sorted copy of the entries; the input is left untouched.
 *
 * @example
 *
 * ```ts
 * sortEntries(entries, "size", true); // largest first
 * ```
 */
export function sortEntries(
	entries: ReadonlyArray<SizedEntry>,
	key: SortKey,
	isReversed: boolean,
): Array<SizedEntry> {
	return [...entries].sort(compareEntries(key, isReversed));
}
