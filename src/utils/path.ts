import path from "node:path";

/**
 * Remove trailing separators, keeping a bare root intact.
 *
 * @param target - The path to normalize.
 * @returns The path without trailing separators.
 */
export function stripTrailingSeparator(target: string): string {
	let end = target.length;
	while (end > 1 && target[end - 1] === path.sep) {
		end--;
	}

	return target.slice(0, end);
}

/**
 * Separator-aware containment check, so `/data2/foo` is not inside `/data`.
 *
 * @param candidate - The path being tested.
 * @param ancestor - The path that may contain it.
 * @returns True if `candidate` equals `ancestor` or lies below it.
 */
export function isSameOrDescendant(candidate: string, ancestor: string): boolean {
	if (candidate === ancestor) {
		return true;
	}

	const prefix = ancestor.endsWith(path.sep) ? ancestor : `${ancestor}${path.sep}`;
	return candidate.startsWith(prefix);
}

/**
 * Number of separators between `root` and `target`; the root itself is 0.
 *
 * @param root - The scan root.
 * @param target - A path equal to or below the root.
 * @returns The depth of `target` below `root`.
 */
export function depthBelow(root: string, target: string): number {
	const relative = path.relative(root, target);
	return relative === "" ? 0 : relative.split(path.sep).length;
}

/**
 * Paths leading from just below `root` down to `target`, in that order.
 *
 * @example
 *
 * ```ts
 * ancestorChain("/r", "/r/x/y"); // ["/r/x", "/r/x/y"]
 * ```
 *
 * @param root - The scan root.
 * @param target - A path below the root.
 * @returns Each intermediate path, ending with `target` itself.
 */
export function ancestorChain(root: string, target: string): Array<string> {
	const relative = path.relative(root, target);
	if (relative === "") {
		return [];
	}

	const chain: Array<string> = [];
	let current = root;
	for (const part of relative.split(path.sep)) {
		current = path.join(current, part);
		chain.push(current);
	}

	return chain;
}

/**
 * Components of `target` that lie below `root`, or all of them without a root.
 *
 * @param target - Absolute path.
 * @param root - Optional scan root.
 * @returns The path components.
 */
export function componentsBelow(target: string, root?: string): Array<string> {
	const scoped =
		root !== undefined && isSameOrDescendant(target, root) ? path.relative(root, target) : target;
	return scoped.split(path.sep).filter((part) => part.length > 0);
}
