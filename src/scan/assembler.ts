import path from "node:path";

import { compareEntries } from "./sort";
import type { ScanConfig, SizedEntry } from "./types";

/** Parent marker for top-level tree nodes. */
export const ROOT_SENTINEL: unique symbol = Symbol("dirscope.root");

export type ParentRef = string | typeof ROOT_SENTINEL;

export interface TreeNode {
	readonly children: Array<TreeNode>;
	readonly entry: SizedEntry;
	readonly parentPath: ParentRef;
}

export interface EmittedNode {
	/** For each ancestor level, whether that ancestor was the last sibling. */
	readonly ancestorsLast: ReadonlyArray<boolean>;
	readonly entry: SizedEntry;
	readonly isLast: boolean;
	/** Nesting level in the emitted tree; top-level nodes are 0. */
	readonly level: number;
	readonly parentPath: ParentRef;
}

type AssemblerConfig = Pick<ScanConfig, "reverse" | "root" | "sortKey">;

export function assembleFlat(entries: ReadonlyArray<SizedEntry>): ReadonlyArray<SizedEntry> {
	return entries;
}

/**
 * Group entries under their parents and sort every sibling group.
 *
 * An entry whose parent directory is not in the set is attached to the root
 * node, or becomes a top-level node when the root itself was filtered out.
 * No entry is ever dropped.
 *
 * @param entries - The filtered entries, in any order.
 * @param config - Supplies the root and the sort order.
 * @returns The top-level nodes, sorted.
 */
export function assembleTree(
	entries: ReadonlyArray<SizedEntry>,
	config: AssemblerConfig,
): Array<TreeNode> {
	const byPath = new Map<string, SizedEntry>();
	for (const entry of entries) {
		byPath.set(entry.path, entry);
	}

	const hasRoot = byPath.has(config.root);
	const groups = new Map<ParentRef, Array<SizedEntry>>();

	for (const entry of byPath.values()) {
		const parent = resolveParent(entry.path, config.root, byPath, hasRoot);
		const group = groups.get(parent);
		if (group) {
			group.push(entry);
		} else {
			groups.set(parent, [entry]);
		}
	}

	const compare = compareEntries(config.sortKey, config.reverse);
	for (const group of groups.values()) {
		group.sort(compare);
	}

	return buildNodes(ROOT_SENTINEL, groups);
}

/**
 * Flatten a forest into depth-first pre-order.
 *
 * @param forest - Top-level nodes, already sorted.
 * @returns Every node once, parents before their children.
 */
export function emitTree(forest: ReadonlyArray<TreeNode>): Array<EmittedNode> {
	const emitted: Array<EmittedNode> = [];
	const stack: Array<Omit<EmittedNode, "entry" | "parentPath"> & { node: TreeNode }> = [];

	pushChildren(stack, forest, 0, []);

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		const { ancestorsLast, isLast, level, node } = frame;
		emitted.push({ ancestorsLast, entry: node.entry, isLast, level, parentPath: node.parentPath });
		pushChildren(stack, node.children, level + 1, [...ancestorsLast, isLast]);
	}

	return emitted;
}

function buildNodes(
	parent: ParentRef,
	groups: ReadonlyMap<ParentRef, ReadonlyArray<SizedEntry>>,
): Array<TreeNode> {
	// Built iteratively; directory depth is unbounded.
	const top = (groups.get(parent) ?? []).map((entry) => createNode(entry, parent));
	const pending = [...top];

	for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
		for (const child of groups.get(node.entry.path) ?? []) {
			const childNode = createNode(child, node.entry.path);
			node.children.push(childNode);
			pending.push(childNode);
		}
	}

	return top;
}

function createNode(entry: SizedEntry, parentPath: ParentRef): TreeNode {
	return { children: [], entry, parentPath };
}

function pushChildren(
	stack: Array<Omit<EmittedNode, "entry" | "parentPath"> & { node: TreeNode }>,
	children: ReadonlyArray<TreeNode>,
	level: number,
	ancestorsLast: ReadonlyArray<boolean>,
): void {
	for (let index = children.length - 1; index >= 0; index--) {
		const node = children[index];
		if (node === undefined) {
			continue;
		}

		stack.push({ ancestorsLast, isLast: index === children.length - 1, level, node });
	}
}

function resolveParent(
	entryPath: string,
	root: string,
	byPath: ReadonlyMap<string, SizedEntry>,
	hasRoot: boolean,
): ParentRef {
	if (entryPath === root) {
		return ROOT_SENTINEL;
	}

	const parent = path.dirname(entryPath);
	if (byPath.has(parent)) {
		return parent;
	}

	return hasRoot ? root : ROOT_SENTINEL;
}
