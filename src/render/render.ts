import ansis from "ansis";
import path from "node:path";

import type { EmittedNode } from "../scan/assembler";
import type { SizedEntry } from "../scan/types";
import { formatSize } from "../utils/format-size";

export type PathFormat = "absolute" | "basename" | "relative";

export interface RenderOptions {
	readonly format: PathFormat;
	/** Print raw byte counts instead of binary units. */
	readonly isBytes: boolean;
	readonly isColorEnabled: boolean;
	readonly root: string;
}

/** Width the size column is padded to. */
export const SIZE_COLUMN_WIDTH = 12;

const BRANCH = "├── ";
const LAST_BRANCH = "└── ";
const PIPE = "│   ";
const SPACE = "    ";

/** One line per entry: size column, two spaces, then the path. */
export function renderFlat(
	entries: ReadonlyArray<SizedEntry>,
	options: RenderOptions,
): Array<string> {
	return entries.map((entry) => {
		const name = formatPath(entry.path, options);
		return `${sizeColumn(entry.sizeBytes, options)}  ${styleName(name, entry, options)}`;
	});
}

/**
 * Draw emitted tree nodes with box-drawing connectors. Top-level nodes carry
 * no connector; nested nodes show their name relative to their parent.
 *
 * @param nodes - Output of `emitTree`.
 * @param options - Formatting options.
 * @returns The rendered lines.
 */
export function renderTree(
	nodes: ReadonlyArray<EmittedNode>,
	options: RenderOptions,
): Array<string> {
	return nodes.map((node) => {
		const guides = node.ancestorsLast
			.slice(1)
			.map((isLast) => (isLast ? SPACE : PIPE))
			.join("");
		const connector = node.level === 0 ? "" : node.isLast ? LAST_BRANCH : BRANCH;
		const prefix = options.isColorEnabled ? ansis.gray(guides + connector) : guides + connector;
		const name = styleName(treeName(node, options.root), node.entry, options);

		return `${sizeColumn(node.entry.sizeBytes, options)}  ${prefix}${name}`;
	});
}

function formatPath(target: string, options: RenderOptions): string {
	switch (options.format) {
		case "absolute": {
			return target;
		}
		case "basename": {
			return path.basename(target) || target;
		}
		case "relative": {
			return path.relative(options.root, target) || ".";
		}
	}
}

function sizeColumn(sizeBytes: number, options: RenderOptions): string {
	const text = (options.isBytes ? String(sizeBytes) : formatSize(sizeBytes)).padEnd(
		SIZE_COLUMN_WIDTH,
	);
	return options.isColorEnabled ? ansis.cyan(text) : text;
}

function styleName(name: string, entry: SizedEntry, options: RenderOptions): string {
	if (!options.isColorEnabled || entry.type !== "directory") {
		return name;
	}

	return ansis.bold.blue(name);
}

function treeName(node: EmittedNode, root: string): string {
	const { path: entryPath } = node.entry;
	if (entryPath === root) {
		return path.basename(root) || root;
	}

	if (node.parentPath === path.dirname(entryPath)) {
		return path.basename(entryPath);
	}

	// Reparented orphan: show where it really lives.
	return path.relative(root, entryPath);
}
