import path from "node:path";

import { stripTrailingSeparator } from "../utils/path";
import { ConfigError } from "./errors";
import { validateWhitelistPaths } from "./inclusion";
import { buildPatternSet, isLiteralPath } from "./pattern";
import type { ScanConfig, SortKey } from "./types";
import type { WarningLog } from "./warnings";

export interface ScanConfigInput {
	readonly all?: boolean;
	/** Raw blacklist patterns, already merged in precedence order. */
	readonly blacklist?: ReadonlyArray<string>;
	readonly cut?: number;
	readonly excludeHidden?: boolean;
	readonly followSymlinks?: boolean;
	readonly includeFiles?: boolean;
	readonly maxDepth?: number;
	readonly minSize?: number;
	readonly oneFileSystem?: boolean;
	readonly reverse?: boolean;
	readonly root: string;
	readonly sortKey?: SortKey;
	readonly tree?: boolean;
	/** Raw whitelist patterns, already merged in precedence order. */
	readonly whitelist?: ReadonlyArray<string>;
	readonly whitelistPaths?: ReadonlyArray<string>;
}

/**
 * Build the frozen configuration for one run.
 *
 * Absolute whitelist patterns without wildcards are treated as whitelist
 * paths, and every whitelist path outside the root is dropped with a warning.
 *
 * @param input - Raw settings.
 * @param warnings - Receives config warnings.
 * @returns The immutable scan configuration.
 * @throws {ConfigError} On negative thresholds, a bad depth or a bad pattern.
 */
export function createScanConfig(input: ScanConfigInput, warnings: WarningLog): ScanConfig {
	const root = stripTrailingSeparator(path.resolve(input.root));
	const maxDepth = input.maxDepth ?? 1;
	if (maxDepth !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
		throw new ConfigError(`Level must be a non-negative integer, got ${maxDepth}`);
	}

	const minSize = requireSize("min-size", input.minSize ?? 0);
	const cut = requireSize("cut", input.cut ?? 0);

	const whitelistPatterns = buildPatternSet([input.whitelist ?? []]);
	const literalPaths = whitelistPatterns.filter(isLiteralPath).map((pattern) => pattern.text);
	const whitelist = whitelistPatterns.filter((pattern) => !isLiteralPath(pattern));
	const whitelistPaths = validateWhitelistPaths(
		[...(input.whitelistPaths ?? []), ...literalPaths],
		root,
		warnings,
	);

	return Object.freeze({
		all: input.all ?? false,
		blacklist: Object.freeze(buildPatternSet([input.blacklist ?? []])),
		cut,
		excludeHidden: input.excludeHidden ?? false,
		followSymlinks: input.followSymlinks ?? false,
		includeFiles: input.includeFiles ?? false,
		maxDepth,
		minSize,
		oneFileSystem: input.oneFileSystem ?? false,
		reverse: input.reverse ?? false,
		root,
		sortKey: input.sortKey ?? "size",
		tree: input.tree ?? false,
		whitelist: Object.freeze(whitelist),
		whitelistPaths: Object.freeze(whitelistPaths),
	});
}

function requireSize(name: string, value: number): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigError(`${name} must be a non-negative size, got ${value}`);
	}

	return Math.floor(value);
}
