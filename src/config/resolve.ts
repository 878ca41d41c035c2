import { type } from "arktype";
import path from "node:path";
import process from "node:process";
import { BLACKLIST_FILE, WHITELIST_FILE } from "src/constants";

import { findPatternFiles, loadPatternFile } from "../fs/pattern-file";
import type { PathFormat } from "../render/render";
import { ConfigError } from "../scan/errors";
import type { ScanConfigInput } from "../scan/scan-config";
import { parseSize } from "../utils/parse-size";
import type { ResolvedConfig } from "./schema";

export const scanOptionsSchema = type({
	"all?": "boolean",
	"blacklist?": "string",
	"blacklistFile?": "string",
	"bytes?": "boolean",
	"cut?": "string",
	"debug?": "boolean",
	"dereference?": "boolean",
	"excludeHidden?": "boolean",
	"files?": "boolean",
	"format?": "'absolute' | 'basename' | 'relative'",
	"jobs?": "string",
	"level?": "string",
	"minSize?": "string",
	"oneFileSystem?": "boolean",
	"progress?": "boolean",
	"reverse?": "boolean",
	"sizeBackend?": "'du' | 'fs'",
	"sort?": "'name' | 'size'",
	"tree?": "boolean",
	"whitelist?": "string",
	"whitelistFile?": "string",
	"whitelistPath?": "string",
});

export type ScanOptions = typeof scanOptionsSchema.infer;

export interface RunSettings {
	readonly format: PathFormat;
	readonly isBytes: boolean;
	readonly isDebug: boolean;
	readonly isProgress: boolean;
	readonly jobs: number;
	readonly scan: ScanConfigInput;
	readonly sizeBackend: ResolvedConfig["sizeBackend"];
}

export interface ResolveContext {
	readonly cwd?: string;
	/** Where the home pattern files are looked up. */
	readonly homeDirectory?: string;
}

/**
 * Validate the raw option bag handed over by commander.
 *
 * @param raw - Parsed command-line options.
 * @returns The typed options.
 * @throws {ConfigError} When an option has the wrong shape or value.
 */
export function parseScanOptions(raw: unknown): ScanOptions {
	const validated = scanOptionsSchema(raw);
	if (validated instanceof type.errors) {
		throw new ConfigError(`Invalid option: ${validated.summary}`);
	}

	return validated;
}

/**
 * Merge command-line options, the config file and the pattern files into the
 * settings for one run. Flags given on the command line win over the config
 * file, which wins over the defaults.
 *
 * Patterns are collected in this order: inline flag, pattern file flag,
 * config file, then the default files in the scan root and in the home
 * directory.
 *
 * @param target - Target directory operand; the working directory when absent.
 * @param options - Validated command-line options.
 * @param config - Loaded project configuration.
 * @param context - Working and home directories.
 * @returns Everything the scan command needs.
 * @throws {ConfigError} On a malformed value or a missing pattern file.
 */
export async function resolveRunSettings(
	target: string | undefined,
	options: ScanOptions,
	config: ResolvedConfig,
	context: ResolveContext = {},
): Promise<RunSettings> {
	const cwd = context.cwd ?? process.cwd();
	const root = path.resolve(cwd, target ?? ".");

	const [whitelist, blacklist] = await Promise.all([
		collectPatterns(options.whitelist, options.whitelistFile, config.whitelist, {
			cwd,
			defaultFile: WHITELIST_FILE,
			homeDirectory: context.homeDirectory,
			root,
		}),
		collectPatterns(options.blacklist, options.blacklistFile, config.blacklist, {
			cwd,
			defaultFile: BLACKLIST_FILE,
			homeDirectory: context.homeDirectory,
			root,
		}),
	]);

	const whitelistPaths = [...splitList(options.whitelistPath), ...config.whitelistPaths].map(
		(whitelistPath) => path.resolve(cwd, whitelistPath),
	);

	return {
		format: options.format ?? config.format,
		isBytes: options.bytes ?? config.bytes,
		isDebug: options.debug ?? false,
		isProgress: options.progress ?? config.progress,
		jobs: parseJobs(options.jobs ?? config.jobs),
		scan: {
			all: options.all ?? config.all,
			blacklist,
			cut: toBytes(options.cut ?? config.cut),
			excludeHidden: options.excludeHidden ?? config.excludeHidden,
			followSymlinks: options.dereference ?? config.dereference,
			includeFiles: options.files ?? config.files,
			maxDepth: parseLevel(options.level ?? config.level),
			minSize: toBytes(options.minSize ?? config.minSize),
			oneFileSystem: options.oneFileSystem ?? config.oneFileSystem,
			reverse: options.reverse ?? config.reverse,
			root,
			sortKey: options.sort ?? config.sort,
			tree: options.tree ?? config.tree,
			whitelist,
			whitelistPaths,
		},
		sizeBackend: options.sizeBackend ?? config.sizeBackend,
	};
}

/**
 * Parse a depth limit: a non-negative integer or `unlimited`.
 *
 * @example
 *
 * ```ts
 * parseLevel("3"); // 3
 * parseLevel("unlimited"); // Infinity
 * ```
 */
export function parseLevel(value: number | string): number {
	if (typeof value === "number") {
		return value;
	}

	const trimmed = value.trim().toLowerCase();
	if (trimmed === "unlimited") {
		return Number.POSITIVE_INFINITY;
	}

	if (!/^\d+$/.test(trimmed)) {
		throw new ConfigError(`Level must be a non-negative integer or "unlimited", got "${value}"`);
	}

	return Number.parseInt(trimmed, 10);
}

/** Split a comma-separated flag value, dropping blank items. */
export function splitList(value: string | undefined): Array<string> {
	if (value === undefined) {
		return [];
	}

	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

async function collectPatterns(
	inline: string | undefined,
	file: string | undefined,
	fromConfig: ReadonlyArray<string>,
	lookup: { cwd: string; defaultFile: string; homeDirectory: string | undefined; root: string },
): Promise<Array<string>> {
	const patterns = [...splitList(inline)];

	if (file !== undefined) {
		patterns.push(...(await loadPatternFile(path.resolve(lookup.cwd, file))));
	}

	patterns.push(...fromConfig);

	const defaultFiles = await findPatternFiles(lookup.root, lookup.defaultFile, lookup.homeDirectory);
	for (const defaultFile of defaultFiles) {
		patterns.push(...(await loadPatternFile(defaultFile)));
	}

	return patterns;
}

function parseJobs(value: number | string): number {
	const jobs = typeof value === "number" ? value : Number(value.trim());
	if (!Number.isInteger(jobs) || jobs < 1) {
		throw new ConfigError(`Jobs must be a positive integer, got "${value}"`);
	}

	return jobs;
}

function toBytes(value: number | string): number {
	return typeof value === "number" ? value : parseSize(value);
}
