import path from "node:path";

import type { FileStat } from "../fs/types";
import { logger } from "../utils/logger";
import { ancestorChain, depthBelow, isSameOrDescendant } from "../utils/path";
import { type ScanContext, identityOf } from "./context";
import { getErrorCode } from "./errors";
import { matchesAny } from "./pattern";
import type { Candidate, ScanConfig } from "./types";

type PlannerConfig = Pick<
	ScanConfig,
	| "excludeHidden"
	| "followSymlinks"
	| "includeFiles"
	| "maxDepth"
	| "oneFileSystem"
	| "root"
	| "whitelist"
	| "whitelistPaths"
>;

interface PendingEntry {
	readonly depth: number;
	readonly path: string;
}

interface Classified {
	readonly shouldDescend: boolean;
	readonly stat: FileStat;
}

const MAX_SYMLINK_HOPS = 40;

/**
 * Produce the candidate set for a run: a depth-bounded walk of the root
 * followed by the whitelisted entries that lie beyond the bound, together
 * with the ancestors that connect them to the bounded part.
 *
 * Below the bound, entries matching a whitelist pattern are found by walking
 * on without listing anything until the topmost match of each branch.
 *
 * Candidates come back in depth-first pre-order with siblings sorted by name,
 * deduplicated by path.
 *
 * @param config - The run's configuration.
 * @param context - Run-scoped state; its visited set is filled in here.
 * @returns The ordered candidates.
 */
export async function plan(config: PlannerConfig, context: ScanContext): Promise<Array<Candidate>> {
	const rootStat = await context.fileSystem.stat(config.root);
	const planned = new Map<string, Candidate>();

	context.visited.add(identityOf(rootStat));
	addCandidate(planned, config, { depth: 0, path: config.root }, "directory");

	const deepMatches = await walkBounded(config, context, rootStat, planned);
	await extendWhitelist(config, context, rootStat, planned);

	return markConnectors([...planned.values()], [...config.whitelistPaths, ...deepMatches]);
}

/** Add a match found below the bound, preceded by the directories leading to it. */
function addDeepMatch(
	planned: Map<string, Candidate>,
	config: PlannerConfig,
	entry: PendingEntry,
	type: FileStat["type"],
): void {
	const chain = ancestorChain(config.root, entry.path).slice(config.maxDepth, -1);
	let depth = config.maxDepth;
	for (const chainPath of chain) {
		depth++;
		addCandidate(planned, config, { depth, path: chainPath }, "directory", true);
	}

	addCandidate(planned, config, entry, type);
}

function addCandidate(
	planned: Map<string, Candidate>,
	config: PlannerConfig,
	entry: PendingEntry,
	type: FileStat["type"],
	isForced = false,
): void {
	if (planned.has(entry.path)) {
		return;
	}

	if (type !== "directory" && !config.includeFiles && !isForced) {
		return;
	}

	planned.set(entry.path, {
		connector: false,
		depthFromRoot: entry.depth,
		path: entry.path,
		type,
	});
}

/**
 * Work out what a non-root entry is and whether to descend into it. Returns
 * undefined when the entry must be skipped; the reason is already recorded.
 */
async function classify(
	entry: PendingEntry,
	config: PlannerConfig,
	context: ScanContext,
	rootDevice: number,
): Promise<Classified | undefined> {
	const { fileSystem, visited, warnings } = context;

	let stat: FileStat;
	try {
		stat = await fileSystem.lstat(entry.path);
	} catch (err) {
		warnings.fromError(entry.path, err);
		return undefined;
	}

	if (stat.type === "directory") {
		visited.add(identityOf(stat));
		const isOtherDevice = config.oneFileSystem && stat.dev !== rootDevice;
		return { shouldDescend: !isOtherDevice, stat };
	}

	if (stat.type !== "symlink" || !config.followSymlinks) {
		return { shouldDescend: false, stat };
	}

	let target: FileStat;
	try {
		target = await fileSystem.stat(entry.path);
	} catch (err) {
		if (getErrorCode(err) === "ELOOP") {
			await reportLoop(entry.path, context);
		} else {
			warnings.fromError(entry.path, err);
		}

		return undefined;
	}

	if (target.type !== "directory") {
		return { shouldDescend: false, stat: target };
	}

	// One-filesystem wins over dereference: the link stays a leaf.
	if (config.oneFileSystem && target.dev !== rootDevice) {
		return { shouldDescend: false, stat };
	}

	const key = identityOf(target);
	if (visited.has(key)) {
		// Measuring the enclosing directory meets the same link; keep it to one warning.
		context.reportedLoops.add(identityOf(stat));
		warnings.traversal(
			"symlink-loop",
			entry.path,
			`Symlink loop detected: ${entry.path} leads to an already visited directory; skipping it`,
		);
		return undefined;
	}

	visited.add(key);
	return { shouldDescend: true, stat: target };
}

/** Link identities along a symlink chain, stopping at the first repeat. */
async function collectLinkChain(start: string, context: ScanContext): Promise<Array<string>> {
	const identities: Array<string> = [];
	let current = start;

	for (let hop = 0; hop < MAX_SYMLINK_HOPS; hop++) {
		let stat: FileStat;
		let target: string;
		try {
			stat = await context.fileSystem.lstat(current);
			if (stat.type !== "symlink") {
				break;
			}

			target = await context.fileSystem.readlink(current);
		} catch (err) {
			context.warnings.fromError(current, err);
			break;
		}

		const key = identityOf(stat);
		if (identities.includes(key)) {
			break;
		}

		identities.push(key);
		current = path.resolve(path.dirname(current), target);
	}

	return identities;
}

async function extendWhitelist(
	config: PlannerConfig,
	context: ScanContext,
	rootStat: FileStat,
	planned: Map<string, Candidate>,
): Promise<void> {
	const { fileSystem, warnings } = context;

	for (const whitelistPath of config.whitelistPaths) {
		const depth = depthBelow(config.root, whitelistPath);
		if (depth <= config.maxDepth) {
			continue;
		}

		// The bounded pass already covers everything down to maxDepth.
		const chain = ancestorChain(config.root, whitelistPath).slice(config.maxDepth);
		let chainDepth = config.maxDepth;

		for (const chainPath of chain) {
			chainDepth++;
			if (planned.has(chainPath)) {
				continue;
			}

			let stat: FileStat;
			try {
				stat = config.followSymlinks
					? await fileSystem.stat(chainPath)
					: await fileSystem.lstat(chainPath);
			} catch (err) {
				warnings.fromError(chainPath, err);
				break;
			}

			if (config.oneFileSystem && stat.dev !== rootStat.dev) {
				warnings.traversal(
					"cross-device",
					chainPath,
					`Whitelisted path ${chainPath} is on another filesystem; skipping it`,
				);
				break;
			}

			addCandidate(planned, config, { depth: chainDepth, path: chainPath }, stat.type, true);
		}
	}
}

function markConnectors(
	candidates: Array<Candidate>,
	whitelistPaths: ReadonlyArray<string>,
): Array<Candidate> {
	if (whitelistPaths.length === 0) {
		return candidates;
	}

	return candidates.map((candidate) => {
		const isConnector = whitelistPaths.some(
			(whitelistPath) =>
				whitelistPath !== candidate.path && isSameOrDescendant(whitelistPath, candidate.path),
		);
		return isConnector ? { ...candidate, connector: true } : candidate;
	});
}

async function readChildren(
	directory: PendingEntry,
	config: PlannerConfig,
	context: ScanContext,
): Promise<Array<PendingEntry>> {
	let names: Array<string>;
	try {
		names = await context.fileSystem.readdir(directory.path);
	} catch (err) {
		context.warnings.fromError(directory.path, err);
		return [];
	}

	return names
		.filter((name) => !config.excludeHidden || !name.startsWith("."))
		.sort()
		.map((name) => ({ depth: directory.depth + 1, path: path.join(directory.path, name) }));
}

/**
 * Record one warning per symlink cycle. Every link of the cycle is remembered,
 * so reaching the same cycle through another of its links stays silent.
 *
 * @param linkPath - A link whose resolution failed with `ELOOP`.
 * @param context - The run's context.
 */
export async function reportLoop(linkPath: string, context: ScanContext): Promise<void> {
	const cycle = await collectLinkChain(linkPath, context);
	const [first] = cycle;
	if (first !== undefined && context.reportedLoops.has(first)) {
		logger.debug(`Skipping ${linkPath}: its symlink cycle was already reported`);
		return;
	}

	for (const key of cycle) {
		context.reportedLoops.add(key);
	}

	context.warnings.traversal(
		"symlink-loop",
		linkPath,
		`Symlink loop detected at ${linkPath}; skipping it`,
	);
}

async function walkBounded(
	config: PlannerConfig,
	context: ScanContext,
	rootStat: FileStat,
	planned: Map<string, Candidate>,
): Promise<Array<string>> {
	const root: PendingEntry = { depth: 0, path: config.root };
	const isSearchingDeeper = config.whitelist.length > 0;
	const deepMatches: Array<string> = [];
	if (config.maxDepth === 0 && !isSearchingDeeper) {
		return deepMatches;
	}

	// Explicit stack keeps pathological depths off the call stack.
	const stack = (await readChildren(root, config, context)).reverse();

	for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
		const classified = await classify(entry, config, context, rootStat.dev);
		if (classified === undefined) {
			continue;
		}

		const { type } = classified.stat;
		if (entry.depth <= config.maxDepth) {
			addCandidate(planned, config, entry, type);
		} else if (
			(type === "directory" || config.includeFiles) &&
			matchesAny(entry.path, config.whitelist, config.root)
		) {
			addDeepMatch(planned, config, entry, type);
			deepMatches.push(entry.path);
			continue;
		}

		if (classified.shouldDescend && (entry.depth < config.maxDepth || isSearchingDeeper)) {
			const children = await readChildren(entry, config, context);
			stack.push(...children.reverse());
		}
	}

	return deepMatches;
}
