import type { FileStat, FileSystem, SizeService } from "../fs/types";
import { createLimiter } from "../utils/limiter";
import { logger } from "../utils/logger";
import { type EmittedNode, assembleFlat, assembleTree, emitTree } from "./assembler";
import { type ScanContext, createScanContext } from "./context";
import { AllFailedError, TargetError, getErrorCode } from "./errors";
import { applyCut, pruneBelowMinSize } from "./filters";
import { shouldInclude } from "./inclusion";
import { plan, reportLoop } from "./planner";
import { type ScanConfigInput, createScanConfig } from "./scan-config";
import { sortEntries } from "./sort";
import type { Candidate, ScanConfig, SizedEntry } from "./types";
import { type ScanWarning, WarningLog } from "./warnings";

export const DEFAULT_JOBS = 8;

export interface ScanProgress {
	readonly completed: number;
	readonly total: number;
}

export interface ScanCollaborators {
	readonly fileSystem: FileSystem;
	/** Maximum concurrent size lookups. */
	readonly jobs?: number;
	readonly onProgress?: (progress: ScanProgress) => void;
	readonly sizeService: SizeService;
}

export type ScanReport =
	| { readonly entries: ReadonlyArray<SizedEntry>; readonly mode: "flat" }
	| { readonly mode: "tree"; readonly nodes: ReadonlyArray<EmittedNode> };

export interface ScanResult {
	/** Candidates that passed inclusion and were sent for measurement. */
	readonly candidateCount: number;
	readonly failedCount: number;
	readonly report: ScanReport;
	readonly warnings: ReadonlyArray<ScanWarning>;
}

/**
 * Validate the target directory and build the run's configuration.
 * Configuration problems are reported before the filesystem is touched.
 *
 * @param input - Raw settings.
 * @param fileSystem - Filesystem to check the root against.
 * @param warnings - Receives config warnings such as dropped whitelist paths.
 * @returns The frozen configuration.
 * @throws {ConfigError} When a setting is invalid.
 * @throws {TargetError} When the root is missing, not a directory or unreadable.
 */
export async function prepareScan(
	input: ScanConfigInput,
	fileSystem: FileSystem,
	warnings: WarningLog,
): Promise<ScanConfig> {
	const config = createScanConfig(input, warnings);

	let stat: FileStat;
	try {
		stat = await fileSystem.stat(config.root);
	} catch (err) {
		const reason = getErrorCode(err) === "ENOENT" ? "does not exist" : "is not accessible";
		throw new TargetError(config.root, reason);
	}

	if (stat.type !== "directory") {
		throw new TargetError(config.root, "is not a directory");
	}

	try {
		await fileSystem.readdir(config.root);
	} catch {
		throw new TargetError(config.root, "is not readable");
	}

	return config;
}

/**
 * Run one scan: plan, filter, measure, prune, sort, cut and assemble.
 *
 * @example
 *
 * ```ts
 * const warnings = new WarningLog();
 * const config = await prepareScan({ root: "/srv" }, nodeFileSystem, warnings);
 * const result = await runScan(
 * 	config,
 * 	{ fileSystem: nodeFileSystem, sizeService: new FsSizeService() },
 * 	warnings,
 * );
 * ```
 *
 * @param config - Configuration from {@link prepareScan}.
 * @param collaborators - Filesystem, size service and concurrency settings.
 * @param warnings - The run's warning log; a fresh one when omitted.
 * @returns The report and every warning raised during the run.
 * @throws {AllFailedError} When every candidate failed to measure.
 */
export async function runScan(
	config: ScanConfig,
	collaborators: ScanCollaborators,
	warnings: WarningLog = new WarningLog(),
): Promise<ScanResult> {
	const { fileSystem, jobs = DEFAULT_JOBS, onProgress, sizeService } = collaborators;
	const context = createScanContext(fileSystem, warnings);

	const planned = await plan(config, context);
	const candidates = planned.filter(
		(candidate) => candidate.connector || shouldInclude(candidate.path, config),
	);
	logger.debug(`Planned ${planned.length} path(s), ${candidates.length} included`);

	const sizes = await measureAll(candidates, config, { jobs, onProgress, sizeService }, context);
	const failedCount = candidates.length - sizes.size;
	if (candidates.length > 0 && sizes.size === 0) {
		throw new AllFailedError(candidates.length);
	}

	const measured: Array<SizedEntry> = [];
	for (const candidate of candidates) {
		const sizeBytes = sizes.get(candidate.path);
		if (sizeBytes !== undefined) {
			measured.push({ ...candidate, sizeBytes });
		}
	}

	const pruned = pruneBelowMinSize(measured, config);
	const sorted = sortEntries(pruned, config.sortKey, config.reverse);
	const kept = applyCut(sorted, config);

	return {
		candidateCount: candidates.length,
		failedCount,
		report: config.tree
			? { mode: "tree", nodes: emitTree(assembleTree(kept, config)) }
			: { entries: assembleFlat(kept), mode: "flat" },
		warnings: warnings.toArray(),
	};
}

async function measureAll(
	candidates: ReadonlyArray<Candidate>,
	config: ScanConfig,
	collaborators: Required<Pick<ScanCollaborators, "jobs" | "sizeService">> &
		Pick<ScanCollaborators, "onProgress">,
	context: ScanContext,
): Promise<Map<string, number>> {
	const { jobs, onProgress, sizeService } = collaborators;
	const { warnings } = context;
	const limit = createLimiter(jobs);
	const sizes = new Map<string, number>();
	const measureOptions = {
		followSymlinks: config.followSymlinks,
		oneFileSystem: config.oneFileSystem,
		onWarning: async (target: string, err: unknown) => {
			// A cycle the planner already reported must not be reported again per link.
			if (getErrorCode(err) === "ELOOP") {
				await reportLoop(target, context);
				return;
			}

			warnings.fromError(target, err);
		},
	};

	let completed = 0;
	await Promise.all(
		candidates.map(async (candidate) =>
			limit(async () => {
				try {
					sizes.set(candidate.path, await sizeService.measure(candidate.path, measureOptions));
				} catch (err) {
					warnings.fromError(candidate.path, err);
				} finally {
					completed++;
					onProgress?.({ completed, total: candidates.length });
				}
			}),
		),
	);

	return sizes;
}
