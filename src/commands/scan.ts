import ansis from "ansis";
import process from "node:process";
import yoctoSpinner from "yocto-spinner";

import { loadProjectConfig } from "../config";
import { type RunSettings, parseScanOptions, resolveRunSettings } from "../config/resolve";
import { DuSizeService } from "../fs/du-size-service";
import { FsSizeService } from "../fs/fs-size-service";
import { nodeFileSystem } from "../fs/node-file-system";
import type { SizeService } from "../fs/types";
import { renderFlat, renderTree } from "../render/render";
import { type ScanProgress, type ScanResult, prepareScan, runScan } from "../scan/pipeline";
import { WarningLog } from "../scan/warnings";
import { formatDuration } from "../utils/format-duration";
import { logger } from "../utils/logger";

export const COMMAND = "scan";
export const DESCRIPTION = "Report disk usage below a directory";
export const ARGUMENTS = "[target]";
export const IS_DEFAULT = true;

export const options = [
	{
		description: 'Maximum depth to list, or "unlimited" (default: 1)',
		flags: "-l, --level <depth>",
	},
	{
		description: "Hide directories smaller than this size, e.g. 10M (default: 0)",
		flags: "-m, --min-size <size>",
	},
	{
		description: "Disable the min-size filter",
		flags: "-a, --all",
	},
	{
		description: "Drop entries smaller than this size after sorting (default: 0)",
		flags: "-c, --cut <size>",
	},
	{
		description: "Sort by size or name (default: size)",
		flags: "-s, --sort <key>",
	},
	{
		description: "Reverse the sort order",
		flags: "-r, --reverse",
	},
	{
		description: "Draw the result as a tree",
		flags: "-t, --tree",
	},
	{
		description: "Comma-separated whitelist patterns (overrides the blacklist)",
		flags: "-w, --whitelist <patterns>",
	},
	{
		description: "File with whitelist patterns, one per line",
		flags: "--whitelist-file <file>",
	},
	{
		description: "Comma-separated paths to always report, at any depth",
		flags: "-W, --whitelist-path <paths>",
	},
	{
		description: "Comma-separated blacklist patterns",
		flags: "-b, --blacklist <patterns>",
	},
	{
		description: "File with blacklist patterns, one per line",
		flags: "--blacklist-file <file>",
	},
	{
		description: "Stay on the target's filesystem",
		flags: "-x, --one-file-system",
	},
	{
		description: "Follow symbolic links",
		flags: "-L, --dereference",
	},
	{
		description: "List files as well as directories",
		flags: "-F, --files",
	},
	{
		description: "Skip entries whose name starts with a dot",
		flags: "--exclude-hidden",
	},
	{
		description: "Path format: absolute, relative or basename (default: relative)",
		flags: "-f, --format <format>",
	},
	{
		description: "Print sizes in bytes",
		flags: "-B, --bytes",
	},
	{
		description: "Maximum concurrent size lookups (default: 8)",
		flags: "-j, --jobs <n>",
	},
	{
		description: "Size backend: fs or du (default: fs)",
		flags: "--size-backend <backend>",
	},
	{
		description: "Show a spinner while sizes are measured",
		flags: "-p, --progress",
	},
	{
		description: "Print debug output",
		flags: "-d, --debug",
	},
] as const;

export async function action(rawOptions: unknown, operands: ReadonlyArray<string>): Promise<void> {
	const commandOptions = parseScanOptions(rawOptions);
	if (commandOptions.debug === true) {
		logger.setDebug(true);
	}

	const config = await loadProjectConfig();
	const settings = await resolveRunSettings(operands[0], commandOptions, config);
	const warnings = new WarningLog();

	try {
		const scanConfig = await prepareScan(settings.scan, nodeFileSystem, warnings);
		const result = await measureWithProgress(settings, async (onProgress) =>
			runScan(
				scanConfig,
				{
					fileSystem: nodeFileSystem,
					jobs: settings.jobs,
					onProgress,
					sizeService: createSizeService(settings),
				},
				warnings,
			),
		);

		printReport(result, settings, scanConfig.root);
	} finally {
		for (const warning of warnings.toArray()) {
			logger.warn(warning.message);
		}
	}
}

function createSizeService(settings: RunSettings): SizeService {
	return settings.sizeBackend === "du" ? new DuSizeService() : new FsSizeService(nodeFileSystem);
}

async function measureWithProgress(
	settings: RunSettings,
	scan: (onProgress?: (progress: ScanProgress) => void) => Promise<ScanResult>,
): Promise<ScanResult> {
	if (!settings.isProgress) {
		return scan();
	}

	const startTime = performance.now();
	const spinner = yoctoSpinner({ text: "Measuring sizes..." }).start();

	try {
		const result = await scan(({ completed, total }) => {
			spinner.text = `Measuring sizes... ${completed}/${total}`;
		});
		spinner.success(
			`Measured ${result.candidateCount} path(s) in ${ansis.dim(formatDuration(startTime))}`,
		);
		return result;
	} catch (err) {
		spinner.error("Scan failed");
		throw err;
	}
}

function printReport(result: ScanResult, settings: RunSettings, root: string): void {
	const renderOptions = {
		format: settings.format,
		isBytes: settings.isBytes,
		isColorEnabled: process.stdout.isTTY && process.env["NO_COLOR"] === undefined,
		root,
	};

	const lines =
		result.report.mode === "tree"
			? renderTree(result.report.nodes, renderOptions)
			: renderFlat(result.report.entries, renderOptions);

	if (lines.length > 0) {
		process.stdout.write(`${lines.join("\n")}\n`);
	}

	if (result.failedCount > 0) {
		logger.debug(`${result.failedCount} of ${result.candidateCount} path(s) could not be measured`);
	}
}
