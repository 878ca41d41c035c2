import type { FileStat, FileSystem } from "../fs/types";
import { WarningLog } from "./warnings";

/**
 * Mutable state owned by a single run. A fresh context is created per scan
 * and never shared between concurrent scans.
 */
export interface ScanContext {
	readonly fileSystem: FileSystem;
	/** Link identities that belong to a symlink cycle already reported. */
	readonly reportedLoops: Set<string>;
	/** `dev:ino` of every directory the planner has descended into. */
	readonly visited: Set<string>;
	readonly warnings: WarningLog;
}

export function createScanContext(
	fileSystem: FileSystem,
	warnings: WarningLog = new WarningLog(),
): ScanContext {
	return {
		fileSystem,
		reportedLoops: new Set(),
		visited: new Set(),
		warnings,
	};
}

export function identityOf(stat: Pick<FileStat, "dev" | "ino">): string {
	return `${stat.dev}:${stat.ino}`;
}
