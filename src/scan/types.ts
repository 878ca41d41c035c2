import type { EntryType } from "../fs/types";
import type { PatternSet } from "./pattern";

export type SortKey = "name" | "size";

/** Immutable settings for one run. Build it with `createScanConfig`. */
export interface ScanConfig {
	/** Disable the min-size prune; the cut filter still applies. */
	readonly all: boolean;
	readonly blacklist: PatternSet;
	/** Cut threshold in bytes; 0 disables it. */
	readonly cut: number;
	readonly excludeHidden: boolean;
	readonly followSymlinks: boolean;
	/** List files and unfollowed symlinks as well as directories. */
	readonly includeFiles: boolean;
	/** 0 lists the root only; `Infinity` means unbounded. */
	readonly maxDepth: number;
	readonly minSize: number;
	readonly oneFileSystem: boolean;
	readonly reverse: boolean;
	/** Absolute, trailing-separator-free scan root. */
	readonly root: string;
	readonly sortKey: SortKey;
	readonly tree: boolean;
	readonly whitelist: PatternSet;
	/** Explicit paths under the root; validated when the config is built. */
	readonly whitelistPaths: ReadonlyArray<string>;
}

export interface Candidate {
	/** Ancestor of a whitelist path, kept so the deep entry stays connected. */
	readonly connector: boolean;
	readonly depthFromRoot: number;
	readonly path: string;
	readonly type: EntryType;
}

export interface SizedEntry {
	readonly connector: boolean;
	readonly depthFromRoot: number;
	readonly path: string;
	readonly sizeBytes: number;
	readonly type: EntryType;
}
