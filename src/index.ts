export { defineConfig } from "./config";
export type { Config } from "./config/schema";

export { DuSizeService } from "./fs/du-size-service";
export { FsSizeService } from "./fs/fs-size-service";
export { nodeFileSystem } from "./fs/node-file-system";
export { findPatternFiles, loadPatternFile } from "./fs/pattern-file";
export type { EntryType, FileStat, FileSystem, MeasureOptions, SizeService } from "./fs/types";

export { type PathFormat, type RenderOptions, renderFlat, renderTree } from "./render/render";

export {
	assembleFlat,
	assembleTree,
	type EmittedNode,
	emitTree,
	ROOT_SENTINEL,
	type TreeNode,
} from "./scan/assembler";
export { AllFailedError, ConfigError, EXIT_CODES, exitCodeFor, TargetError } from "./scan/errors";
export { applyCut, pruneBelowMinSize } from "./scan/filters";
export { isExempt, shouldInclude, validateWhitelistPaths } from "./scan/inclusion";
export {
	buildPatternSet,
	matches,
	matchesAny,
	parsePattern,
	type Pattern,
	type PatternSet,
} from "./scan/pattern";
export {
	prepareScan,
	runScan,
	type ScanCollaborators,
	type ScanProgress,
	type ScanReport,
	type ScanResult,
} from "./scan/pipeline";
export { plan } from "./scan/planner";
export { createScanConfig, type ScanConfigInput } from "./scan/scan-config";
export { sortEntries } from "./scan/sort";
export type { Candidate, ScanConfig, SizedEntry, SortKey } from "./scan/types";
export { type ScanWarning, WarningLog } from "./scan/warnings";

export { formatSize } from "./utils/format-size";
export { parseSize } from "./utils/parse-size";
