export type EntryType = "directory" | "file" | "other" | "symlink";

export interface FileStat {
	readonly dev: number;
	readonly ino: number;
	readonly size: number;
	readonly type: EntryType;
}

/**
 * The filesystem operations the planner and the size service need. Every
 * method rejects with a Node-style error (`code` set to `ENOENT`, `EACCES`,
 * `ELOOP`, ...) on failure.
 */
export interface FileSystem {
	/** Metadata of the path itself, never following a final symlink. */
	lstat(path: string): Promise<FileStat>;
	/** Names of the entries of a directory, in no particular order. */
	readdir(path: string): Promise<Array<string>>;
	readlink(path: string): Promise<string>;
	/** Metadata of the path with every symlink resolved. */
	stat(path: string): Promise<FileStat>;
}

export interface MeasureOptions {
	readonly followSymlinks: boolean;
	/** Skip anything on a different device from the measured path. */
	readonly oneFileSystem: boolean;
	/** Receives non-fatal failures below the measured path. */
	readonly onWarning?: (path: string, err: unknown) => Promise<void> | void;
}

/** Size-measurement collaborator. */
export interface SizeService {
	/**
	 * Measure the size in bytes of a path and everything below it.
	 *
	 * @param path - Absolute path to measure.
	 * @param options - Traversal flags for the measurement.
	 * @returns The size in bytes; rejects when the path cannot be measured.
	 */
	measure(path: string, options: MeasureOptions): Promise<number>;
}
