import type { Stats } from "node:fs";
import fs from "node:fs/promises";

import type { EntryType, FileStat, FileSystem } from "./types";

/** {@link FileSystem} backed by `node:fs/promises`. */
export const nodeFileSystem: FileSystem = {
	async lstat(path) {
		return toFileStat(await fs.lstat(path));
	},

	async readdir(path) {
		return fs.readdir(path);
	},

	async readlink(path) {
		return fs.readlink(path);
	},

	async stat(path) {
		return toFileStat(await fs.stat(path));
	},
};

function toEntryType(stats: Stats): EntryType {
	if (stats.isSymbolicLink()) {
		return "symlink";
	}

	if (stats.isDirectory()) {
		return "directory";
	}

	return stats.isFile() ? "file" : "other";
}

function toFileStat(stats: Stats): FileStat {
	return {
		dev: stats.dev,
		ino: stats.ino,
		size: stats.size,
		type: toEntryType(stats),
	};
}
