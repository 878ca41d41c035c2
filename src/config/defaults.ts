import type { ResolvedConfig } from "./schema";

export const defaults: ResolvedConfig = {
	all: false,
	blacklist: [],
	bytes: false,
	cut: "0",
	dereference: false,
	excludeHidden: false,
	files: false,
	format: "relative",
	jobs: 8,
	level: 1,
	minSize: "0",
	oneFileSystem: false,
	progress: false,
	reverse: false,
	sizeBackend: "fs",
	sort: "size",
	tree: false,
	whitelist: [],
	whitelistPaths: [],
};
