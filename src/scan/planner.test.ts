import { describe, expect, it } from "vitest";

import { MemoryFileSystem } from "../testing/memory-file-system";
import { createScanContext } from "./context";
import { plan } from "./planner";
import { type ScanConfigInput, createScanConfig } from "./scan-config";
import { WarningLog } from "./warnings";

async function planPaths(fileSystem: MemoryFileSystem, input: ScanConfigInput) {
	const warnings = new WarningLog();
	const config = createScanConfig(input, warnings);
	const context = createScanContext(fileSystem, warnings);
	const candidates = await plan(config, context);

	return { candidates, paths: candidates.map((candidate) => candidate.path), warnings };
}

describe("plan", () => {
	describe("bounded pass", () => {
		const fileSystem = new MemoryFileSystem()
			.addDirectory("/r/b")
			.addDirectory("/r/a/inner")
			.addFile("/r/file.txt", 10);

		it("lists directories down to the depth limit in sorted pre-order", async () => {
			const { candidates } = await planPaths(fileSystem, { maxDepth: 1, root: "/r" });

			expect(candidates).toEqual([
				{ connector: false, depthFromRoot: 0, path: "/r", type: "directory" },
				{ connector: false, depthFromRoot: 1, path: "/r/a", type: "directory" },
				{ connector: false, depthFromRoot: 1, path: "/r/b", type: "directory" },
			]);
		});

		it("lists only the root at depth 0", async () => {
			const { paths } = await planPaths(fileSystem, { maxDepth: 0, root: "/r" });

			expect(paths).toEqual(["/r"]);
		});

		it("walks everything when unbounded", async () => {
			const { paths } = await planPaths(fileSystem, {
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(paths).toEqual(["/r", "/r/a", "/r/a/inner", "/r/b"]);
		});

		it("adds files when asked to", async () => {
			const { candidates } = await planPaths(fileSystem, { includeFiles: true, root: "/r" });

			expect(candidates.map(({ path, type }) => [path, type])).toEqual([
				["/r", "directory"],
				["/r/a", "directory"],
				["/r/b", "directory"],
				["/r/file.txt", "file"],
			]);
		});

		it("skips hidden entries when asked to", async () => {
			const hidden = new MemoryFileSystem().addDirectory("/r/.git").addDirectory("/r/src");

			const { paths } = await planPaths(hidden, { excludeHidden: true, root: "/r" });

			expect(paths).toEqual(["/r", "/r/src"]);
		});
	});

	describe("mount boundaries", () => {
		const fileSystem = new MemoryFileSystem()
			.addDirectory("/r/local")
			.addDirectory("/r/mnt", { device: 2 })
			.addDirectory("/r/mnt/sub");

		it("lists a mount point without descending into it", async () => {
			const { paths } = await planPaths(fileSystem, {
				maxDepth: Number.POSITIVE_INFINITY,
				oneFileSystem: true,
				root: "/r",
			});

			expect(paths).toEqual(["/r", "/r/local", "/r/mnt"]);
		});

		it("crosses devices by default", async () => {
			const { paths } = await planPaths(fileSystem, {
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(paths).toEqual(["/r", "/r/local", "/r/mnt", "/r/mnt/sub"]);
		});
	});

	describe("symlinks", () => {
		it("treats unfollowed links as leaves", async () => {
			const fileSystem = new MemoryFileSystem().addDirectory("/r/a/deep").addSymlink("/r/link", "/r/a");

			const withoutFiles = await planPaths(fileSystem, {
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});
			const withFiles = await planPaths(fileSystem, {
				includeFiles: true,
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(withoutFiles.paths).toEqual(["/r", "/r/a", "/r/a/deep"]);
			expect(withFiles.candidates.at(-1)).toEqual({
				connector: false,
				depthFromRoot: 1,
				path: "/r/link",
				type: "symlink",
			});
		});

		it("descends through followed links to directories", async () => {
			const fileSystem = new MemoryFileSystem()
				.addDirectory("/other/x")
				.addSymlink("/r/ext", "/other");

			const { candidates } = await planPaths(fileSystem, {
				followSymlinks: true,
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(candidates.map(({ path, type }) => [path, type])).toEqual([
				["/r", "directory"],
				["/r/ext", "directory"],
				["/r/ext/x", "directory"],
			]);
		});

		it("does not follow a link onto another device with one-file-system", async () => {
			const fileSystem = new MemoryFileSystem()
				.addDirectory("/mnt2/data", { device: 2 })
				.addSymlink("/r/ext", "/mnt2");

			const { paths } = await planPaths(fileSystem, {
				followSymlinks: true,
				maxDepth: Number.POSITIVE_INFINITY,
				oneFileSystem: true,
				root: "/r",
			});

			expect(paths).toEqual(["/r"]);
		});

		it("reports a two-link cycle once", async () => {
			const fileSystem = new MemoryFileSystem()
				.addSymlink("/r/A", "B")
				.addSymlink("/r/B", "A")
				.addDirectory("/r/real");

			const { paths, warnings } = await planPaths(fileSystem, {
				followSymlinks: true,
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(paths).toEqual(["/r", "/r/real"]);
			expect(warnings.toArray()).toEqual([
				{
					code: "symlink-loop",
					kind: "traversal",
					message: "Symlink loop detected at /r/A; skipping it",
					path: "/r/A",
				},
			]);
		});

		it("skips a link back to a visited directory", async () => {
			const fileSystem = new MemoryFileSystem().addSymlink("/r/sub/up", "/r");

			const { paths, warnings } = await planPaths(fileSystem, {
				followSymlinks: true,
				maxDepth: Number.POSITIVE_INFINITY,
				root: "/r",
			});

			expect(paths).toEqual(["/r", "/r/sub"]);
			expect(warnings.toArray().map((warning) => warning.message)).toEqual([
				"Symlink loop detected: /r/sub/up leads to an already visited directory; skipping it",
			]);
		});
	});

	it("keeps an unreadable directory and warns about it", async () => {
		const fileSystem = new MemoryFileSystem()
			.addDirectory("/r/locked", { isUnreadable: true })
			.addDirectory("/r/open");

		const { paths, warnings } = await planPaths(fileSystem, {
			maxDepth: Number.POSITIVE_INFINITY,
			root: "/r",
		});

		expect(paths).toEqual(["/r", "/r/locked", "/r/open"]);
		expect(warnings.toArray().map(({ code, path }) => [code, path])).toEqual([
			["permission-denied", "/r/locked"],
		]);
	});

	describe("whitelist extension", () => {
		it("adds a deep whitelist path and its ancestors as connectors", async () => {
			const fileSystem = new MemoryFileSystem().addDirectory("/r/x/y/deep").addDirectory("/r/z");

			const { candidates } = await planPaths(fileSystem, {
				maxDepth: 1,
				root: "/r",
				whitelistPaths: ["/r/x/y/deep"],
			});

			expect(candidates).toEqual([
				{ connector: true, depthFromRoot: 0, path: "/r", type: "directory" },
				{ connector: true, depthFromRoot: 1, path: "/r/x", type: "directory" },
				{ connector: false, depthFromRoot: 1, path: "/r/z", type: "directory" },
				{ connector: true, depthFromRoot: 2, path: "/r/x/y", type: "directory" },
				{ connector: false, depthFromRoot: 3, path: "/r/x/y/deep", type: "directory" },
			]);
		});

		it("stops at a missing path with a warning", async () => {
			const fileSystem = new MemoryFileSystem().addDirectory("/r/x");

			const { paths, warnings } = await planPaths(fileSystem, {
				maxDepth: 1,
				root: "/r",
				whitelistPaths: ["/r/x/gone/deeper"],
			});

			expect(paths).toEqual(["/r", "/r/x"]);
			expect(warnings.toArray().map((warning) => warning.message)).toEqual([
				"Path vanished: /r/x/gone (ENOENT: lstat '/r/x/gone')",
			]);
		});

		it("stops at a device boundary with one-file-system", async () => {
			const fileSystem = new MemoryFileSystem()
				.addDirectory("/r/m", { device: 2 })
				.addDirectory("/r/m/a/b");

			const { paths, warnings } = await planPaths(fileSystem, {
				maxDepth: 1,
				oneFileSystem: true,
				root: "/r",
				whitelistPaths: ["/r/m/a/b"],
			});

			expect(paths).toEqual(["/r", "/r/m"]);
			expect(warnings.toArray().map(({ code, path }) => [code, path])).toEqual([
				["cross-device", "/r/m/a"],
			]);
		});

		it("finds directories matching a whitelist pattern below the bound", async () => {
			const fileSystem = new MemoryFileSystem()
				.addDirectory("/r/a/b/node_modules/pkg")
				.addFile("/r/a/c/file", 1)
				.addDirectory("/r/e");

			const { candidates } = await planPaths(fileSystem, {
				maxDepth: 1,
				root: "/r",
				whitelist: ["node_modules"],
			});

			expect(candidates).toEqual([
				{ connector: true, depthFromRoot: 0, path: "/r", type: "directory" },
				{ connector: true, depthFromRoot: 1, path: "/r/a", type: "directory" },
				{ connector: true, depthFromRoot: 2, path: "/r/a/b", type: "directory" },
				{ connector: false, depthFromRoot: 3, path: "/r/a/b/node_modules", type: "directory" },
				{ connector: false, depthFromRoot: 1, path: "/r/e", type: "directory" },
			]);
		});

		it("stops at the topmost pattern match", async () => {
			const fileSystem = new MemoryFileSystem()
				.addDirectory("/r/node_modules/inner/node_modules")
				.addDirectory("/r/src");

			const { paths } = await planPaths(fileSystem, {
				maxDepth: 0,
				root: "/r",
				whitelist: ["node_modules"],
			});

			expect(paths).toEqual(["/r", "/r/node_modules"]);
		});
	});
});
