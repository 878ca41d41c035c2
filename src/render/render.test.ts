import { describe, expect, it } from "vitest";

import { assembleTree, emitTree } from "../scan/assembler";
import type { SizedEntry } from "../scan/types";
import { type RenderOptions, renderFlat, renderTree } from "./render";

function entry(path: string, sizeBytes: number): SizedEntry {
	return { connector: false, depthFromRoot: 0, path, sizeBytes, type: "directory" };
}

const plain: RenderOptions = {
	format: "relative",
	isBytes: false,
	isColorEnabled: false,
	root: "/r",
};

describe("renderFlat", () => {
	const entries = [entry("/r/a", 512), entry("/r", 2.5 * 1024 * 1024)];

	it("pads the size column and prints relative paths", () => {
		expect(renderFlat(entries, plain)).toEqual([
			"512 B         a",
			"2.50 MiB      .",
		]);
	});

	it("supports absolute and basename paths", () => {
		expect(renderFlat(entries, { ...plain, format: "absolute" })).toEqual([
			"512 B         /r/a",
			"2.50 MiB      /r",
		]);
		expect(renderFlat(entries, { ...plain, format: "basename" })).toEqual([
			"512 B         a",
			"2.50 MiB      r",
		]);
	});

	it("prints raw byte counts", () => {
		expect(renderFlat(entries, { ...plain, isBytes: true })).toEqual([
			"512           a",
			"2621440       .",
		]);
	});
});

describe("renderTree", () => {
	const config = { reverse: false, root: "/r", sortKey: "size" } as const;

	it("draws connectors and continuation guides", () => {
		const nodes = emitTree(
			assembleTree(
				[
					entry("/r", 300),
					entry("/r/a", 200),
					entry("/r/a/x", 50),
					entry("/r/b", 100),
					entry("/r/b/y", 10),
				],
				config,
			),
		);

		expect(renderTree(nodes, { ...plain, isBytes: true })).toEqual([
			"300           r",
			"100           ├── b",
			"10            │   └── y",
			"200           └── a",
			"50                └── x",
		]);
	});

	it("names a reparented orphan by its path below the root", () => {
		const nodes = emitTree(assembleTree([entry("/r", 300), entry("/r/a/x", 50)], config));

		expect(renderTree(nodes, { ...plain, isBytes: true })).toEqual([
			"300           r",
			"50            └── a/x",
		]);
	});
});
