import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../scan/errors";
import { defaults } from "./defaults";
import { parseLevel, parseScanOptions, resolveRunSettings, splitList } from "./resolve";

describe("parseLevel", () => {
	it("accepts integers and unlimited", () => {
		expect(parseLevel("0")).toBe(0);
		expect(parseLevel("3")).toBe(3);
		expect(parseLevel("Unlimited")).toBe(Number.POSITIVE_INFINITY);
		expect(parseLevel(2)).toBe(2);
	});

	it("rejects anything else", () => {
		expect(() => parseLevel("-1")).toThrow(ConfigError);
		expect(() => parseLevel("two")).toThrow(
			'Level must be a non-negative integer or "unlimited", got "two"',
		);
	});
});

describe("splitList", () => {
	it("splits on commas and drops blanks", () => {
		expect(splitList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
		expect(splitList(undefined)).toEqual([]);
	});
});

describe("parseScanOptions", () => {
	it("rejects an unknown sort key", () => {
		expect(() => parseScanOptions({ sort: "mtime" })).toThrow(ConfigError);
	});
});

describe("resolveRunSettings", () => {
	let cwd: string;
	let home: string;

	beforeEach(async () => {
		cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dirscope-cwd-"));
		home = await fs.mkdtemp(path.join(os.tmpdir(), "dirscope-home-"));
	});

	afterEach(async () => {
		await fs.rm(cwd, { force: true, recursive: true });
		await fs.rm(home, { force: true, recursive: true });
	});

	it("falls back to the config and then the defaults", async () => {
		const settings = await resolveRunSettings(
			undefined,
			{},
			{ ...defaults, level: "unlimited", minSize: "1K" },
			{ cwd, homeDirectory: home },
		);

		expect(settings.scan.root).toBe(cwd);
		expect(settings.scan.maxDepth).toBe(Number.POSITIVE_INFINITY);
		expect(settings.scan.minSize).toBe(1024);
		expect(settings.scan.sortKey).toBe("size");
		expect(settings.jobs).toBe(8);
		expect(settings.format).toBe("relative");
	});

	it("lets command-line flags win over the config", async () => {
		const settings = await resolveRunSettings(
			"sub",
			{ bytes: true, jobs: "2", level: "4", sort: "name", tree: true },
			{ ...defaults, level: 2, sort: "size", tree: false },
			{ cwd, homeDirectory: home },
		);

		expect(settings.scan.root).toBe(path.join(cwd, "sub"));
		expect(settings.scan.maxDepth).toBe(4);
		expect(settings.scan.sortKey).toBe("name");
		expect(settings.scan.tree).toBe(true);
		expect(settings.isBytes).toBe(true);
		expect(settings.jobs).toBe(2);
	});

	it("collects patterns from every source in order", async () => {
		await fs.writeFile(path.join(cwd, "extra-ignore"), "from-file\n");
		await fs.writeFile(path.join(cwd, ".dirscope-ignore"), "# local\nfrom-local\n");
		await fs.writeFile(path.join(home, ".dirscope-ignore"), "from-home\n");

		const settings = await resolveRunSettings(
			undefined,
			{ blacklist: "inline-a,inline-b", blacklistFile: "extra-ignore" },
			{ ...defaults, blacklist: ["from-config"] },
			{ cwd, homeDirectory: home },
		);

		expect(settings.scan.blacklist).toEqual([
			"inline-a",
			"inline-b",
			"from-file",
			"from-config",
			"from-local",
			"from-home",
		]);
		expect(settings.scan.whitelist).toEqual([]);
	});

	it("resolves whitelist paths against the working directory", async () => {
		const settings = await resolveRunSettings(
			undefined,
			{ whitelistPath: "a/b, /abs" },
			{ ...defaults, whitelistPaths: ["c"] },
			{ cwd, homeDirectory: home },
		);

		expect(settings.scan.whitelistPaths).toEqual([
			path.join(cwd, "a/b"),
			"/abs",
			path.join(cwd, "c"),
		]);
	});

	it("rejects a bad job count", async () => {
		await expect(
			resolveRunSettings(undefined, { jobs: "0" }, defaults, { cwd, homeDirectory: home }),
		).rejects.toThrow('Jobs must be a positive integer, got "0"');
	});

	it("fails on a missing pattern file", async () => {
		await expect(
			resolveRunSettings(undefined, { whitelistFile: "nope" }, defaults, {
				cwd,
				homeDirectory: home,
			}),
		).rejects.toThrow(ConfigError);
	});
});
