import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors";
import { createScanConfig } from "./scan-config";
import { WarningLog } from "./warnings";

describe("createScanConfig", () => {
	it("fills in defaults and freezes the result", () => {
		const config = createScanConfig({ root: "/r/" }, new WarningLog());

		expect(config).toMatchObject({
			all: false,
			cut: 0,
			maxDepth: 1,
			minSize: 0,
			reverse: false,
			root: "/r",
			sortKey: "size",
			tree: false,
		});
		expect(Object.isFrozen(config)).toBe(true);
	});

	it("accepts an unbounded depth", () => {
		const config = createScanConfig(
			{ maxDepth: Number.POSITIVE_INFINITY, root: "/r" },
			new WarningLog(),
		);

		expect(config.maxDepth).toBe(Number.POSITIVE_INFINITY);
	});

	it("rejects bad depths and sizes", () => {
		const warnings = new WarningLog();

		expect(() => createScanConfig({ maxDepth: -1, root: "/r" }, warnings)).toThrow(ConfigError);
		expect(() => createScanConfig({ maxDepth: 1.5, root: "/r" }, warnings)).toThrow(ConfigError);
		expect(() => createScanConfig({ minSize: -1, root: "/r" }, warnings)).toThrow(
			"min-size must be a non-negative size, got -1",
		);
		expect(() => createScanConfig({ root: "/r", whitelist: ["regex:["] }, warnings)).toThrow(
			ConfigError,
		);
	});

	it("turns literal absolute whitelist patterns into whitelist paths", () => {
		const config = createScanConfig(
			{ root: "/r", whitelist: ["/r/deep/x", "*.tmp", "/elsewhere"] },
			new WarningLog(),
		);

		expect(config.whitelistPaths).toEqual(["/r/deep/x"]);
		expect(config.whitelist.map((pattern) => pattern.text)).toEqual(["*.tmp"]);
	});

	it("records a warning for whitelist paths outside the root", () => {
		const warnings = new WarningLog();

		createScanConfig({ root: "/data", whitelistPaths: ["/data2/foo"] }, warnings);

		expect(warnings.toArray().map((warning) => warning.path)).toEqual(["/data2/foo"]);
	});
});
