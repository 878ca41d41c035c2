import { beforeEach, describe, expect, it, vi } from "vitest";

import { RunError, run } from "../utils/run";
import { DuSizeService, buildDuArgs, parseDuOutput } from "./du-size-service";
import type { MeasureOptions } from "./types";

vi.mock("../utils/run", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../utils/run")>();
	return { ...actual, run: vi.fn() };
});

const runMock = vi.mocked(run);
const options: MeasureOptions = { followSymlinks: false, oneFileSystem: false };

describe("buildDuArgs", () => {
	it("maps flags and always ends options before the path", () => {
		expect(buildDuArgs("/data", options)).toEqual(["-s", "-k", "--", "/data"]);
		expect(buildDuArgs("-odd", { followSymlinks: true, oneFileSystem: true })).toEqual([
			"-s",
			"-k",
			"-x",
			"-L",
			"--",
			"-odd",
		]);
	});
});

describe("parseDuOutput", () => {
	it("converts the first field from KiB to bytes", () => {
		expect(parseDuOutput("12\t/data\n", "/data")).toBe(12 * 1024);
	});

	it("rejects output without a number", () => {
		expect(() => parseDuOutput("garbage", "/data")).toThrow(
			'Unexpected du output for /data: "garbage"',
		);
	});
});

describe("DuSizeService", () => {
	beforeEach(() => {
		runMock.mockReset();
	});

	it("runs du with an argument vector", async () => {
		runMock.mockResolvedValue({ exitCode: 0, stderr: "", stdout: "8\t/data\n" });

		await expect(new DuSizeService().measure("/data", options)).resolves.toBe(8192);
		expect(runMock).toHaveBeenCalledWith("du", ["-s", "-k", "--", "/data"], {
			env: { LC_ALL: "C" },
		});
	});

	it("keeps the total du prints despite a partial failure", async () => {
		const failure = new RunError("du", [], 1, "4\t/data\n", "du: cannot read directory");
		runMock.mockRejectedValue(failure);
		const onWarning = vi.fn();

		await expect(new DuSizeService().measure("/data", { ...options, onWarning })).resolves.toBe(
			4096,
		);
		expect(onWarning).toHaveBeenCalledWith("/data", failure);
	});

	it("rethrows when du printed nothing", async () => {
		const failure = new RunError("du", [], 1, "", "du: cannot access '/data'");
		runMock.mockRejectedValue(failure);

		await expect(new DuSizeService().measure("/data", options)).rejects.toBe(failure);
	});
});
