import { RunError, run } from "../utils/run";
import type { MeasureOptions, SizeService } from "./types";

const BYTES_PER_KIB = 1024;

/** Untranslated messages and plain number formatting. */
const DU_ENV = { LC_ALL: "C" };

/**
 * Size service backed by the system `du`. Sizes are disk usage in KiB blocks,
 * so they differ from the apparent sizes {@link FsSizeService} reports.
 */
export class DuSizeService implements SizeService {
	public async measure(target: string, options: MeasureOptions): Promise<number> {
		const args = buildDuArgs(target, options);

		try {
			const { stdout } = await run("du", args, { env: DU_ENV });
			return parseDuOutput(stdout, target);
		} catch (err) {
			// du exits 1 when part of the tree was unreadable but still prints a total.
			if (err instanceof RunError && hasTotal(err.stdout)) {
				await options.onWarning?.(target, err);
				return parseDuOutput(err.stdout, target);
			}

			throw err;
		}
	}
}

/**
 * Argument vector for `du`. The path always follows `--`, so a name starting
 * with a dash is never read as an option.
 */
export function buildDuArgs(target: string, options: MeasureOptions): Array<string> {
	return [
		"-s",
		"-k",
		...(options.oneFileSystem ? ["-x"] : []),
		...(options.followSymlinks ? ["-L"] : []),
		"--",
		target,
	];
}

/**
 * Read the size from `du -s -k` output.
 *
 * @param stdout - Raw output, `<kib>\t<path>` on the first line.
 * @param target - The measured path, for the error message.
 * @returns The size in bytes.
 * @throws {Error} When the first field is not a number.
 */
export function parseDuOutput(stdout: string, target: string): number {
	const [firstLine = ""] = stdout.split("\n");
	const [field = ""] = firstLine.trim().split(/\s+/);
	if (!/^\d+$/.test(field)) {
		throw new Error(`Unexpected du output for ${target}: ${JSON.stringify(firstLine)}`);
	}

	return Number.parseInt(field, 10) * BYTES_PER_KIB;
}

function hasTotal(stdout: string): boolean {
	return /^\d+\s/.test(stdout.trimStart());
}
