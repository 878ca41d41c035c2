import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { ConfigError, getErrorCode } from "../scan/errors";

/**
 * Read a pattern file: one pattern per line, blank lines and lines starting
 * with `#` skipped, surrounding whitespace trimmed.
 *
 * @param filePath - File to read.
 * @returns The patterns in file order.
 * @throws {ConfigError} When the file is missing or unreadable.
 */
export async function loadPatternFile(filePath: string): Promise<Array<string>> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err) {
		const reason = getErrorCode(err) === "ENOENT" ? "does not exist" : "cannot be read";
		throw new ConfigError(`Pattern file ${reason}: ${filePath}`, { cause: err });
	}

	return content
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Locate the default pattern files for a name: the one in the scan root
 * first, then the one in the home directory. Missing files are skipped.
 *
 * @example
 *
 * ```ts
 * await findPatternFiles("/srv/data", ".dirscope-ignore");
 * // ["/srv/data/.dirscope-ignore", "/home/me/.dirscope-ignore"]
 * ```
 *
 * @param root - The scan root.
 * @param name - File name to look for.
 * @param homeDirectory - Overrides the home directory.
 * @returns Existing files, local before home, without duplicates.
 */
export async function findPatternFiles(
	root: string,
	name: string,
	homeDirectory: string = os.homedir(),
): Promise<Array<string>> {
	const candidates = [path.join(root, name), path.join(homeDirectory, name)];
	const found: Array<string> = [];

	for (const candidate of candidates) {
		if (!found.includes(candidate) && (await isFile(candidate))) {
			found.push(candidate);
		}
	}

	return found;
}

async function isFile(filePath: string): Promise<boolean> {
	try {
		const stats = await fs.stat(filePath);
		return stats.isFile();
	} catch (err) {
		if (getErrorCode(err) === "ENOENT" || getErrorCode(err) === "ENOTDIR") {
			return false;
		}

		throw err;
	}
}
