import { spawn } from "node:child_process";
import process from "node:process";

import { logger } from "./logger";

export interface RunOptions {
	/** Environment variables merged over the current environment. */
	readonly env?: Record<string, string | undefined>;
}

export interface RunResult {
	readonly exitCode: number;
	readonly stderr: string;
	readonly stdout: string;
}

/** Error thrown when a command fails. */
export class RunError extends Error {
	public readonly args: ReadonlyArray<string>;
	public readonly command: string;
	public readonly exitCode: number;
	public readonly stderr: string;
	public readonly stdout: string;

	public override name = "RunError";

	constructor(
		command: string,
		args: ReadonlyArray<string>,
		exitCode: number,
		stdout: string,
		stderr: string,
	) {
		super(`Command failed: ${command} ${args.join(" ")}`);
		this.command = command;
		this.args = args;
		this.exitCode = exitCode;
		this.stdout = stdout;
		this.stderr = stderr;
	}
}

/**
 * Execute a command with an explicit argument vector and capture its output.
 * No shell is involved, so arguments are never re-parsed.
 *
 * @param command - The executable to run (e.g., "du").
 * @param args - Arguments passed verbatim to the command.
 * @param options - Extra environment for the command.
 * @returns Promise resolving to the run result.
 * @throws {RunError} When the command exits non-zero or cannot be started.
 */
export async function run(
	command: string,
	args: ReadonlyArray<string> = [],
	options: RunOptions = {},
): Promise<RunResult> {
	logger.debug(`${command} ${args.join(" ")}`);

	return new Promise<RunResult>((resolve, reject) => {
		const child = spawn(command, [...args], {
			env: { ...process.env, ...options.env },
			stdio: ["ignore", "pipe", "pipe"],
		});

		const stdout: Array<Buffer> = [];
		const stderr: Array<Buffer> = [];
		child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

		child.once("error", (err) => {
			const result = new RunError(command, args, -1, "", err.message);
			result.cause = err;
			reject(result);
		});

		child.once("close", (code) => {
			const exitCode = code ?? -1;
			const output = {
				exitCode,
				stderr: Buffer.concat(stderr).toString("utf8"),
				stdout: Buffer.concat(stdout).toString("utf8"),
			};

			if (exitCode !== 0) {
				reject(new RunError(command, args, exitCode, output.stdout, output.stderr));
				return;
			}

			resolve(output);
		});
	});
}
