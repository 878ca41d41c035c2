/** Process exit codes reported by the CLI. */
export const EXIT_CODES = {
	allFailed: 3,
	config: 1,
	success: 0,
	target: 2,
} as const;

/** Bad arguments or configuration, raised before any traversal starts. */
export class ConfigError extends Error {
	public override name = "ConfigError";
}

/** The scan root is missing, is not a directory, or cannot be read. */
export class TargetError extends Error {
	public readonly target: string;

	public override name = "TargetError";

	constructor(target: string, reason: string) {
		super(`Target directory ${reason}: ${target}`);
		this.target = target;
	}
}

/** Every candidate failed with an I/O warning and nothing was measured. */
export class AllFailedError extends Error {
	public readonly candidateCount: number;

	public override name = "AllFailedError";

	constructor(candidateCount: number) {
		super(`All ${candidateCount} path(s) failed with I/O errors`);
		this.candidateCount = candidateCount;
	}
}

/**
 * Maps an error raised anywhere in a run to the process exit code.
 *
 * @param err - The caught value.
 * @returns The exit code for the CLI.
 */
export function exitCodeFor(err: unknown): number {
	if (err instanceof TargetError) {
		return EXIT_CODES.target;
	}

	if (err instanceof AllFailedError) {
		return EXIT_CODES.allFailed;
	}

	return EXIT_CODES.config;
}

export function getErrorCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}

	return undefined;
}
