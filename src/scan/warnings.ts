import { getErrorCode } from "./errors";

export type WarningCode =
	| "cross-device"
	| "measure-failed"
	| "missing"
	| "outside-root"
	| "pattern-file"
	| "permission-denied"
	| "symlink-loop";

export interface ScanWarning {
	readonly code: WarningCode;
	/** `config` warnings come from option validation, `traversal` ones from the walk. */
	readonly kind: "config" | "traversal";
	readonly message: string;
	readonly path: string;
}

/**
 * Ordered, run-scoped collection of non-fatal diagnostics. The CLI flushes it
 * after the report so warnings never interleave with results.
 */
export class WarningLog {
	private readonly seen = new Set<string>();
	private readonly warnings: Array<ScanWarning> = [];

	public get size(): number {
		return this.warnings.length;
	}

	/**
	 * Record a warning unless one with the same code and path exists already.
	 *
	 * @param warning - The warning to record.
	 * @returns True if the warning was new.
	 */
	public add(warning: ScanWarning): boolean {
		const key = `${warning.code}\0${warning.path}`;
		if (this.seen.has(key)) {
			return false;
		}

		this.seen.add(key);
		this.warnings.push(warning);
		return true;
	}

	public config(code: WarningCode, path: string, message: string): boolean {
		return this.add({ code, kind: "config", message, path });
	}

	/**
	 * Record a traversal warning for an I/O failure, classifying it by errno.
	 *
	 * @param path - The path that failed.
	 * @param err - The error thrown by the filesystem or size service.
	 * @returns True if the warning was new.
	 */
	public fromError(path: string, err: unknown): boolean {
		const code = classifyError(err);
		const detail = err instanceof Error ? err.message : String(err);
		return this.traversal(code, path, `${describe(code)}: ${path} (${detail})`);
	}

	public toArray(): ReadonlyArray<ScanWarning> {
		return [...this.warnings];
	}

	public traversal(code: WarningCode, path: string, message: string): boolean {
		return this.add({ code, kind: "traversal", message, path });
	}
}

function classifyError(err: unknown): WarningCode {
	switch (getErrorCode(err)) {
		case "EACCES":
		case "EPERM": {
			return "permission-denied";
		}
		case "ELOOP": {
			return "symlink-loop";
		}
		case "ENOENT":
		case "ENOTDIR": {
			return "missing";
		}
		default: {
			return "measure-failed";
		}
	}
}

function describe(code: WarningCode): string {
	switch (code) {
		case "missing": {
			return "Path vanished";
		}
		case "permission-denied": {
			return "Permission denied";
		}
		case "symlink-loop": {
			return "Symlink loop detected";
		}
		default: {
			return "Could not read";
		}
	}
}
