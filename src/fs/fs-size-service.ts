import path from "node:path";

import { identityOf } from "../scan/context";
import { nodeFileSystem } from "./node-file-system";
import type { FileSystem, MeasureOptions, SizeService } from "./types";

interface DirectoryVisit {
	/** `dev:ino` of every directory from the measured path down to here. */
	readonly ancestors: ReadonlySet<string>;
	readonly device: number;
	readonly options: MeasureOptions;
	readonly path: string;
}

/**
 * Size service that walks the tree itself and sums apparent file sizes.
 * Directory entries add nothing; a hard-linked file counts once per link.
 *
 * A followed link to any directory on the measured path's own chain, from
 * the filesystem root down, counts as a loop. The loop guard of a directory
 * is therefore fixed by its path, which keeps the per-path memo of directory
 * totals valid whichever lookup reaches a directory first.
 *
 * One instance must only serve a single run over an unchanging tree.
 */
export class FsSizeService implements SizeService {
	private readonly directoryTotals = new Map<string, Promise<number>>();

	constructor(private readonly fileSystem: FileSystem = nodeFileSystem) {}

	public async measure(target: string, options: MeasureOptions): Promise<number> {
		const stat = options.followSymlinks
			? await this.fileSystem.stat(target)
			: await this.fileSystem.lstat(target);

		if (stat.type !== "directory") {
			return stat.size;
		}

		const ancestors = await this.chainIdentities(target);
		const key = identityOf(stat);
		if (ancestors.has(key)) {
			throw loopError(target);
		}

		ancestors.add(key);
		return this.measureDirectory({ ancestors, device: stat.dev, options, path: target });
	}

	/** Identities of every directory above `target`, up to the filesystem root. */
	private async chainIdentities(target: string): Promise<Set<string>> {
		const identities = new Set<string>();
		let current = target;
		let parent = path.dirname(current);

		while (parent !== current) {
			identities.add(identityOf(await this.fileSystem.stat(parent)));
			current = parent;
			parent = path.dirname(current);
		}

		return identities;
	}

	private async measureChild(childPath: string, parent: DirectoryVisit): Promise<number> {
		const { fileSystem } = this;
		const { options } = parent;

		let stat = await fileSystem.lstat(childPath);
		if (stat.type === "symlink" && options.followSymlinks) {
			stat = await fileSystem.stat(childPath);
		}

		if (options.oneFileSystem && stat.dev !== parent.device) {
			return 0;
		}

		if (stat.type !== "directory") {
			return stat.size;
		}

		const key = identityOf(stat);
		if (parent.ancestors.has(key)) {
			throw loopError(childPath);
		}

		return this.measureDirectory({
			ancestors: new Set([...parent.ancestors, key]),
			device: parent.device,
			options,
			path: childPath,
		});
	}

	private async measureDirectory(visit: DirectoryVisit): Promise<number> {
		const cached = this.directoryTotals.get(visit.path);
		if (cached) {
			return cached;
		}

		const pending = this.sumDirectory(visit);
		this.directoryTotals.set(visit.path, pending);
		return pending;
	}

	private async sumDirectory(visit: DirectoryVisit): Promise<number> {
		let names: Array<string>;
		try {
			names = await this.fileSystem.readdir(visit.path);
		} catch (err) {
			await visit.options.onWarning?.(visit.path, err);
			return 0;
		}

		let total = 0;
		for (const name of names) {
			const childPath = path.join(visit.path, name);
			try {
				total += await this.measureChild(childPath, visit);
			} catch (err) {
				await visit.options.onWarning?.(childPath, err);
			}
		}

		return total;
	}
}

function loopError(target: string): NodeJS.ErrnoException {
	const err: NodeJS.ErrnoException = new Error(
		`Symlink leads back to one of its own ancestors: ${target}`,
	);
	err.code = "ELOOP";
	err.path = target;
	return err;
}
