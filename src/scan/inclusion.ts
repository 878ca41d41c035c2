import path from "node:path";

import { isSameOrDescendant, stripTrailingSeparator } from "../utils/path";
import { matchesAny } from "./pattern";
import type { ScanConfig } from "./types";
import type { WarningLog } from "./warnings";

type InclusionRules = Pick<ScanConfig, "blacklist" | "root" | "whitelist" | "whitelistPaths">;

/**
 * True if the config carries any whitelist rule. When it does, the blacklist
 * is never consulted.
 */
export function hasWhitelist(config: InclusionRules): boolean {
	return config.whitelist.length > 0 || config.whitelistPaths.length > 0;
}

/**
 * A path is exempt from the size filters when it matches the whitelist or
 * lies at or below an explicit whitelist path.
 *
 * @param target - Absolute candidate path.
 * @param config - The run's rules.
 * @returns True if the size filters must keep the path.
 */
export function isExempt(target: string, config: InclusionRules): boolean {
	return (
		config.whitelistPaths.some((whitelistPath) => isSameOrDescendant(target, whitelistPath)) ||
		matchesAny(target, config.whitelist, config.root)
	);
}

/**
 * Decide whether a path belongs in the report. A non-empty whitelist takes
 * total precedence; otherwise the blacklist excludes; otherwise everything is
 * included.
 *
 * @param target - Absolute candidate path.
 * @param config - The run's rules.
 * @returns True if the path is included.
 */
export function shouldInclude(target: string, config: InclusionRules): boolean {
	if (hasWhitelist(config)) {
		return isExempt(target, config);
	}

	if (config.blacklist.length > 0) {
		return !matchesAny(target, config.blacklist, config.root);
	}

	return true;
}

/**
 * Keep the whitelist paths that lie at or below the root. Each dropped path
 * produces exactly one config warning naming it and the root.
 *
 * @param paths - Configured whitelist paths.
 * @param root - The scan root.
 * @param warnings - The run's warning log.
 * @returns The active whitelist paths, normalized and deduplicated.
 */
export function validateWhitelistPaths(
	paths: ReadonlyArray<string>,
	root: string,
	warnings: WarningLog,
): Array<string> {
	const active: Array<string> = [];

	for (const raw of paths) {
		const normalized = stripTrailingSeparator(path.resolve(raw));
		if (!isSameOrDescendant(normalized, root)) {
			warnings.config(
				"outside-root",
				normalized,
				`Whitelist path '${normalized}' is outside the target directory '${root}'; ignoring it.`,
			);
			continue;
		}

		if (!active.includes(normalized)) {
			active.push(normalized);
		}
	}

	return active;
}
