import path from "node:path";
import picomatch from "picomatch";

import { componentsBelow, stripTrailingSeparator } from "../utils/path";
import { ConfigError } from "./errors";

/** Prefix that marks a pattern as a regular expression. */
export const REGEX_PREFIX = "regex:";

export type Pattern = GlobPattern | RegexPattern;

export interface GlobPattern {
	readonly kind: "glob";
	/** Compiled once per pattern; see {@link matches} for what it is tested against. */
	readonly matcher: picomatch.Matcher;
	readonly text: string;
	/** Components a relative glob spans; 0 for an absolute glob. */
	readonly width: number;
}

export interface RegexPattern {
	readonly kind: "regex";
	readonly regex: RegExp;
	readonly text: string;
}

export type PatternSet = ReadonlyArray<Pattern>;

const GLOB_OPTIONS: picomatch.PicomatchOptions = { dot: true };

/**
 * Parse one raw pattern string.
 *
 * @param raw - Pattern text; `regex:` marks a regular expression.
 * @returns The pattern, or undefined for blank input.
 * @throws {ConfigError} When a regex body is empty or invalid.
 */
export function parsePattern(raw: string): Pattern | undefined {
	const text = raw.trim();
	if (text.length === 0) {
		return undefined;
	}

	if (!text.startsWith(REGEX_PREFIX)) {
		return compileGlob(text);
	}

	const body = text.slice(REGEX_PREFIX.length);
	if (body.length === 0) {
		throw new ConfigError(`Empty regex pattern: "${text}"`);
	}

	try {
		return { kind: "regex", regex: new RegExp(body), text };
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new ConfigError(`Invalid regex pattern "${body}": ${reason}`);
	}
}

/**
 * Merge pattern sources in order, keeping the first occurrence of each
 * pattern and skipping blank entries.
 *
 * @param sources - Raw pattern lists, highest precedence first.
 * @returns The merged pattern set.
 */
export function buildPatternSet(sources: ReadonlyArray<ReadonlyArray<string>>): PatternSet {
	const seen = new Set<string>();
	const patterns: Array<Pattern> = [];

	for (const source of sources) {
		for (const raw of source) {
			const pattern = parsePattern(raw);
			if (pattern === undefined || seen.has(pattern.text)) {
				continue;
			}

			seen.add(pattern.text);
			patterns.push(pattern);
		}
	}

	return patterns;
}

/** True for a glob anchored at the filesystem root. */
export function isAbsoluteGlob(pattern: Pattern): pattern is GlobPattern {
	return pattern.kind === "glob" && path.isAbsolute(pattern.text);
}

/** True for an absolute glob without wildcards, i.e. a plain path. */
export function isLiteralPath(pattern: Pattern): pattern is GlobPattern {
	return isAbsoluteGlob(pattern) && !picomatch.scan(pattern.text).isGlob;
}

/**
 * Match a path against one pattern.
 *
 * - Regex: searched anywhere in the absolute path.
 * - Absolute glob: matches the path or any of its ancestors.
 * - Relative glob with a separator: matches a run of consecutive components.
 * - Relative glob without one: matches a single component exactly.
 *
 * @param target - Absolute candidate path.
 * @param pattern - The pattern to evaluate.
 * @param root - When given, relative globs only see components below it.
 * @returns True on a match.
 */
export function matches(target: string, pattern: Pattern, root?: string): boolean {
	if (pattern.kind === "regex") {
		return pattern.regex.test(target);
	}

	const { matcher, width } = pattern;
	if (width === 0) {
		const runs = prefixes(componentsBelow(target));
		return runs.length === 0 ? matcher("") : runs.some((run) => matcher(run));
	}

	const components = componentsBelow(target, root);
	if (width === 1) {
		return components.some((component) => matcher(component));
	}

	if (pattern.text.includes("**")) {
		return prefixes(components).some((run) => matcher(run));
	}

	for (let start = 0; start + width <= components.length; start++) {
		if (matcher(components.slice(start, start + width).join(path.sep))) {
			return true;
		}
	}

	return false;
}

/**
 * True if any pattern in the set matches.
 *
 * @param target - Absolute candidate path.
 * @param patterns - The pattern set.
 * @param root - Scan root for relative globs.
 * @returns True on the first match.
 */
export function matchesAny(target: string, patterns: PatternSet, root?: string): boolean {
	return patterns.some((pattern) => matches(target, pattern, root));
}

function compileGlob(text: string): GlobPattern {
	const globText = stripTrailingSeparator(text);

	if (path.isAbsolute(globText)) {
		// Ancestors are tested as "a", "a/b", ...; the bare root covers everything.
		const matcher =
			globText === path.sep ? () => true : picomatch(globText.slice(1), GLOB_OPTIONS);
		return { kind: "glob", matcher, text, width: 0 };
	}

	const width = globText.split(path.sep).length;
	const source = width > 1 && globText.includes("**") ? `**/${globText}` : globText;
	return { kind: "glob", matcher: picomatch(source, GLOB_OPTIONS), text, width };
}

/** `["a", "b"]` becomes `["a", "a/b"]`. */
function prefixes(components: ReadonlyArray<string>): Array<string> {
	const result: Array<string> = [];
	for (let end = 1; end <= components.length; end++) {
		result.push(components.slice(0, end).join(path.sep));
	}

	return result;
}
