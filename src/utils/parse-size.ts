import { ConfigError } from "../scan/errors";

const MULTIPLIERS: Readonly<Record<string, number>> = {
	"": 1,
	"B": 1,
	"G": 1024 ** 3,
	"K": 1024,
	"M": 1024 ** 2,
	"P": 1024 ** 5,
	"T": 1024 ** 4,
};

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/i;

/**
 * Parse a human-readable size into bytes. Units are binary and
 * case-insensitive; `K`, `KB` and `KiB` all mean 1024.
 *
 * @example
 *
 * ```ts
 * parseSize("10M"); // 10485760
 * parseSize("1.5k"); // 1536
 * ```
 *
 * @param input - Size string such as `512`, `10M` or `1.5GiB`.
 * @returns The size in whole bytes.
 * @throws {ConfigError} When the string is not a recognised size.
 */
export function parseSize(input: string): number {
	const trimmed = input.trim();
	const match = SIZE_PATTERN.exec(trimmed);
	if (match?.[1] === undefined) {
		throw new ConfigError(`Invalid size format: "${input}"`);
	}

	const unit = normalizeUnit(match[2] ?? "");
	const multiplier = MULTIPLIERS[unit];
	if (multiplier === undefined) {
		throw new ConfigError(`Invalid size unit in "${input}"`);
	}

	return Math.floor(Number(match[1]) * multiplier);
}

function normalizeUnit(unit: string): string {
	const upper = unit.toUpperCase();
	if (upper.length === 3 && upper.endsWith("IB")) {
		return upper.slice(0, 1);
	}

	if (upper.length === 2 && upper.endsWith("B")) {
		return upper.slice(0, 1);
	}

	return upper;
}
