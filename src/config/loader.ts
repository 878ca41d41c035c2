import { type } from "arktype";
import { loadConfig } from "c12";
import process from "node:process";

import { ConfigError } from "../scan/errors";
import { logger } from "../utils/logger";
import { defaults } from "./defaults";
import { configSchema, type ResolvedConfig } from "./schema";

/**
 * Load `dirscope.config.*` (or the `dirscope` key of package.json) from a
 * directory and merge it over the defaults.
 *
 * @param cwd - Directory to search; the process directory by default.
 * @returns The validated configuration.
 * @throws {ConfigError} When the file does not match the schema.
 */
export async function loadProjectConfig(cwd: string = process.cwd()): Promise<ResolvedConfig> {
	const { config: rawConfig, configFile } = await loadConfig({
		cwd,
		defaults,
		name: "dirscope",
		packageJson: true,
	});

	const validated = configSchema(rawConfig);

	if (validated instanceof type.errors) {
		throw new ConfigError(`Invalid configuration: ${validated.summary}`);
	}

	logger.debug(`Loaded configuration from ${configFile ?? "defaults"}`);
	return { ...defaults, ...validated };
}
