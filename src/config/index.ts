import type { Config } from "./schema";

export { createProjectConfig } from "./create";
export { loadProjectConfig } from "./loader";

/**
 * Define a typed configuration for dirscope.
 *
 * @example
 *
 * ```typescript
 * import { defineConfig } from "dirscope";
 *
 * export default defineConfig({
 * 	level: "unlimited",
 * 	whitelist: ["regex:\\.cache$"],
 * });
 * ```
 *
 * @param config - The configuration object.
 * @returns The same configuration object with type checking.
 */
export function defineConfig(config: Config): Config {
	return config;
}
