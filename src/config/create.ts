import { updateConfig } from "c12/update";
import dedent from "dedent";
import { CONFIG_FILE } from "src/constants";

import { logger } from "../utils/logger";

/**
 * Write a starter `dirscope.config.ts` in the current directory. An existing
 * config file is left as it is.
 *
 * @param cwd - Directory to write into.
 * @returns The path of the config file and whether it was created.
 */
export async function createProjectConfig(
	cwd = ".",
): Promise<{ configFile: string | undefined; isCreated: boolean }> {
	const { configFile, created } = await updateConfig({
		configFile: CONFIG_FILE,
		createExtension: ".ts",
		cwd,
		onCreate: ({ configFile: filePath }) => {
			logger.info(`Creating new config file: ${filePath}`);
			return dedent`
				import { defineConfig } from "dirscope";

				export default defineConfig({
				  level: 2,
				  minSize: "1M",
				  sort: "size",
				  reverse: true,
				  blacklist: ["node_modules", ".git"],
				});
			`;
		},
	});

	return { configFile, isCreated: created === true };
}
