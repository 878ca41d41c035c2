import ansis from "ansis";

import { createProjectConfig } from "../config";
import { logger } from "../utils/logger";

export const COMMAND = "init";
export const DESCRIPTION = "Create a dirscope.config.ts in the current directory";

export async function action(): Promise<void> {
	const { configFile, isCreated } = await createProjectConfig();
	const fileName = ansis.magenta(configFile ?? "dirscope.config.ts");

	if (isCreated) {
		logger.success(`Config file created at ${fileName}`);
		return;
	}

	logger.message(ansis.gray(`Config file ${fileName} already exists, skipping`));
}
