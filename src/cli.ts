import { Command } from "commander";
import process from "node:process";

import packageJson from "../package.json";
import { type Command as DirscopeCommand, COMMANDS } from "./commands";
import { CLI_COMMAND } from "./constants";
import { exitCodeFor } from "./scan/errors";
import { logger } from "./utils/logger";

const program = new Command();

async function main(): Promise<void> {
	program
		.name(CLI_COMMAND)
		.description("Report disk usage of a directory subtree")
		.version(packageJson.version, "-v, --version", "output the current version")
		.helpOption("-h, --help", "display help for command")
		.showHelpAfterError();

	for (const cmd of COMMANDS) {
		registerCommand(cmd);
	}

	await program.parseAsync(process.argv);
}

function registerCommand(cmd: DirscopeCommand): void {
	const usage = cmd.ARGUMENTS === undefined ? cmd.COMMAND : `${cmd.COMMAND} ${cmd.ARGUMENTS}`;
	const command = program
		.command(usage, { isDefault: cmd.IS_DEFAULT === true })
		.description(cmd.DESCRIPTION);

	for (const option of cmd.options ?? []) {
		command.option(option.flags, option.description);
	}

	command.action(async () => {
		await cmd.action(command.opts(), command.args);
	});
}

main().catch((err: unknown) => {
	logger.error(err instanceof Error ? err.message : String(err));
	process.exit(exitCodeFor(err));
});
