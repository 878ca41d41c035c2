export interface CommandOption {
	description: string;
	flags: string;
}

/**
 * Shape every command module exports. Options arrive as commander's raw
 * option bag and are validated by the command itself.
 */
export interface Command {
	action: (options: unknown, operands: ReadonlyArray<string>) => Promise<void>;
	ARGUMENTS?: string;
	COMMAND: string;
	DESCRIPTION: string;
	/** Run this command when no subcommand is named. */
	IS_DEFAULT?: boolean;
	options?: ReadonlyArray<CommandOption>;
}
