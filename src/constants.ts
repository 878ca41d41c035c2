/** The CLI command name for dirscope. */
export const CLI_COMMAND = "dirscope";

/** The configuration file name for dirscope projects. */
export const CONFIG_FILE = "dirscope.config";

/** Default whitelist pattern file, looked up in the scan root and in the home directory. */
export const WHITELIST_FILE = ".dirscope-include";

/** Default blacklist pattern file, looked up in the scan root and in the home directory. */
export const BLACKLIST_FILE = ".dirscope-ignore";
