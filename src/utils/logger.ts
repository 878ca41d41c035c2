import ansis from "ansis";
import process from "node:process";

const S_BAR = "|";
const S_INFO = ansis.blue("o");
const S_WARN = ansis.yellow("^");
const S_ERROR = ansis.red("#");
const S_SUCCESS = ansis.green("v");
const S_DEBUG = ansis.gray("~");

// The report owns stdout; every diagnostic line goes to stderr.
function formatMessage(symbol: string, message: string): string {
	return `${ansis.gray(S_BAR)}\n${symbol}  ${message}`;
}

let isDebugEnabled = process.env["DIRSCOPE_DEBUG"] === "1";

export const logger = {
	debug(message: string): void {
		if (isDebugEnabled) {
			console.error(`${S_DEBUG}  ${ansis.gray(message)}`);
		}
	},

	error(message: string): void {
		console.error(formatMessage(S_ERROR, ansis.red(message)));
	},

	info(message: string): void {
		console.error(formatMessage(S_INFO, message));
	},

	message(message: string): void {
		console.error(`${ansis.gray(S_BAR)}  ${message}`);
	},

	setDebug(isEnabled: boolean): void {
		isDebugEnabled = isEnabled;
	},

	success(message: string): void {
		console.error(formatMessage(S_SUCCESS, ansis.green(message)));
	},

	warn(message: string): void {
		console.error(formatMessage(S_WARN, ansis.yellow(message)));
	},
};
