import * as initCmd from "./init";
import * as scanCmd from "./scan";
import type { Command } from "./types";

export const COMMANDS = [scanCmd, initCmd] as const satisfies ReadonlyArray<Command>;

export type { Command } from "./types";
