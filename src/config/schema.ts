import { type } from "arktype";
import type { RequiredDeep } from "type-fest";

export const configSchema = type({
	"all?": "boolean",
	"blacklist?": "string[]",
	"bytes?": "boolean",
	"cut?": "string | number",
	"dereference?": "boolean",
	"excludeHidden?": "boolean",
	"files?": "boolean",
	"format?": "'absolute' | 'basename' | 'relative'",
	"jobs?": "number.integer",
	"level?": "number.integer | 'unlimited'",
	"minSize?": "string | number",
	"oneFileSystem?": "boolean",
	"progress?": "boolean",
	"reverse?": "boolean",
	"sizeBackend?": "'du' | 'fs'",
	"sort?": "'name' | 'size'",
	"tree?": "boolean",
	"whitelist?": "string[]",
	"whitelistPaths?": "string[]",
});

export type Config = typeof configSchema.infer;
export type ResolvedConfig = RequiredDeep<Config>;
