import type { UserErrorMessage } from "./types.js";

export const CLIErrors = {
	MISSING_COMMAND: ["Missing command", "Usage: keysketch draw <keymap.json> [options]"],
	CONFLICTING_LOG_FLAGS: ["Conflicting flags: --verbose and --quiet cannot be used together"],
	CONFLICTING_MODE_FLAGS: ["Conflicting flags: --keys-only and --combos-only cannot be used together"],
	KEYMAP_PARSE_ERROR: (path: string): UserErrorMessage => [`Invalid keymap file: parse error at ${path}`],
} as const;
