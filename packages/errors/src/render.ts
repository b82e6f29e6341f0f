import type { UserErrorMessage } from "./types.js";

export const RenderErrors = {
	UNKNOWN_LAYERS: (names: readonly string[]): UserErrorMessage => [
		"Some layer names selected for drawing are not in the keymap",
		names.map((name) => `"${name}"`).join(", "),
	],
	CONFLICTING_MODES: ["keysOnly and combosOnly cannot be used together"],
} as const;

export const ConfigErrors = {
	PARSE_ERROR: (path: string): UserErrorMessage => [`Invalid config file: parse error at ${path}`],
	INVALID_DRAW_CONFIG: (issues: string): UserErrorMessage => ["Invalid draw configuration", issues],
} as const;
