import type { UserErrorMessage } from "./types.js";

export const KeymapErrors = {
	LAYER_LENGTH_MISMATCH: (layer: string, actual: number, expected: number): UserErrorMessage => [
		`Layer "${layer}" has ${actual} keys, physical layout has ${expected}`,
	],
	COMBO_POSITION_OUT_OF_RANGE: (combo: number, position: number, keyCount: number): UserErrorMessage => [
		`Combo ${combo} references key position ${position}`,
		`Valid positions are 0 to ${keyCount - 1}`,
	],
	COMBO_DUPLICATE_POSITION: (combo: number, position: number): UserErrorMessage => [
		`Combo ${combo} lists key position ${position} more than once`,
	],
	COMBO_NO_POSITIONS: (combo: number): UserErrorMessage => [
		`Combo ${combo} must have at least one key position`,
	],
	COMBO_SLIDE_SINGLE_KEY: (combo: number): UserErrorMessage => [
		`Combo ${combo} sets "slide" but has a single key position`,
		'"slide" needs at least two key positions',
	],
	COMBO_SLIDE_RANGE: (combo: number, slide: number): UserErrorMessage => [
		`Combo ${combo} has slide ${slide}`,
		'"slide" must be between -1 and 1',
	],
	COMBO_UNKNOWN_LAYER: (combo: number, layer: string): UserErrorMessage => [
		`Combo ${combo} references unknown layer "${layer}"`,
	],
	DUPLICATE_LAYER: (layer: string): UserErrorMessage => [`Layer "${layer}" is defined more than once`],
	NO_LAYERS: ["Keymap must define at least one layer"],
	INVALID_INPUT: (issues: string): UserErrorMessage => ["Invalid keymap data", issues],
} as const;
