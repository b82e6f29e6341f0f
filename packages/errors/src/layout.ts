import type { UserErrorMessage } from "./types.js";

export const LayoutErrors = {
	UNKNOWN_LAYOUT_TYPE: (ltype: string): UserErrorMessage => [
		`Physical layout type "${ltype}" is not supported`,
		'Use "ortho" or "raw"',
	],
	THUMBS_EXCEED_COLUMNS: (thumbs: number, columns: number): UserErrorMessage => [
		"Number of thumbs should not be greater than columns",
		`thumbs=${thumbs}, columns=${columns}`,
	],
	THUMBS_WITHOUT_SPLIT: ["Cannot process non-split keyboard with thumb keys"],
	INVALID_GRID_DIMENSION: (name: string, value: number): UserErrorMessage => [
		`Grid ${name} must be a positive integer`,
		`got ${value}`,
	],
	INVALID_THUMB_COUNT: (value: number): UserErrorMessage => [
		"Number of thumbs must be a non-negative integer",
		`got ${value}`,
	],
	INVALID_KEY_SIZE: (index: number): UserErrorMessage => [
		`Key ${index} must have a positive width and height`,
	],
	EMPTY_LAYOUT: ["Physical layout must contain at least one key"],
} as const;
