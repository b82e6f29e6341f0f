import type { LegendContent, LegendInput } from "./types.js";

export const EMPTY_LEGEND: LegendContent = Object.freeze({ tap: "", hold: "", shifted: "", type: "" });

/**
 * Normalize a user-written legend into all four fields.
 */
export function normalizeLegend(input: LegendInput): LegendContent {
	if (typeof input === "string") {
		return Object.freeze({ ...EMPTY_LEGEND, tap: input });
	}
	return Object.freeze({
		tap: input.t ?? input.tap ?? "",
		hold: input.h ?? input.hold ?? "",
		shifted: input.s ?? input.shifted ?? "",
		type: input.type ?? "",
	});
}
