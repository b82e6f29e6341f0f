import { ConfigurationError, KeymapErrors } from "@keysketch/errors";
import { layoutFactory, PhysicalLayoutSpecSchema } from "@keysketch/physical-layout";
import { z } from "zod";
import { createKeymapDocument } from "./document.js";
import type { KeymapDocument } from "./types.js";

export const LegendInputSchema = z.union([
	z.string(),
	z.object({
		t: z.string().optional(),
		tap: z.string().optional(),
		h: z.string().optional(),
		hold: z.string().optional(),
		s: z.string().optional(),
		shifted: z.string().optional(),
		type: z.string().optional(),
	}),
]);

export const ComboInputSchema = z.object({
	keyPositions: z.array(z.number().int()),
	legend: LegendInputSchema,
	align: z.enum(["mid", "top", "bottom", "left", "right"]).optional(),
	offset: z.number().finite().nonnegative().optional(),
	slide: z.number().finite().optional(),
	dendron: z.enum(["always", "never", "auto"]).optional(),
	type: z.string().optional(),
	layers: z.array(z.string()).optional(),
});

export const LayerInputSchema = z.object({
	name: z.string().min(1),
	keys: z.array(LegendInputSchema),
});

export const KeymapInputSchema = z.object({
	layout: PhysicalLayoutSpecSchema,
	layers: z.union([z.array(LayerInputSchema), z.record(z.string(), z.array(LegendInputSchema))]),
	combos: z.array(ComboInputSchema).optional(),
});

/**
 * Format zod issues as "path: message" pairs on one line.
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

/**
 * Validate untyped keymap JSON, build its physical layout and return the
 * resulting document.
 *
 * @throws ConfigurationError on schema, layout or consistency errors
 */
export function parseKeymapInput(raw: unknown): KeymapDocument {
	const result = KeymapInputSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError("INVALID_INPUT", KeymapErrors.INVALID_INPUT(formatIssues(result.error)));
	}
	const { layout, ...data } = result.data;
	return createKeymapDocument(layoutFactory(layout), data);
}
