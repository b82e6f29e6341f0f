import { z } from "zod";

const RawKeySchema = z.object({
	x: z.number().finite(),
	y: z.number().finite(),
	width: z.number().positive().optional(),
	height: z.number().positive().optional(),
	rotation: z.number().finite().optional(),
});

const RawLayoutSchema = z.object({
	ltype: z.literal("raw"),
	keys: z.array(RawKeySchema).min(1),
});

// Grid constraints (thumbs vs columns/split) are checked by the builder so
// they surface as ConfigurationError with their own codes.
const OrthoLayoutSchema = z.object({
	ltype: z.literal("ortho"),
	rows: z.number(),
	columns: z.number(),
	thumbs: z.number().optional(),
	split: z.boolean().default(false),
});

export const PhysicalLayoutSpecSchema = z.discriminatedUnion("ltype", [RawLayoutSchema, OrthoLayoutSchema]);
