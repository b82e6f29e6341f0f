export type {
	KeyGeometry,
	LayoutType,
	OrthoLayoutSpec,
	PhysicalLayoutSpec,
	RawKeySpec,
	RawLayoutSpec,
} from "./types.js";
export { KEY_H, KEY_W, SPLIT_GAP } from "./constants.js";
export { PhysicalLayout } from "./physical-layout.js";
export { createOrthoKeys, createRawKeys, layoutFactory, validateOrthoSpec } from "./builder.js";
export { PhysicalLayoutSpecSchema } from "./schema.js";
