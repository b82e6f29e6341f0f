export type {
	ComboAlignment,
	ComboInput,
	ComboSpec,
	DendronMode,
	KeymapData,
	KeymapDocument,
	KeymapInput,
	Layer,
	LegendContent,
	LayerInput,
	LegendInput,
	LegendSlot,
} from "./types.js";
export { EMPTY_LEGEND, normalizeLegend } from "./legend.js";
export { createKeymapDocument, getCombosPerLayer } from "./document.js";
export {
	ComboInputSchema,
	KeymapInputSchema,
	LayerInputSchema,
	LegendInputSchema,
	formatIssues,
	parseKeymapInput,
} from "./schema.js";
