import type { PhysicalLayout, PhysicalLayoutSpec } from "@keysketch/physical-layout";

/**
 * Legend slots of a key or combo. Empty strings mean "nothing drawn".
 */
export interface LegendContent {
	/** Primary legend, drawn at the center */
	readonly tap: string;
	/** Secondary legend, drawn near the bottom edge */
	readonly hold: string;
	/** Tertiary legend, drawn near the top edge */
	readonly shifted: string;
	/** Styling tag, emitted as a CSS class */
	readonly type: string;
}

export type LegendSlot = "tap" | "hold" | "shifted";

/** One legend per physical key, in layout order */
export type Layer = readonly LegendContent[];

export type ComboAlignment = "mid" | "top" | "bottom" | "left" | "right";

export type DendronMode = "always" | "never" | "auto";

export interface ComboSpec {
	/** Indices into the physical layout */
	readonly keyPositions: readonly number[];
	readonly legend: LegendContent;
	readonly align: ComboAlignment;
	/** Distance from the keys, in units of the smallest key dimension */
	readonly offset: number;
	/** Position between the two outermost keys, -1 to 1 */
	readonly slide?: number;
	readonly dendron: DendronMode;
	readonly type: string;
	/** Layers the combo is drawn on; empty means all of them */
	readonly layers: readonly string[];
}

export interface KeymapDocument {
	readonly layout: PhysicalLayout;
	/** Insertion order is drawing order */
	readonly layers: ReadonlyMap<string, Layer>;
	readonly combos: readonly ComboSpec[];
}

// ---- Input shapes ----

/**
 * Legend as written by users: a bare tap string, or an object with long
 * or short slot names.
 */
export type LegendInput =
	| string
	| {
			t?: string;
			tap?: string;
			h?: string;
			hold?: string;
			s?: string;
			shifted?: string;
			type?: string;
	  };

export interface ComboInput {
	keyPositions: number[];
	legend: LegendInput;
	align?: ComboAlignment;
	offset?: number;
	slide?: number;
	dendron?: DendronMode;
	type?: string;
	layers?: string[];
}

/**
 * One named layer in the ordered layer list.
 */
export interface LayerInput {
	name: string;
	keys: LegendInput[];
}

export interface KeymapData {
	/**
	 * Layers in drawing order. The object form follows property order, which
	 * puts integer-like names ("1", "2") first; use the list form to keep them
	 * where they are.
	 */
	layers: LayerInput[] | Record<string, LegendInput[]>;
	combos?: ComboInput[];
}

export interface KeymapInput extends KeymapData {
	layout: PhysicalLayoutSpec;
}
