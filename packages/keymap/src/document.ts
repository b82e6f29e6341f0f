import { ConfigurationError, KeymapErrors } from "@keysketch/errors";
import type { PhysicalLayout } from "@keysketch/physical-layout";
import { normalizeLegend } from "./legend.js";
import type { ComboInput, ComboSpec, KeymapData, KeymapDocument, Layer, LegendInput } from "./types.js";

/**
 * Validate keymap data against a physical layout and freeze it into a
 * KeymapDocument.
 *
 * @throws ConfigurationError when a layer is repeated or does not match the key count, or a
 * combo references a missing key or layer
 */
export function createKeymapDocument(layout: PhysicalLayout, data: KeymapData): KeymapDocument {
	const entries: [string, LegendInput[]][] = Array.isArray(data.layers)
		? data.layers.map((layer) => [layer.name, layer.keys])
		: Object.entries(data.layers);
	if (entries.length === 0) {
		throw new ConfigurationError("NO_LAYERS", KeymapErrors.NO_LAYERS);
	}

	const layers = new Map<string, Layer>();
	for (const [name, keys] of entries) {
		if (layers.has(name)) {
			throw new ConfigurationError("DUPLICATE_LAYER", KeymapErrors.DUPLICATE_LAYER(name));
		}
		if (keys.length !== layout.size) {
			throw new ConfigurationError(
				"LAYER_LENGTH_MISMATCH",
				KeymapErrors.LAYER_LENGTH_MISMATCH(name, keys.length, layout.size),
			);
		}
		layers.set(name, Object.freeze(keys.map(normalizeLegend)));
	}

	const combos = (data.combos ?? []).map((combo, index) => createComboSpec(combo, index, layout, layers));

	return Object.freeze({
		layout,
		layers,
		combos: Object.freeze(combos),
	});
}

function createComboSpec(
	input: ComboInput,
	index: number,
	layout: PhysicalLayout,
	layers: ReadonlyMap<string, Layer>,
): ComboSpec {
	const positions = input.keyPositions;

	if (positions.length === 0) {
		throw new ConfigurationError("COMBO_NO_POSITIONS", KeymapErrors.COMBO_NO_POSITIONS(index));
	}

	const seen = new Set<number>();
	for (const position of positions) {
		if (!Number.isInteger(position) || position < 0 || position >= layout.size) {
			throw new ConfigurationError(
				"COMBO_POSITION_OUT_OF_RANGE",
				KeymapErrors.COMBO_POSITION_OUT_OF_RANGE(index, position, layout.size),
			);
		}
		if (seen.has(position)) {
			throw new ConfigurationError("COMBO_DUPLICATE_POSITION", KeymapErrors.COMBO_DUPLICATE_POSITION(index, position));
		}
		seen.add(position);
	}

	if (input.slide !== undefined) {
		if (positions.length < 2) {
			throw new ConfigurationError("COMBO_SLIDE_SINGLE_KEY", KeymapErrors.COMBO_SLIDE_SINGLE_KEY(index));
		}
		if (!(input.slide >= -1 && input.slide <= 1)) {
			throw new ConfigurationError("COMBO_SLIDE_RANGE", KeymapErrors.COMBO_SLIDE_RANGE(index, input.slide));
		}
	}

	for (const layer of input.layers ?? []) {
		if (!layers.has(layer)) {
			throw new ConfigurationError("COMBO_UNKNOWN_LAYER", KeymapErrors.COMBO_UNKNOWN_LAYER(index, layer));
		}
	}

	const legend = normalizeLegend(input.legend);

	return Object.freeze({
		keyPositions: Object.freeze([...positions]),
		legend,
		align: input.align ?? "mid",
		offset: input.offset ?? 0,
		slide: input.slide,
		dendron: input.dendron ?? "auto",
		type: input.type ?? legend.type,
		layers: Object.freeze([...(input.layers ?? [])]),
	});
}

/**
 * Group combos by the layers they are drawn on, for the given layer names.
 * A combo without explicit layers appears on every layer.
 */
export function getCombosPerLayer(
	keymap: KeymapDocument,
	layerNames: Iterable<string>,
): Map<string, ComboSpec[]> {
	const result = new Map<string, ComboSpec[]>();
	for (const name of layerNames) {
		result.set(
			name,
			keymap.combos.filter((combo) => combo.layers.length === 0 || combo.layers.includes(name)),
		);
	}
	return result;
}
