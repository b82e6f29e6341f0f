/**
 * Keymap Layout Engine
 *
 * Pure arithmetic layout: KeymapDocument → BoardLayout.
 * Layers stack vertically in keymap order; each reserves extra room above
 * and below for top- and bottom-aligned combos.
 */

import { ConfigurationError, RenderErrors } from '@keysketch/errors';
import {
  EMPTY_LEGEND,
  getCombosPerLayer,
  type ComboSpec,
  type KeymapDocument,
  type Layer,
  type LegendContent,
} from '@keysketch/keymap';
import type { KeyGeometry } from '@keysketch/physical-layout';
import type { DrawConfig, Point, RenderOptions } from '../types.js';
import { comboAnchor, comboDendrons, comboOffsets } from './combo-layout.js';

// ---- Layout result types ----

export interface KeyLayout {
  /** Position in the physical layout */
  index: number;
  /** Absolute key center */
  x: number;
  y: number;
  width: number;
  height: number;
  rotation: number;
  legend: LegendContent;
}

export interface ComboLayout {
  /** Position in the keymap's combo list */
  index: number;
  /** Absolute box center */
  x: number;
  y: number;
  width: number;
  height: number;
  type: string;
  legend: LegendContent;
  /** SVG path data, one per drawn connector */
  dendrons: string[];
}

export interface LayerLayout {
  name: string;
  header: Point;
  headerText: string;
  /** Origin the layer's key positions are offset by */
  origin: Point;
  topOffset: number;
  bottomOffset: number;
  keys: KeyLayout[];
  combos: ComboLayout[];
}

export interface BoardLayout {
  width: number;
  height: number;
  layers: LayerLayout[];
}

/**
 * Pick the layers to draw, keeping keymap order.
 *
 * @throws ConfigurationError if a requested name is not in the keymap
 */
export function selectLayers(keymap: KeymapDocument, drawLayers?: readonly string[]): Map<string, Layer> {
  if (!drawLayers || drawLayers.length === 0) {
    return new Map(keymap.layers);
  }

  const missing = drawLayers.filter((name) => !keymap.layers.has(name));
  if (missing.length > 0) {
    throw new ConfigurationError('UNKNOWN_LAYERS', RenderErrors.UNKNOWN_LAYERS(missing));
  }

  const wanted = new Set(drawLayers);
  return new Map([...keymap.layers].filter(([name]) => wanted.has(name)));
}

/**
 * Layout a keymap document for drawing.
 *
 * @throws ConfigurationError for unknown layers or conflicting modes
 */
export function layoutKeymap(keymap: KeymapDocument, config: DrawConfig, options: RenderOptions = {}): BoardLayout {
  if (options.keysOnly && options.combosOnly) {
    throw new ConfigurationError('CONFLICTING_MODES', RenderErrors.CONFLICTING_MODES);
  }

  const { layout } = keymap;
  const layers = selectLayers(keymap, options.drawLayers);
  const combosPerLayer = getCombosPerLayer(keymap, layers.keys());

  const result: LayerLayout[] = [];
  let y = 0;

  for (const [name, legends] of layers) {
    const combos = options.keysOnly ? [] : (combosPerLayer.get(name) ?? []);
    const offsets = comboOffsets(combos, layout);

    const header = { x: config.outerPadW, y: y + config.outerPadH / 2 };
    y += config.outerPadH + offsets.top;
    const origin = { x: config.outerPadW, y };

    const keys = layout.keys.map((key, index) =>
      layoutKey(origin, key, index, options.combosOnly ? EMPTY_LEGEND : (legends[index] ?? EMPTY_LEGEND)),
    );

    result.push({
      name,
      header,
      headerText: config.appendColonToLayerHeader ? `${name}:` : name,
      origin,
      topOffset: offsets.top,
      bottomOffset: offsets.bottom,
      keys,
      combos: combos.map((combo) => layoutCombo(combo, keymap, keys, config)),
    });

    y += layout.height + offsets.bottom;
  }

  return {
    width: layout.width + 2 * config.outerPadW,
    height: y + config.outerPadH,
    layers: result,
  };
}

function layoutKey(origin: Point, key: KeyGeometry, index: number, legend: LegendContent): KeyLayout {
  return {
    index,
    x: origin.x + key.x,
    y: origin.y + key.y,
    width: key.width,
    height: key.height,
    rotation: key.rotation,
    legend,
  };
}

function layoutCombo(combo: ComboSpec, keymap: KeymapDocument, keys: readonly KeyLayout[], config: DrawConfig): ComboLayout {
  const participants = combo.keyPositions.map((position) => {
    const key = keys[position];
    if (!key) {
      throw new RangeError(`Combo key position ${position} is out of range`);
    }
    return key;
  });

  const anchor = comboAnchor(participants, combo, keymap.layout, config);

  return {
    index: keymap.combos.indexOf(combo),
    x: anchor.x,
    y: anchor.y,
    width: config.comboW,
    height: config.comboH,
    type: combo.type,
    legend: combo.legend,
    dendrons: comboDendrons(anchor, participants, combo, config),
  };
}
