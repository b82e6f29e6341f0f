/**
 * @keysketch/keymap-svg - Server-side SVG renderer for keymaps
 *
 * Arithmetic layout of keys, legends and combos, drawn with svg.js on
 * svgdom. Runs in Node.js without a browser.
 */

// ---- Rendering ----
export { KeymapDrawer, renderKeymapToSVG } from './render-keymap.js';
export { createSvgContext } from './svg-context.js';
export type { SvgContext } from './svg-context.js';

// ---- Layout ----
export { layoutKeymap, selectLayers } from './layout/keymap-layout.js';
export type { BoardLayout, ComboLayout, KeyLayout, LayerLayout } from './layout/keymap-layout.js';
export {
  centroid,
  comboAnchor,
  comboCenter,
  comboDendrons,
  comboOffsets,
  slideEndpoints,
} from './layout/combo-layout.js';
export { arcDendronPath, copysign, lineDendronPath } from './layout/dendrons.js';
export type { ArcDendronOptions } from './layout/dendrons.js';

// ---- Legends ----
export { firstLineOffset, primaryShift, splitLegendText } from './legend/text.js';
export { glyphBox, glyphReference, parseViewBox, resolveGlyph } from './legend/glyph.js';
export type { GlyphBox, ResolvedGlyph, ViewBox } from './legend/glyph.js';

// ---- Config ----
export { defaultDrawConfig, mergeDrawConfig } from './config/default.js';
export { DrawConfigSchema, parseDrawConfig } from './config/schema.js';
export { DEFAULT_SVG_STYLE } from './config/style.js';
export type { DrawConfig, DrawerOptions, OutputSink, Point, RenderOptions } from './types.js';
