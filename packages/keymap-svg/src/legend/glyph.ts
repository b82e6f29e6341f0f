import type { LegendSlot } from '@keysketch/keymap';
import type { DrawConfig, Point } from '../types.js';

const GLYPH_TOKEN = /^\$\$(.+)\$\$$/;

const VIEW_BOX =
  /<svg\b[^>]*\bviewbox\s*=\s*"\s*(-?\d+(?:\.\d+)?)[\s,]+(-?\d+(?:\.\d+)?)[\s,]+(\d+(?:\.\d+)?)[\s,]+(\d+(?:\.\d+)?)\s*"/i;

export interface ViewBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ResolvedGlyph {
  name: string;
  markup: string;
  viewBox: ViewBox;
}

export interface GlyphBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Glyph name if the legend is exactly one `$$name$$` token.
 */
export function glyphReference(lines: readonly string[]): string | undefined {
  if (lines.length !== 1) return undefined;
  const match = GLYPH_TOKEN.exec(lines[0] ?? '');
  return match?.[1];
}

/**
 * Read the viewBox declared on the glyph's `<svg>` tag.
 */
export function parseViewBox(markup: string): ViewBox | undefined {
  const match = VIEW_BOX.exec(markup);
  if (!match) return undefined;

  const [x, y, width, height] = match.slice(1, 5).map(Number);
  if (x === undefined || y === undefined || width === undefined || height === undefined) return undefined;
  if (!(width > 0 && height > 0)) return undefined;

  return { x, y, width, height };
}

/**
 * Look up a glyph and parse its viewBox; undefined when either fails.
 */
export function resolveGlyph(name: string, glyphs: Readonly<Record<string, string>>): ResolvedGlyph | undefined {
  if (!Object.hasOwn(glyphs, name)) return undefined;
  const markup = glyphs[name];
  if (markup === undefined) return undefined;

  const viewBox = parseViewBox(markup);
  if (!viewBox) return undefined;

  return { name, markup, viewBox };
}

function slotMetrics(slot: LegendSlot, config: DrawConfig): { height: number; dy: number } {
  switch (slot) {
    case 'tap':
      return { height: config.glyphTapSize, dy: config.glyphTapSize / 2 };
    case 'hold':
      return { height: config.glyphHoldSize, dy: config.glyphHoldSize };
    case 'shifted':
      return { height: config.glyphShiftedSize, dy: 0 };
  }
}

/**
 * Placement of a glyph for a legend slot: fixed height per slot, width from
 * the viewBox aspect ratio, horizontally centered on the anchor.
 */
export function glyphBox(anchor: Point, slot: LegendSlot, glyph: ResolvedGlyph, config: DrawConfig): GlyphBox {
  const { height, dy } = slotMetrics(slot, config);
  const width = glyph.viewBox.width * (height / glyph.viewBox.height);

  return {
    x: anchor.x - width / 2,
    y: anchor.y - dy,
    width,
    height,
  };
}
