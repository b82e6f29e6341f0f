import { DEFAULT_SVG_STYLE } from './style.js';
import type { DrawConfig } from '../types.js';

export const defaultDrawConfig: DrawConfig = {
  keyRx: 6,
  keyRy: 6,
  innerPadW: 2,
  innerPadH: 2,
  outerPadW: 30,
  outerPadH: 56,
  smallPad: 2,
  lineSpacing: 1.2,
  arcRadius: 6,
  arcScale: 1,
  comboW: 28,
  comboH: 26,
  glyphTapSize: 14,
  glyphHoldSize: 12,
  glyphShiftedSize: 10,
  appendColonToLayerHeader: true,
  svgStyle: DEFAULT_SVG_STYLE,
  glyphs: {},
};

/**
 * Merge a partial config over the defaults.
 */
export function mergeDrawConfig(partial?: Partial<DrawConfig>): DrawConfig {
  if (!partial) return { ...defaultDrawConfig };
  return { ...defaultDrawConfig, ...partial };
}
