/**
 * Core types for keymap-svg
 */

import type { AppLogObj, Logger } from '@keysketch/logger';

/**
 * Visual constants for drawing a keymap
 */
export interface DrawConfig {
  /** Corner radii of key and combo rectangles */
  keyRx: number;
  keyRy: number;

  /** Inset of the key rectangle from the key's physical extent */
  innerPadW: number;
  innerPadH: number;

  /** Padding around the board and between layers */
  outerPadW: number;
  outerPadH: number;

  /** Inset of hold/shifted legends from the rectangle edge */
  smallPad: number;

  /** Line height of multi-line legends, in em */
  lineSpacing: number;

  /** Radius of the quarter-circle in combo dendrons */
  arcRadius: number;

  /** Fraction of the first dendron leg drawn before the arc */
  arcScale: number;

  /** Combo box size */
  comboW: number;
  comboH: number;

  /** Rendered glyph heights per legend slot */
  glyphTapSize: number;
  glyphHoldSize: number;
  glyphShiftedSize: number;

  /** Append ":" to layer headers */
  appendColonToLayerHeader: boolean;

  /** Style sheet embedded verbatim */
  svgStyle: string;

  /** Glyph name to raw SVG markup */
  glyphs: Readonly<Record<string, string>>;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Anything that accepts sequential string writes (a Writable, a buffer wrapper).
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Options fixed for the lifetime of a drawer
 */
export interface DrawerOptions {
  logger?: Logger<AppLogObj>;
}

/**
 * Options for one rendered document
 */
export interface RenderOptions {
  /** Subset of layers to draw, kept in keymap order */
  drawLayers?: readonly string[];

  /** Skip combos */
  keysOnly?: boolean;

  /** Draw combos over blank keys */
  combosOnly?: boolean;
}
