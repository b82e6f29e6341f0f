/**
 * Keymap SVG Renderer
 *
 * Renders a KeymapDocument to SVG: one group per layer holding its header,
 * key rectangles with legends, and combo boxes with their dendrons.
 *
 * Pipeline: KeymapDocument → layoutKeymap() → SVG elements → output sink
 */

import type { KeymapDocument, LegendSlot } from '@keysketch/keymap';
import { createSilentLogger, type AppLogObj, type Logger } from '@keysketch/logger';
import { Text, Use, type Container, type Defs, type Element } from '@svgdotjs/svg.js';
import { mergeDrawConfig } from './config/default.js';
import {
  layoutKeymap,
  type ComboLayout,
  type KeyLayout,
  type LayerLayout,
} from './layout/keymap-layout.js';
import { glyphBox, glyphReference, resolveGlyph } from './legend/glyph.js';
import { firstLineOffset, primaryShift, splitLegendText } from './legend/text.js';
import { createSvgContext } from './svg-context.js';
import type { DrawConfig, DrawerOptions, OutputSink, Point, RenderOptions } from './types.js';

/** Per-document state: where glyph definitions go and which are already there */
interface RenderState {
  defs: Defs;
  definedGlyphs: Set<string>;
}

function classAttr(classes: readonly string[]): string | null {
  const names = classes.filter(Boolean);
  return names.length > 0 ? names.join(' ') : null;
}

function classed<T extends Element>(element: T, classes: readonly string[]): T {
  const value = classAttr(classes);
  if (value !== null) element.attr('class', value);
  return element;
}

/**
 * Draws a keymap document as SVG.
 *
 * Both the document (with its physical layout) and the draw config are
 * constructor arguments; there is no drawer without them.
 */
export class KeymapDrawer {
  readonly config: DrawConfig;
  readonly keymap: KeymapDocument;
  private readonly logger: Logger<AppLogObj>;

  constructor(config: DrawConfig, keymap: KeymapDocument, options: DrawerOptions = {}) {
    this.config = config;
    this.keymap = keymap;
    this.logger = options.logger ?? createSilentLogger('keymap-svg');
  }

  /**
   * Render the document and write it to `out`.
   *
   * All validation happens before the first write.
   * @throws ConfigurationError for unknown layers or conflicting modes
   */
  printBoard(out: OutputSink, options: RenderOptions = {}): void {
    out.write(this.renderToString(options));
    out.write('\n');
  }

  /**
   * Render the document to an SVG string.
   */
  renderToString(options: RenderOptions = {}): string {
    const board = layoutKeymap(this.keymap, this.config, options);
    this.logger.debug('Rendering keymap', { count: board.layers.length, width: board.width, height: board.height });

    const ctx = createSvgContext(board.width, board.height);
    const { canvas } = ctx;
    canvas.addClass('keymap');

    const state: RenderState = { defs: canvas.defs(), definedGlyphs: new Set() };
    canvas.element('style').words(this.config.svgStyle);

    for (const layer of board.layers) {
      this.renderLayer(canvas, layer, state);
    }

    const svg = ctx.toSvg();
    ctx.dispose();
    return svg;
  }

  // ---- Render functions ----

  private renderLayer(canvas: Container, layer: LayerLayout, state: RenderState): void {
    this.logger.debug(`Rendering layer "${layer.name}"`, {
      layer: layer.name,
      count: layer.keys.length,
      combos: layer.combos.length,
    });

    const g = canvas.group().attr('class', `layer-${layer.name}`);

    this.drawText(g, layer.header, layer.headerText, ['label']);

    for (const key of layer.keys) {
      this.renderKey(g, key, state);
    }
    for (const combo of layer.combos) {
      this.renderCombo(g, combo, state);
    }
  }

  private renderKey(parent: Container, key: KeyLayout, state: RenderState): void {
    const { config } = this;
    const { legend } = key;
    const center = { x: key.x, y: key.y };

    const g = key.rotation !== 0 ? parent.group().attr('transform', `rotate(${key.rotation}, ${key.x}, ${key.y})`) : parent;

    this.drawRect(g, center, key.width - 2 * config.innerPadW, key.height - 2 * config.innerPadH, [legend.type, 'key']);

    const tapLines = splitLegendText(legend.tap);
    const shift = primaryShift(legend, tapLines);
    const edge = key.height / 2 - config.innerPadH - config.smallPad;

    this.drawLegend(g, center, tapLines, [legend.type], 'tap', state, shift);
    this.drawLegend(g, { x: key.x, y: key.y + edge }, slotLines(legend.hold), [legend.type], 'hold', state);
    this.drawLegend(g, { x: key.x, y: key.y - edge }, slotLines(legend.shifted), [legend.type], 'shifted', state);
  }

  private renderCombo(parent: Container, combo: ComboLayout, state: RenderState): void {
    const { config } = this;
    const { legend } = combo;
    const center = { x: combo.x, y: combo.y };

    // Dendrons first so the box covers their start
    for (const d of combo.dendrons) {
      classed(parent.path().attr('d', d), ['combo', combo.type]);
    }

    this.drawRect(parent, center, combo.width, combo.height, [combo.type, 'combo']);

    const edge = combo.height / 2 - config.smallPad;
    const classes = [combo.type, 'combo'];

    this.drawLegend(parent, center, splitLegendText(legend.tap), classes, 'tap', state);
    this.drawLegend(parent, { x: combo.x, y: combo.y + edge }, slotLines(legend.hold), classes, 'hold', state);
    this.drawLegend(parent, { x: combo.x, y: combo.y - edge }, slotLines(legend.shifted), classes, 'shifted', state);
  }

  private drawRect(parent: Container, center: Point, width: number, height: number, classes: readonly string[]): void {
    const rect = parent.rect(width, height).attr({
      rx: this.config.keyRx,
      ry: this.config.keyRy,
      x: center.x - width / 2,
      y: center.y - height / 2,
    });
    classed(rect, classes);
  }

  private drawLegend(
    parent: Container,
    anchor: Point,
    lines: readonly string[],
    classes: readonly string[],
    slot: LegendSlot,
    state: RenderState,
    shift = 0,
  ): void {
    if (lines.length === 0) return;

    const slotClasses = [...classes, slot];

    const glyphName = glyphReference(lines);
    if (glyphName !== undefined && this.drawGlyph(parent, anchor, glyphName, slot, slotClasses, state)) {
      return;
    }

    const [first] = lines;
    if (lines.length === 1 && first !== undefined) {
      this.drawText(parent, anchor, first, slotClasses);
      return;
    }

    this.drawTextBlock(parent, anchor, lines, slotClasses, shift);
  }

  private drawGlyph(
    parent: Container,
    anchor: Point,
    name: string,
    slot: LegendSlot,
    classes: readonly string[],
    state: RenderState,
  ): boolean {
    const glyph = resolveGlyph(name, this.config.glyphs);
    if (!glyph) {
      this.logger.warn(`Glyph "${name}" is not defined or has no viewBox, drawing it as text`, { glyph: name });
      return false;
    }

    if (!state.definedGlyphs.has(name)) {
      defineGlyph(state.defs, name, glyph.markup);
      state.definedGlyphs.add(name);
    }

    const box = glyphBox(anchor, slot, glyph, this.config);
    const use = new Use().attr({ x: box.x, y: box.y, height: box.height, width: box.width });
    parent.add(use);
    // set directly: svg.js would read ids like "#abc" as colors
    use.node.setAttribute('href', `#${name}`);
    classed(use, [...classes, 'glyph', name]);
    return true;
  }

  private drawText(parent: Container, anchor: Point, word: string, classes: readonly string[]): void {
    if (!word) return;
    const text = new Text().rebuild(false).plain(word).attr({ x: anchor.x, y: anchor.y });
    parent.add(classed(text, classes));
  }

  private drawTextBlock(
    parent: Container,
    anchor: Point,
    lines: readonly string[],
    classes: readonly string[],
    shift: number,
  ): void {
    const { lineSpacing } = this.config;
    const text = new Text().rebuild(false).attr({ x: anchor.x, y: anchor.y });
    parent.add(classed(text, classes));

    text.build(true);
    lines.forEach((line, i) => {
      const dy = i === 0 ? firstLineOffset(lines.length, lineSpacing, shift) : lineSpacing;
      text.tspan(line).attr({ x: anchor.x, dy: `${dy}em` });
    });
    text.build(false);
  }
}

/**
 * Hold and shifted legends are drawn as a single line.
 */
function slotLines(text: string): string[] {
  return text ? [text] : [];
}

/**
 * Add `<svg id="name">` wrapping the glyph markup, with width and height
 * dropped from the glyph's root so the referencing `<use>` sizes it.
 */
function defineGlyph(defs: Defs, name: string, markup: string): void {
  const holder = defs.nested().id(name);
  holder.svg(markup);
  for (const child of holder.children()) {
    child.attr({ width: null, height: null });
  }
}

/**
 * Render a keymap document to an SVG string.
 */
export function renderKeymapToSVG(
  keymap: KeymapDocument,
  options: RenderOptions & DrawerOptions & { config?: Partial<DrawConfig> } = {},
): string {
  const { config, logger, ...renderOptions } = options;
  return new KeymapDrawer(mergeDrawConfig(config), keymap, { logger }).renderToString(renderOptions);
}
