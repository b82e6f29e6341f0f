/**
 * svg.js canvas backed by an svgdom window, so documents can be built
 * without a browser.
 */

import { registerWindow, SVG, type Svg } from '@svgdotjs/svg.js';
import { createSVGWindow } from 'svgdom';

export interface SvgContext {
  canvas: Svg;
  toSvg(): string;
  dispose(): void;
}

/**
 * svg.js writes `xmlns` as a plain attribute on every `<svg>` it creates, and
 * imported glyph markup carries one too. Recent svgdom serializers reject that
 * attribute name; the declaration is emitted from the element namespace anyway.
 */
function dropNamespaceAttributes(element: Element): void {
  element.removeAttribute('xmlns');
  for (const child of Array.from(element.children)) {
    dropNamespaceAttributes(child);
  }
}

/**
 * Create a detached root `<svg>` sized to the document.
 *
 * svg.js keeps the registered window in module state; contexts are used
 * synchronously, one at a time.
 */
export function createSvgContext(width: number, height: number): SvgContext {
  const window = createSVGWindow();
  registerWindow(window, window.document);

  const canvas = SVG().attr({ width, height, viewBox: `0 0 ${width} ${height}` });

  return {
    canvas,
    toSvg: () => {
      dropNamespaceAttributes(canvas.node);
      return canvas.svg();
    },
    dispose: () => {
      canvas.clear();
    },
  };
}
