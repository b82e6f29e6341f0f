/**
 * Default style sheet. Class names follow the output contract:
 * key, combo, glyph, label, tap / hold / shifted and layer-NAME.
 */
export const DEFAULT_SVG_STYLE = `
/* inherit to force styles through use tags */
svg path {
    fill: inherit;
}

svg.keymap {
    font-family: SFMono-Regular, Consolas, Liberation Mono, Menlo, monospace;
    font-size: 14px;
    font-kerning: normal;
    text-rendering: optimizeLegibility;
    fill: #24292e;
}

rect.key {
    fill: #f6f8fa;
    stroke: #c9cccf;
    stroke-width: 1;
}

rect.combo {
    fill: #cdf;
    stroke: #c9cccf;
    stroke-width: 1;
}

rect.held, rect.combo.held {
    fill: #fdd;
}

rect.ghost, rect.combo.ghost {
    stroke-dasharray: 4, 4;
    stroke-width: 2;
}

text {
    text-anchor: middle;
    dominant-baseline: middle;
}

text.label {
    font-weight: bold;
    text-anchor: start;
    stroke: white;
    stroke-width: 2;
    paint-order: stroke;
}

text.combo, text.hold, text.shifted {
    font-size: 11px;
}

text.hold {
    text-anchor: middle;
    dominant-baseline: auto;
}

text.shifted {
    text-anchor: middle;
    dominant-baseline: hanging;
}

text.combo.hold, text.combo.shifted {
    font-size: 8px;
}

text.trans {
    fill: #7b7e81;
}

path.combo {
    stroke-width: 1;
    stroke: gray;
    fill: none;
}
`;
