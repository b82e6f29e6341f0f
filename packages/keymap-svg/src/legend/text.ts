import type { LegendContent } from '@keysketch/keymap';

const isWhitespace = (ch: string): boolean => /\s/.test(ch);

/**
 * Split legend text into display lines.
 *
 * Whitespace separates lines, except that two consecutive spaces stand for
 * one literal space inside a line. Pairs are consumed left to right, so
 * three spaces give a trailing space followed by a break.
 */
export function splitLegendText(text: string): string[] {
  const lines: string[] = [];
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === ' ' && text.charAt(i + 1) === ' ') {
      current += ' ';
      i++;
    } else if (isWhitespace(ch)) {
      if (current) lines.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) lines.push(current);

  return lines;
}

/**
 * Vertical shift for a two-line tap legend so it makes room for the
 * hold (shift up) or shifted (shift down) legend.
 */
export function primaryShift(legend: LegendContent, lines: readonly string[]): number {
  if (lines.length !== 2) return 0;
  if (legend.shifted && !legend.hold) return -1;
  if (legend.hold && !legend.shifted) return 1;
  return 0;
}

/**
 * Starting dy (in em) of the first line of a stacked text block.
 */
export function firstLineOffset(lineCount: number, lineSpacing: number, shift = 0): number {
  return -((lineCount - 1) * ((lineSpacing * (1 + shift)) / 2));
}
