/**
 * Unit tests for legend text splitting and vertical alignment
 */

import { describe, expect, it } from 'vitest';
import { firstLineOffset, primaryShift, splitLegendText } from '../../src/legend/text.js';

const legend = (tap: string, hold = '', shifted = '') => ({ tap, hold, shifted, type: '' });

describe('splitLegendText', () => {
  it('should keep a double space as one space inside a line', () => {
    expect(splitLegendText('foo  bar baz')).toEqual(['foo bar', 'baz']);
  });

  it('should split on single spaces and other whitespace', () => {
    expect(splitLegendText('one two')).toEqual(['one', 'two']);
    expect(splitLegendText('one\ttwo\nthree')).toEqual(['one', 'two', 'three']);
  });

  it('should consume space pairs left to right', () => {
    expect(splitLegendText('a   b')).toEqual(['a ', 'b']);
    expect(splitLegendText('a    b')).toEqual(['a  b']);
    expect(splitLegendText('  x')).toEqual([' x']);
  });

  it('should return no lines for empty or blank text', () => {
    expect(splitLegendText('')).toEqual([]);
    expect(splitLegendText(' ')).toEqual([]);
  });

  it('should keep a control character that appears in the text', () => {
    expect(splitLegendText('a\u0000b')).toEqual(['a\u0000b']);
  });
});

describe('primaryShift', () => {
  it('should shift a two-line legend down when only shifted is present', () => {
    expect(primaryShift(legend('a b', '', 'S'), ['a', 'b'])).toBe(-1);
  });

  it('should shift a two-line legend up when only hold is present', () => {
    expect(primaryShift(legend('a b', 'H'), ['a', 'b'])).toBe(1);
  });

  it('should not shift when both or neither are present', () => {
    expect(primaryShift(legend('a b', 'H', 'S'), ['a', 'b'])).toBe(0);
    expect(primaryShift(legend('a b'), ['a', 'b'])).toBe(0);
  });

  it('should only shift two-line legends', () => {
    expect(primaryShift(legend('a', 'H'), ['a'])).toBe(0);
    expect(primaryShift(legend('a b c', 'H'), ['a', 'b', 'c'])).toBe(0);
  });
});

describe('firstLineOffset', () => {
  it('should center the block around the anchor', () => {
    expect(firstLineOffset(2, 1.2)).toBe(-0.6);
    expect(firstLineOffset(3, 1.2)).toBe(-1.2);
  });

  it('should apply the shift factor', () => {
    expect(firstLineOffset(2, 1.2, 1)).toBe(-1.2);
    expect(firstLineOffset(2, 1.2, -1)).toBe(-0);
  });
});
