/**
 * Unit tests for combo placement and connectors
 */

import { describe, expect, it } from 'vitest';
import {
  centroid,
  comboAnchor,
  comboCenter,
  comboDendrons,
  comboOffsets,
  slideEndpoints,
} from '../../src/layout/combo-layout.js';
import { defaultDrawConfig } from '../../src/config/default.js';
import type { ComboSpec } from '@keysketch/keymap';

const key = (x: number, y: number, width = 10, height = 10) => ({ x, y, width, height, rotation: 0 });
const pair = [key(0, 0), key(10, 0)];
const layout = { minWidth: 10, minHeight: 10 };
const config = { innerPadW: 2, innerPadH: 2 };

function makeCombo(overrides: Partial<ComboSpec> = {}): ComboSpec {
  return {
    keyPositions: [0, 1],
    legend: { tap: 'X', hold: '', shifted: '', type: '' },
    align: 'mid',
    offset: 0,
    dendron: 'auto',
    type: '',
    layers: [],
    ...overrides,
  };
}

describe('comboCenter', () => {
  it('should use the centroid without slide', () => {
    expect(centroid(pair)).toEqual({ x: 5, y: 0 });
    expect(comboCenter(pair)).toEqual({ x: 5, y: 0 });
  });

  it('should slide to the end key at 1 and the start key at -1', () => {
    expect(comboCenter(pair, 1)).toEqual({ x: 10, y: 0 });
    expect(comboCenter(pair, -1)).toEqual({ x: 0, y: 0 });
    expect(comboCenter(pair, 0)).toEqual({ x: 5, y: 0 });
  });

  it('should interpolate between the two outermost keys', () => {
    const row = [key(10, 0), key(0, 0), key(20, 0)];

    expect(slideEndpoints(row)).toEqual([row[1], row[2]]);
    expect(comboCenter(row, 0.5)).toEqual({ x: 15, y: 0 });
  });

  it('should break distance ties by x then y', () => {
    const column = [key(0, 10), key(0, -10)];

    expect(slideEndpoints(column)).toEqual([column[1], column[0]]);
  });
});

describe('comboAnchor', () => {
  it('should place mid combos at the center', () => {
    expect(comboAnchor(pair, makeCombo(), layout, config)).toEqual({ x: 5, y: 0 });
    expect(comboAnchor(pair, makeCombo({ slide: 1 }), layout, config)).toEqual({ x: 10, y: 0 });
    expect(comboAnchor(pair, makeCombo({ slide: -1 }), layout, config)).toEqual({ x: 0, y: 0 });
  });

  it('should place top and bottom combos beyond the key edges', () => {
    expect(comboAnchor(pair, makeCombo({ align: 'top', offset: 1 }), layout, config)).toEqual({ x: 5, y: -16 });
    expect(comboAnchor(pair, makeCombo({ align: 'bottom', offset: 1 }), layout, config)).toEqual({ x: 5, y: 16 });
  });

  it('should place left and right combos beyond the key edges', () => {
    expect(comboAnchor(pair, makeCombo({ align: 'left', offset: 1 }), layout, config)).toEqual({ x: -16, y: 0 });
    expect(comboAnchor(pair, makeCombo({ align: 'right', offset: 1 }), layout, config)).toEqual({ x: 26, y: 0 });
  });
});

describe('comboDendrons', () => {
  it('should draw nothing when dendrons are disabled', () => {
    expect(comboDendrons({ x: 5, y: -16 }, pair, makeCombo({ align: 'top', dendron: 'never' }), defaultDrawConfig)).toEqual(
      [],
    );
  });

  it('should skip mid dendrons to nearby keys unless forced', () => {
    const anchor = { x: 5, y: 0 };

    expect(comboDendrons(anchor, pair, makeCombo(), defaultDrawConfig)).toEqual([]);
    expect(comboDendrons(anchor, pair, makeCombo({ dendron: 'always' }), defaultDrawConfig)).toHaveLength(2);
  });

  it('should draw mid dendrons to keys at least a key width away', () => {
    const wide = [key(0, 0), key(30, 0)];
    const paths = comboDendrons({ x: 15, y: 0 }, wide, makeCombo(), defaultDrawConfig);

    expect(paths).toHaveLength(2);
    expect(paths.every((d) => d.startsWith('M15,0 l'))).toBe(true);
  });

  it('should shorten arc dendrons less for keys under the combo box', () => {
    const keys = [key(10, 40, 10, 30), key(50, 40, 10, 30)];
    const paths = comboDendrons({ x: 0, y: 0 }, keys, makeCombo({ align: 'top' }), defaultDrawConfig);

    // key 0 is within comboW / 2 horizontally: shortened by 30 / 5
    expect(paths[0]).toBe('M0,0 h4 a6,6 0 0 1 6,6 v28');
    // key 1 is not: shortened by 30 / 3
    expect(paths[1]).toBe('M0,0 h44 a6,6 0 0 1 6,6 v24');
  });
  it('should draw left combo dendrons vertical first', () => {
    const keys = [key(40, 10, 30, 10), key(40, 50, 30, 10)];
    const paths = comboDendrons({ x: 0, y: 0 }, keys, makeCombo({ align: 'left' }), defaultDrawConfig);

    // key 0 is within comboH / 2 vertically: shortened by 30 / 5
    expect(paths[0]).toBe('M0,0 v4 a6,6 0 0 0 6,6 h28');
    // key 1 is not: shortened by 30 / 3
    expect(paths[1]).toBe('M0,0 v44 a6,6 0 0 0 6,6 h24');
  });

  it('should bend right combo dendrons back toward the keys', () => {
    const paths = comboDendrons({ x: 100, y: 0 }, [key(40, 10, 30, 10)], makeCombo({ align: 'right' }), defaultDrawConfig);

    expect(paths).toEqual(['M100,0 v4 a6,6 0 0 1 -6,6 h-48']);
  });
});

describe('comboOffsets', () => {
  it('should reserve the largest top and bottom offsets', () => {
    const combos = [
      makeCombo({ align: 'top', offset: 0.5 }),
      makeCombo({ align: 'top', offset: 2 }),
      makeCombo({ align: 'bottom', offset: 1 }),
      makeCombo({ align: 'left', offset: 3 }),
    ];

    expect(comboOffsets(combos, { minHeight: 10 })).toEqual({ top: 20, bottom: 10 });
  });

  it('should reserve nothing without aligned combos', () => {
    expect(comboOffsets([makeCombo()], { minHeight: 10 })).toEqual({ top: 0, bottom: 0 });
  });
});
