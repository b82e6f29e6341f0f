/**
 * Combo geometry: box anchor, slide interpolation and dendrons.
 */

import type { ComboSpec } from '@keysketch/keymap';
import type { KeyGeometry, PhysicalLayout } from '@keysketch/physical-layout';
import type { DrawConfig, Point } from '../types.js';
import { arcDendronPath, lineDendronPath } from './dendrons.js';

/**
 * Mean of the key centers.
 */
export function centroid(keys: readonly Point[]): Point {
  const sum = keys.reduce((acc, k) => ({ x: acc.x + k.x, y: acc.y + k.y }), { x: 0, y: 0 });
  return { x: sum.x / keys.length, y: sum.y / keys.length };
}

/**
 * The two keys farthest from the centroid, ordered by descending distance,
 * then ascending x, then ascending y. Coincident keys keep input order.
 */
export function slideEndpoints(keys: readonly Point[]): [Point, Point] {
  const mid = centroid(keys);
  const sorted = keys
    .map((k) => ({ key: k, distance: Math.hypot(k.x - mid.x, k.y - mid.y) }))
    .sort((a, b) => b.distance - a.distance || a.key.x - b.key.x || a.key.y - b.key.y);

  const start = sorted[0];
  const end = sorted[1];
  if (!start || !end) {
    throw new RangeError('Sliding a combo needs at least two keys');
  }
  return [start.key, end.key];
}

/**
 * Center of the combo before alignment: the centroid, or the point at
 * `slide` between the two outermost keys (-1 start, 0 midpoint, 1 end).
 */
export function comboCenter(keys: readonly Point[], slide?: number): Point {
  if (slide === undefined) return centroid(keys);

  const [start, end] = slideEndpoints(keys);
  const a = (1 - slide) / 2;
  const b = (1 + slide) / 2;
  return { x: a * start.x + b * end.x, y: a * start.y + b * end.y };
}

/**
 * Final combo box center for its alignment. Keys are in the same
 * coordinate space as the returned point.
 */
export function comboAnchor(
  keys: readonly KeyGeometry[],
  combo: Pick<ComboSpec, 'align' | 'offset' | 'slide'>,
  layout: Pick<PhysicalLayout, 'minWidth' | 'minHeight'>,
  config: Pick<DrawConfig, 'innerPadW' | 'innerPadH'>,
): Point {
  const mid = comboCenter(keys, combo.slide);

  switch (combo.align) {
    case 'mid':
      return mid;
    case 'top':
      return {
        x: mid.x,
        y: Math.min(...keys.map((k) => k.y - k.height / 2)) - config.innerPadH / 2 - combo.offset * layout.minHeight,
      };
    case 'bottom':
      return {
        x: mid.x,
        y: Math.max(...keys.map((k) => k.y + k.height / 2)) + config.innerPadH / 2 + combo.offset * layout.minHeight,
      };
    case 'left':
      return {
        x: Math.min(...keys.map((k) => k.x - k.width / 2)) - config.innerPadW / 2 - combo.offset * layout.minWidth,
        y: mid.y,
      };
    case 'right':
      return {
        x: Math.max(...keys.map((k) => k.x + k.width / 2)) + config.innerPadW / 2 + combo.offset * layout.minWidth,
        y: mid.y,
      };
  }
}

/**
 * Connector paths from the combo box at `anchor` to each key.
 */
export function comboDendrons(
  anchor: Point,
  keys: readonly KeyGeometry[],
  combo: Pick<ComboSpec, 'align' | 'dendron'>,
  config: Pick<DrawConfig, 'arcRadius' | 'arcScale' | 'comboW' | 'comboH'>,
): string[] {
  if (combo.dendron === 'never') return [];

  const arc = { arcRadius: config.arcRadius, arcScale: config.arcScale };

  switch (combo.align) {
    case 'top':
    case 'bottom':
      return keys.map((k) => {
        const shorten = Math.abs(k.x - anchor.x) < config.comboW / 2 ? k.height / 5 : k.height / 3;
        return arcDendronPath(anchor, k, { ...arc, xFirst: true, shorten });
      });
    case 'left':
    case 'right':
      return keys.map((k) => {
        const shorten = Math.abs(k.y - anchor.y) < config.comboH / 2 ? k.width / 5 : k.width / 3;
        return arcDendronPath(anchor, k, { ...arc, xFirst: false, shorten });
      });
    case 'mid':
      return keys
        .filter((k) => combo.dendron === 'always' || Math.hypot(k.x - anchor.x, k.y - anchor.y) >= k.width)
        .map((k) => lineDendronPath(anchor, k, k.width / 3));
  }
}

/**
 * Extra room above and below a layer for top- and bottom-aligned combos.
 */
export function comboOffsets(
  combos: readonly ComboSpec[],
  layout: Pick<PhysicalLayout, 'minHeight'>,
): { top: number; bottom: number } {
  const extent = (align: 'top' | 'bottom'): number =>
    Math.max(0, ...combos.filter((c) => c.align === align).map((c) => c.offset * layout.minHeight));

  return { top: extent('top'), bottom: extent('bottom') };
}
