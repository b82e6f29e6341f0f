/**
 * Dendron path builders: the connectors from a combo box to its keys.
 * Pure string output, relative path commands after the initial moveto.
 */

import type { Point } from '../types.js';

/** Magnitude of `magnitude` with the sign of `sign` (0 counts as positive) */
export function copysign(magnitude: number, sign: number): number {
  const abs = Math.abs(magnitude);
  return sign < 0 || Object.is(sign, -0) ? -abs : abs;
}

export interface ArcDendronOptions {
  /** Draw the horizontal leg first (top/bottom combos) */
  xFirst: boolean;
  /** Distance removed from the key-side leg */
  shorten: number;
  arcRadius: number;
  arcScale: number;
}

/**
 * L-shaped path: straight leg, quarter-circle arc, straight leg.
 * The arc sweep follows the sign of the displacement so every dendron of
 * a combo bends the same way.
 */
export function arcDendronPath(from: Point, to: Point, options: ArcDendronOptions): string {
  const { xFirst, shorten, arcRadius: r, arcScale } = options;
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const arcX = copysign(r, dx);
  const arcY = copysign(r, dy);
  let clockwise = to.x > from.x !== to.y > from.y;

  let first: string;
  let second: string;
  if (xFirst) {
    first = `h${arcScale * dx - arcX}`;
    second = `v${dy - arcY - copysign(shorten, dy)}`;
    clockwise = !clockwise;
  } else {
    first = `v${arcScale * dy - arcY}`;
    second = `h${dx - arcX - copysign(shorten, dx)}`;
  }

  const arc = `a${r},${r} 0 0 ${clockwise ? 1 : 0} ${arcX},${arcY}`;
  return `M${from.x},${from.y} ${first} ${arc} ${second}`;
}

/**
 * Straight path, clipped by `shorten` at the far end. The clip is skipped
 * when it is not shorter than the segment.
 */
export function lineDendronPath(from: Point, to: Point, shorten: number): string {
  let dx = to.x - from.x;
  let dy = to.y - from.y;
  const length = Math.hypot(dx, dy);

  if (shorten > 0 && shorten < length) {
    const scale = 1 - shorten / length;
    dx *= scale;
    dy *= scale;
  }

  return `M${from.x},${from.y} l${dx},${dy}`;
}
