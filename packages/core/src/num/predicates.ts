/**
 * Geometric predicates
 *
 * Orientation tests run on Shewchuk-style adaptive precision arithmetic from
 * robust-predicates, so side-of-line decisions in winding numbers and corner
 * classification stay consistent for nearly collinear input.
 */

import { orient2d as robustOrient2d } from 'robust-predicates';
import type { Vec2 } from './vec2.js';
import type { NumericContext } from './tolerance.js';

/**
 * Exact sign of `(b - a) × (c - a)`: positive when `c` is left of `a → b`,
 * negative when right, zero when collinear.
 *
 * robust-predicates uses the opposite sign convention, so the result is negated.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

/**
 * Tolerance-aware orientation: 1 (left), -1 (right) or 0 when `c` lies within
 * `ctx.tol.length` of the line through `a` and `b`.
 */
export function orient2D(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): -1 | 0 | 1 {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const baseLength = Math.sqrt(dx * dx + dy * dy);
  if (baseLength < ctx.tol.length) {
    return 0;
  }

  // The determinant is twice the triangle area: base length times height.
  const result = orient2DRobust(a, b, c);
  if (Math.abs(result) < ctx.tol.length * baseLength) {
    return 0;
  }
  return result > 0 ? 1 : -1;
}

/**
 * `c` strictly left of the directed line `a → b`
 */
export function isLeft(a: Vec2, b: Vec2, c: Vec2): boolean {
  return orient2DRobust(a, b, c) > 0;
}

/**
 * `c` strictly right of the directed line `a → b`
 */
export function isRight(a: Vec2, b: Vec2, c: Vec2): boolean {
  return orient2DRobust(a, b, c) < 0;
}
