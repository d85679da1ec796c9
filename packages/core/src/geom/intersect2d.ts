/**
 * Closed-form intersections of unbounded carriers
 *
 * Lines are given by two points and extend past them; circles by center and
 * radius. Segment-level bounds are applied by the callers in segIntersect.ts.
 * Every function resolves near-degenerate input with the tolerance `eps`
 * instead of throwing.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, sub2, mul2, dot2, cross2, dist2, length2 } from '../num/vec2.js';

export type LineLineResult =
  | { kind: 'parallel' }
  | { kind: 'collinear' }
  /** t1, t2 are parameters along p0→p1 and q0→q1 (0 and 1 at the given points) */
  | { kind: 'point'; point: Vec2; t1: number; t2: number };

/**
 * Intersection of the lines through `p0, p1` and `q0, q1`. Lines closer than
 * `eps` at both of `q0` and `q1` are collinear.
 */
export function intersectLineLine(p0: Vec2, p1: Vec2, q0: Vec2, q1: Vec2, eps: number): LineLineResult {
  const d1 = sub2(p1, p0);
  const d2 = sub2(q1, q0);
  const len1 = length2(d1);
  const len2 = length2(d2);
  if (len1 === 0 || len2 === 0) {
    return { kind: 'parallel' };
  }

  const offset0 = cross2(d1, sub2(q0, p0)) / len1;
  const offset1 = cross2(d1, sub2(q1, p0)) / len1;
  if (Math.abs(offset0) <= eps && Math.abs(offset1) <= eps) {
    return { kind: 'collinear' };
  }

  const denom = cross2(d1, d2);
  if (Math.abs(denom) <= 1e-12 * len1 * len2) {
    return { kind: 'parallel' };
  }

  const r = sub2(q0, p0);
  const t1 = cross2(r, d2) / denom;
  const t2 = cross2(r, d1) / denom;
  return { kind: 'point', point: add2(p0, mul2(d1, t1)), t1, t2 };
}

export type LineCircleResult =
  | { kind: 'none' }
  | { kind: 'tangent'; point: Vec2; t: number }
  | { kind: 'two'; point0: Vec2; t0: number; point1: Vec2; t1: number };

/**
 * Intersection of the line through `p0, p1` with a circle. A line passing
 * within `eps` of the circle without crossing it by more than that touches
 * it at the foot of the perpendicular from the center.
 */
export function intersectLineCircle(
  p0: Vec2,
  p1: Vec2,
  center: Vec2,
  radius: number,
  eps: number
): LineCircleResult {
  const d = sub2(p1, p0);
  const lenSq = dot2(d, d);
  if (lenSq === 0) {
    return { kind: 'none' };
  }

  const tClosest = dot2(sub2(center, p0), d) / lenSq;
  const foot = add2(p0, mul2(d, tClosest));
  const h = dist2(foot, center);
  if (Math.abs(h - radius) <= eps) {
    return { kind: 'tangent', point: foot, t: tClosest };
  }
  if (h > radius) {
    return { kind: 'none' };
  }

  const half = Math.sqrt(radius * radius - h * h) / Math.sqrt(lenSq);
  const t0 = tClosest - half;
  const t1 = tClosest + half;
  return {
    kind: 'two',
    point0: add2(p0, mul2(d, t0)),
    t0,
    point1: add2(p0, mul2(d, t1)),
    t1,
  };
}

export type CircleCircleResult =
  | { kind: 'none' }
  | { kind: 'coincident' }
  | { kind: 'tangent'; point: Vec2 }
  | { kind: 'two'; point0: Vec2; point1: Vec2 };

/**
 * Intersection of two circles. Circles with centers and radii both equal
 * within `eps` coincide.
 */
export function intersectCircleCircle(
  c1: Vec2,
  r1: number,
  c2: Vec2,
  r2: number,
  eps: number
): CircleCircleResult {
  const d = dist2(c1, c2);
  if (d <= eps) {
    return Math.abs(r1 - r2) <= eps ? { kind: 'coincident' } : { kind: 'none' };
  }
  if (d > r1 + r2 + eps || d < Math.abs(r1 - r2) - eps) {
    return { kind: 'none' };
  }

  // Distance from c1 along the center line to the radical line.
  const a = (r1 * r1 - r2 * r2 + d * d) / (2 * d);
  const hSq = r1 * r1 - a * a;
  const dir = mul2(sub2(c2, c1), 1 / d);
  const mid = add2(c1, mul2(dir, a));
  const h = hSq > 0 ? Math.sqrt(hSq) : 0;
  if (h <= eps) {
    return { kind: 'tangent', point: mid };
  }

  const perp: Vec2 = [-dir[1], dir[0]];
  return {
    kind: 'two',
    point0: add2(mid, mul2(perp, h)),
    point1: sub2(mid, mul2(perp, h)),
  };
}
