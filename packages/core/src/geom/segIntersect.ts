/**
 * Segment-pair intersection and classification
 *
 * Every pair of polyline segments resolves to exactly one of four outcomes:
 *
 * - `none`: disjoint within tolerance
 * - `tangent`: the segments touch without crossing (near-tangent contacts
 *   within `eps` land here too)
 * - `crossing`: one or two transversal intersection points, including
 *   touches at segment end points
 * - `overlap`: the segments share a sub-range of the same line or circle;
 *   two arcs on one circle can share two disjoint ranges
 *
 * Result points within `eps` of any of the four segment end points are
 * replaced by that end point, so slices cut at the same place meet exactly.
 */

import type { Vec2 } from '../num/vec2.js';
import { dist2, angleTo2, pointOnCircle2, lengthSq2, sub2, dot2 } from '../num/vec2.js';
import { fuzzyEqPoint, inRange } from '../num/tolerance.js';
import { normalizeRadians, TAU } from '../num/angle.js';
import type { ArcSegment, LineSegment, PlineSegment, PlineVertex } from '../pline/types.js';
import { pointWithinArcSweep, segmentFromVertices } from '../pline/segment.js';
import { intersectCircleCircle, intersectLineCircle, intersectLineLine } from './intersect2d.js';

export type SegIntersect =
  | { kind: 'none' }
  | { kind: 'tangent'; point: Vec2 }
  | { kind: 'crossing'; points: Vec2[] }
  /** Ranges run in the direction of the first segment, in travel order */
  | { kind: 'overlap'; curve: 'line' | 'arc'; ranges: Array<[Vec2, Vec2]> };

const NONE: SegIntersect = { kind: 'none' };

/**
 * Every point the result touches: crossing points, the tangent point, and
 * both ends of every overlap range
 */
export function intersectPoints(result: SegIntersect): Vec2[] {
  switch (result.kind) {
    case 'none':
      return [];
    case 'tangent':
      return [result.point];
    case 'crossing':
      return result.points;
    case 'overlap':
      return result.ranges.flatMap(([p1, p2]) => [p1, p2]);
  }
}

class EndSnapper {
  private readonly ends: Vec2[];
  private readonly eps: number;

  constructor(seg1: PlineSegment, seg2: PlineSegment, eps: number) {
    this.ends = [seg1.start, seg1.end, seg2.start, seg2.end];
    this.eps = eps;
  }

  snap(point: Vec2): Vec2 {
    let best: Vec2 = point;
    let bestDist = this.eps;
    for (const end of this.ends) {
      const d = dist2(end, point);
      if (d <= bestDist) {
        best = end;
        bestDist = d;
      }
    }
    return best;
  }
}

function distinctPoints(points: Vec2[], eps: number): Vec2[] {
  const out: Vec2[] = [];
  for (const p of points) {
    if (!out.some((q) => fuzzyEqPoint(p, q, eps))) {
      out.push(p);
    }
  }
  return out;
}

function crossingOrNone(points: Vec2[], eps: number): SegIntersect {
  const distinct = distinctPoints(points, eps);
  return distinct.length === 0 ? NONE : { kind: 'crossing', points: distinct };
}

function segLengthOf(seg: PlineSegment): number {
  return seg.kind === 'line' ? dist2(seg.start, seg.end) : seg.radius * Math.abs(seg.sweep);
}

/**
 * Whether `point` lies on the segment within `eps`
 */
function pointOnSegment(seg: PlineSegment, point: Vec2, eps: number): boolean {
  if (seg.kind === 'line') {
    const d = sub2(seg.end, seg.start);
    const lenSq = lengthSq2(d);
    if (lenSq === 0) {
      return dist2(seg.start, point) <= eps;
    }
    const t = Math.min(1, Math.max(0, dot2(sub2(point, seg.start), d) / lenSq));
    const foot: Vec2 = [seg.start[0] + d[0] * t, seg.start[1] + d[1] * t];
    return dist2(foot, point) <= eps;
  }
  return Math.abs(dist2(point, seg.center) - seg.radius) <= eps && pointWithinArcSweep(seg, point, eps);
}

// ============================================================================
// Pair handlers
// ============================================================================

function intersectLines(a: LineSegment, b: LineSegment, eps: number, snapper: EndSnapper): SegIntersect {
  const len1 = dist2(a.start, a.end);
  const res = intersectLineLine(a.start, a.end, b.start, b.end, eps);
  if (res.kind === 'parallel') {
    return NONE;
  }
  if (res.kind === 'point') {
    const len2 = dist2(b.start, b.end);
    if (inRange(res.t1, 0, 1, eps / len1) && inRange(res.t2, 0, 1, eps / len2)) {
      return { kind: 'crossing', points: [snapper.snap(res.point)] };
    }
    return NONE;
  }

  // Collinear: clip b's parameter range against a's [0, 1].
  const d = sub2(a.end, a.start);
  const lenSq = lengthSq2(d);
  const tb0 = dot2(sub2(b.start, a.start), d) / lenSq;
  const tb1 = dot2(sub2(b.end, a.start), d) / lenSq;
  const [loT, loP, hiT, hiP]: [number, Vec2, number, Vec2] = tb0 <= tb1 ? [tb0, b.start, tb1, b.end] : [tb1, b.end, tb0, b.start];
  const startT = Math.max(0, loT);
  const endT = Math.min(1, hiT);
  const startP = loT > 0 ? loP : a.start;
  const endP = hiT < 1 ? hiP : a.end;
  if (startT > endT + eps / len1) {
    return NONE;
  }
  if ((endT - startT) * len1 <= eps) {
    return { kind: 'crossing', points: [snapper.snap(startP)] };
  }
  return { kind: 'overlap', curve: 'line', ranges: [[startP, endP]] };
}

function intersectLineArc(line: LineSegment, arc: ArcSegment, eps: number, snapper: EndSnapper): SegIntersect {
  const len = dist2(line.start, line.end);
  const res = intersectLineCircle(line.start, line.end, arc.center, arc.radius, eps);
  const tTol = eps / len;
  switch (res.kind) {
    case 'none':
      return NONE;
    case 'tangent':
      if (inRange(res.t, 0, 1, tTol) && pointWithinArcSweep(arc, res.point, eps)) {
        return { kind: 'tangent', point: snapper.snap(res.point) };
      }
      return NONE;
    case 'two': {
      const points: Vec2[] = [];
      if (inRange(res.t0, 0, 1, tTol) && pointWithinArcSweep(arc, res.point0, eps)) {
        points.push(snapper.snap(res.point0));
      }
      if (inRange(res.t1, 0, 1, tTol) && pointWithinArcSweep(arc, res.point1, eps)) {
        points.push(snapper.snap(res.point1));
      }
      return crossingOrNone(points, eps);
    }
  }
}

/**
 * Counter-clockwise angular interval covered by an arc: [start, start + length]
 */
function ccwInterval(arc: ArcSegment): { start: number; length: number } {
  const from = arc.ccw ? arc.start : arc.end;
  return { start: normalizeRadians(angleTo2(arc.center, from)), length: Math.abs(arc.sweep) };
}

function intersectCoincidentArcs(a: ArcSegment, b: ArcSegment, eps: number, snapper: EndSnapper): SegIntersect {
  const ia = ccwInterval(a);
  const ib = ccwInterval(b);
  const angTol = eps / a.radius;
  const rel = normalizeRadians(ib.start - ia.start);

  // b's interval expressed in a's frame, tried at both wraps.
  const ranges: Array<[number, number]> = [];
  for (const shift of [rel, rel - TAU]) {
    const lo = Math.max(0, shift);
    const hi = Math.min(ia.length, shift + ib.length);
    if (lo <= hi + angTol) {
      ranges.push([lo, Math.max(lo, hi)]);
    }
  }
  ranges.sort((r1, r2) => r1[0] - r2[0]);

  const toPoint = (angle: number): Vec2 => snapper.snap(pointOnCircle2(a.center, a.radius, ia.start + angle));
  const touches: Vec2[] = [];
  const overlaps: Array<[Vec2, Vec2]> = [];
  for (const [lo, hi] of ranges) {
    if ((hi - lo) * a.radius <= eps) {
      touches.push(toPoint(lo));
    } else {
      overlaps.push([toPoint(lo), toPoint(hi)]);
    }
  }

  if (overlaps.length === 0) {
    return crossingOrNone(touches, eps);
  }
  const all: Array<[Vec2, Vec2]> = [...overlaps, ...touches.map((p): [Vec2, Vec2] => [p, p])];
  if (!a.ccw) {
    // a's frame runs against its travel direction.
    all.reverse();
    for (let i = 0; i < all.length; i++) {
      const range = all[i];
      if (range) {
        all[i] = [range[1], range[0]];
      }
    }
  }
  return { kind: 'overlap', curve: 'arc', ranges: all };
}

function intersectArcs(a: ArcSegment, b: ArcSegment, eps: number, snapper: EndSnapper): SegIntersect {
  const res = intersectCircleCircle(a.center, a.radius, b.center, b.radius, eps);
  switch (res.kind) {
    case 'none':
      return NONE;
    case 'coincident':
      return intersectCoincidentArcs(a, b, eps, snapper);
    case 'tangent':
      if (pointWithinArcSweep(a, res.point, eps) && pointWithinArcSweep(b, res.point, eps)) {
        return { kind: 'tangent', point: snapper.snap(res.point) };
      }
      return NONE;
    case 'two': {
      const points: Vec2[] = [];
      for (const p of [res.point0, res.point1]) {
        if (pointWithinArcSweep(a, p, eps) && pointWithinArcSweep(b, p, eps)) {
          points.push(snapper.snap(p));
        }
      }
      return crossingOrNone(points, eps);
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Intersect segment `v1 → v2` with segment `u1 → u2`
 */
export function intersectSegments(
  v1: PlineVertex,
  v2: PlineVertex,
  u1: PlineVertex,
  u2: PlineVertex,
  eps: number
): SegIntersect {
  const s1 = segmentFromVertices(v1, v2);
  const s2 = segmentFromVertices(u1, u2);
  const snapper = new EndSnapper(s1, s2, eps);

  // Degenerate segments act as points.
  const short1 = segLengthOf(s1) <= eps;
  const short2 = segLengthOf(s2) <= eps;
  if (short1 || short2) {
    const [point, other] = short1 ? [s1.start, s2] : [s2.start, s1];
    return pointOnSegment(other, point, eps) ? { kind: 'crossing', points: [snapper.snap(point)] } : NONE;
  }

  if (s1.kind === 'line' && s2.kind === 'line') {
    return intersectLines(s1, s2, eps, snapper);
  }
  if (s1.kind === 'line' && s2.kind === 'arc') {
    return intersectLineArc(s1, s2, eps, snapper);
  }
  if (s1.kind === 'arc' && s2.kind === 'line') {
    return intersectLineArc(s2, s1, eps, snapper);
  }
  if (s1.kind === 'arc' && s2.kind === 'arc') {
    return intersectArcs(s1, s2, eps, snapper);
  }
  return NONE;
}
