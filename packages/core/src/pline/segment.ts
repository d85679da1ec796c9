/**
 * Segment model
 *
 * Pure functions of a vertex pair `(v1, v2)`: the segment runs from `v1` to
 * `v2` and its shape is given by `v1.bulge`. Nothing here looks at the rest of
 * the polyline.
 */

import type { Vec2 } from '../num/vec2.js';
import {
  add2,
  sub2,
  mul2,
  dot2,
  dist2,
  lerp2,
  normalize2,
  perpLeft2,
  perpRight2,
  angleTo2,
  pointOnCircle2,
  lengthSq2,
} from '../num/vec2.js';
import { bulgeToSweep, deltaAngleSigned, normalizeRadians, sweepToBulge, TAU } from '../num/angle.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import type { AABB, ArcSegment, PlineSegment, PlineVertex } from './types.js';
import { vertexAt, vertexPos, withBulge } from './types.js';

/**
 * Bulges smaller than this in magnitude describe straight segments
 */
export const BULGE_ZERO_EPS = 1e-8;

export function bulgeIsZero(bulge: number): boolean {
  return Math.abs(bulge) < BULGE_ZERO_EPS;
}

export function isArcSegment(v1: PlineVertex): boolean {
  return !bulgeIsZero(v1.bulge);
}

/**
 * Radius and center of the arc from `v1` to `v2` described by `v1.bulge`.
 *
 * With chord length `c` and `b = |bulge|`, the radius is `c(b² + 1) / 4b` and
 * the center sits `r - bc/2` from the chord midpoint, on the left of the chord
 * for counter-clockwise arcs. For sweeps above 180° that distance is negative
 * and the center crosses to the other side.
 */
export function arcRadiusAndCenter(v1: PlineVertex, v2: PlineVertex): { radius: number; center: Vec2 } {
  const dx = v2.x - v1.x;
  const dy = v2.y - v1.y;
  const chord = Math.sqrt(dx * dx + dy * dy);
  const b = Math.abs(v1.bulge);
  const radius = (chord * (b * b + 1)) / (4 * b);
  const sagitta = (b * chord) / 2;
  const m = radius - sagitta;
  const side = v1.bulge > 0 ? 1 : -1;
  const offsetX = (-side * m * dy) / chord;
  const offsetY = (side * m * dx) / chord;
  return {
    radius,
    center: [(v1.x + v2.x) / 2 + offsetX, (v1.y + v2.y) / 2 + offsetY],
  };
}

export function segmentFromVertices(v1: PlineVertex, v2: PlineVertex): PlineSegment {
  const start = vertexPos(v1);
  const end = vertexPos(v2);
  if (bulgeIsZero(v1.bulge) || (v1.x === v2.x && v1.y === v2.y)) {
    return { kind: 'line', start, end };
  }
  const { radius, center } = arcRadiusAndCenter(v1, v2);
  return {
    kind: 'arc',
    start,
    end,
    center,
    radius,
    ccw: v1.bulge > 0,
    sweep: bulgeToSweep(v1.bulge),
  };
}

export function segLength(v1: PlineVertex, v2: PlineVertex): number {
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    return dist2(seg.start, seg.end);
  }
  return seg.radius * Math.abs(seg.sweep);
}

/**
 * Point at normalized parameter `t` along the segment (0 at `v1`, 1 at `v2`).
 * Arcs are parameterized by angle, which is proportional to arc length.
 */
export function segPointAt(v1: PlineVertex, v2: PlineVertex, t: number): Vec2 {
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    return lerp2(seg.start, seg.end, t);
  }
  if (t === 0) {
    return seg.start;
  }
  if (t === 1) {
    return seg.end;
  }
  const startAngle = angleTo2(seg.center, seg.start);
  return pointOnCircle2(seg.center, seg.radius, startAngle + seg.sweep * t);
}

export function segMidpoint(v1: PlineVertex, v2: PlineVertex): Vec2 {
  return segPointAt(v1, v2, 0.5);
}

/**
 * Whether `point` (assumed to lie on the arc's circle) falls inside the arc's
 * angular range, allowing `eps` of arc length past either end.
 */
export function pointWithinArcSweep(arc: ArcSegment, point: Vec2, eps: number): boolean {
  const startAngle = angleTo2(arc.center, arc.start);
  const pointAngle = angleTo2(arc.center, point);
  const rel = Math.abs(deltaAngleSigned(startAngle, pointAngle, !arc.ccw));
  const sweep = Math.abs(arc.sweep);
  const angTol = arc.radius > 0 ? eps / arc.radius : 0;
  return rel <= sweep + angTol || rel >= TAU - angTol;
}

/**
 * Normalized position of `point` along the segment, assuming it lies on it
 */
export function segParamOfPoint(v1: PlineVertex, v2: PlineVertex, point: Vec2): number {
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    const d = sub2(seg.end, seg.start);
    const lenSq = lengthSq2(d);
    if (lenSq === 0) {
      return 0;
    }
    return dot2(sub2(point, seg.start), d) / lenSq;
  }
  const startAngle = angleTo2(seg.center, seg.start);
  const rel = deltaAngleSigned(startAngle, angleTo2(seg.center, point), !seg.ccw);
  const t = rel / seg.sweep;
  // A point a hair before the start wraps to almost a full turn.
  if (t > 1 && Math.abs(rel) - Math.abs(seg.sweep) > (TAU - Math.abs(rel))) {
    return (Math.abs(rel) - TAU) / Math.abs(seg.sweep);
  }
  return t;
}

export interface SplitResult {
  /** `v1` with its bulge trimmed to end at the split point */
  updatedStart: PlineVertex;
  /** Vertex at the split point carrying the bulge of the remainder up to `v2` */
  splitVertex: PlineVertex;
}

/**
 * Split the segment `v1 → v2` at `point`, which must lie on it.
 */
export function segSplitAtPoint(v1: PlineVertex, v2: PlineVertex, point: Vec2, eps: number): SplitResult {
  if (bulgeIsZero(v1.bulge)) {
    return { updatedStart: v1, splitVertex: vertexAt(point, 0) };
  }

  const start = vertexPos(v1);
  const end = vertexPos(v2);
  if (fuzzyEqPoint(start, end, eps) || fuzzyEqPoint(start, point, eps)) {
    return { updatedStart: vertexAt(point, 0), splitVertex: vertexAt(point, v1.bulge) };
  }
  if (fuzzyEqPoint(end, point, eps)) {
    return { updatedStart: v1, splitVertex: vertexAt(end, 0) };
  }

  const { center } = arcRadiusAndCenter(v1, v2);
  const negative = v1.bulge < 0;
  const pointAngle = angleTo2(center, point);
  const firstSweep = deltaAngleSigned(angleTo2(center, start), pointAngle, negative);
  const secondSweep = deltaAngleSigned(pointAngle, angleTo2(center, end), negative);
  return {
    updatedStart: withBulge(v1, sweepToBulge(firstSweep)),
    splitVertex: vertexAt(point, sweepToBulge(secondSweep)),
  };
}

/**
 * Closest point on the segment to `point`
 */
export function segClosestPoint(v1: PlineVertex, v2: PlineVertex, point: Vec2): Vec2 {
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    const d = sub2(seg.end, seg.start);
    const lenSq = lengthSq2(d);
    if (lenSq === 0) {
      return seg.start;
    }
    const t = Math.min(1, Math.max(0, dot2(sub2(point, seg.start), d) / lenSq));
    if (t === 0) {
      return seg.start;
    }
    if (t === 1) {
      return seg.end;
    }
    return add2(seg.start, mul2(d, t));
  }

  const toPoint = sub2(point, seg.center);
  if (lengthSq2(toPoint) === 0) {
    return seg.start;
  }
  const onCircle = add2(seg.center, mul2(normalize2(toPoint), seg.radius));
  if (pointWithinArcSweep(seg, onCircle, 0)) {
    return onCircle;
  }
  return dist2(seg.start, point) <= dist2(seg.end, point) ? seg.start : seg.end;
}

/**
 * Exact bounding box of the segment, including the extreme points of arcs
 */
export function segBoundingBox(v1: PlineVertex, v2: PlineVertex): AABB {
  const box: AABB = {
    minX: Math.min(v1.x, v2.x),
    minY: Math.min(v1.y, v2.y),
    maxX: Math.max(v1.x, v2.x),
    maxY: Math.max(v1.y, v2.y),
  };
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    return box;
  }

  const startAngle = angleTo2(seg.center, seg.start);
  const sweep = Math.abs(seg.sweep);
  for (let quadrant = 0; quadrant < 4; quadrant++) {
    const axisAngle = (quadrant * Math.PI) / 2;
    const rel = seg.ccw
      ? normalizeRadians(axisAngle - startAngle)
      : normalizeRadians(startAngle - axisAngle);
    if (rel > sweep) {
      continue;
    }
    const p = pointOnCircle2(seg.center, seg.radius, axisAngle);
    box.minX = Math.min(box.minX, p[0]);
    box.minY = Math.min(box.minY, p[1]);
    box.maxX = Math.max(box.maxX, p[0]);
    box.maxY = Math.max(box.maxY, p[1]);
  }
  return box;
}

/**
 * Unit tangent in the direction of travel at `point` on the segment
 */
export function segTangentAt(v1: PlineVertex, v2: PlineVertex, point: Vec2): Vec2 {
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    return normalize2(sub2(seg.end, seg.start));
  }
  const radial = sub2(point, seg.center);
  return normalize2(seg.ccw ? perpLeft2(radial) : perpRight2(radial));
}

export function segStartTangent(v1: PlineVertex, v2: PlineVertex): Vec2 {
  return segTangentAt(v1, v2, vertexPos(v1));
}

export function segEndTangent(v1: PlineVertex, v2: PlineVertex): Vec2 {
  return segTangentAt(v1, v2, vertexPos(v2));
}
