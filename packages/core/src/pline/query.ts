/**
 * Scalar and point queries over a read view
 */

import type { Vec2 } from '../num/vec2.js';
import { angleTo2, cross2, dist2, distSq2, dot2, pointOnCircle2, sub2 } from '../num/vec2.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import { orient2DRobust } from '../num/predicates.js';
import type { AABB, PlineVertex, PolylineRead } from './types.js';
import { plineVertex, vertexPos, withBulge } from './types.js';
import {
  arcRadiusAndCenter,
  bulgeIsZero,
  segBoundingBox,
  segClosestPoint,
  segLength,
  segSplitAtPoint,
} from './segment.js';
import { segmentCount, segmentPairs, segmentVertices } from './traverse.js';
import { bulgeToSweep, sweepToBulge } from '../num/angle.js';
import { Polyline } from './Polyline.js';
import { PolylineBuilder } from './PolylineBuilder.js';

export type Orientation = 'ccw' | 'cw' | 'open';

/**
 * Signed enclosed area: positive for counter-clockwise loops, 0 for open
 * polylines. Each arc adds the circular segment between its chord and itself.
 */
export function area(view: PolylineRead): number {
  if (!view.isClosed || view.vertexCount < 2) {
    return 0;
  }
  let doubled = 0;
  for (const [v1, v2] of segmentPairs(view)) {
    doubled += cross2(vertexPos(v1), vertexPos(v2));
    if (!bulgeIsZero(v1.bulge)) {
      const { radius } = arcRadiusAndCenter(v1, v2);
      const sweep = Math.abs(bulgeToSweep(v1.bulge));
      const segmentArea = radius * radius * (sweep - Math.sin(sweep));
      doubled += v1.bulge > 0 ? segmentArea : -segmentArea;
    }
  }
  return doubled / 2;
}

export function pathLength(view: PolylineRead): number {
  let total = 0;
  for (const [v1, v2] of segmentPairs(view)) {
    total += segLength(v1, v2);
  }
  return total;
}

/**
 * Bounding box of the whole polyline, or null when it has no vertices
 */
export function extents(view: PolylineRead): AABB | null {
  if (view.vertexCount === 0) {
    return null;
  }
  const first = view.at(0);
  const box: AABB = { minX: first.x, minY: first.y, maxX: first.x, maxY: first.y };
  for (const [v1, v2] of segmentPairs(view)) {
    const segBox = segBoundingBox(v1, v2);
    box.minX = Math.min(box.minX, segBox.minX);
    box.minY = Math.min(box.minY, segBox.minY);
    box.maxX = Math.max(box.maxX, segBox.maxX);
    box.maxY = Math.max(box.maxY, segBox.maxY);
  }
  return box;
}

export function orientation(view: PolylineRead): Orientation {
  if (!view.isClosed) {
    return 'open';
  }
  return area(view) < 0 ? 'cw' : 'ccw';
}

/**
 * Side of `point` relative to the directed line `a → b`: 1 for left, -1 for
 * right. Collinear points are resolved as if nudged up by an infinitesimal
 * amount (and right by a far smaller one), so a point on a chord is counted
 * the same way by the crossing rule and by the arc cap test.
 */
function sideOf(a: Vec2, b: Vec2, point: Vec2): 1 | -1 {
  const o = orient2DRobust(a, b, point);
  if (o !== 0) {
    return o > 0 ? 1 : -1;
  }
  const dx = b[0] - a[0];
  if (dx !== 0) {
    return dx > 0 ? 1 : -1;
  }
  return b[1] - a[1] > 0 ? -1 : 1;
}

/**
 * Winding number of a closed polyline around `point`. The result is not
 * meaningful for points lying on the polyline itself.
 *
 * Each segment contributes the crossing count of its chord; an arc also
 * contributes ±1 when the point lies in the cap between chord and arc.
 */
export function windingNumber(view: PolylineRead, point: Vec2): number {
  if (!view.isClosed || view.vertexCount < 2) {
    return 0;
  }
  let winding = 0;
  for (const [v1, v2] of segmentPairs(view)) {
    const a = vertexPos(v1);
    const b = vertexPos(v2);
    const side = sideOf(a, b, point);
    if (a[1] <= point[1]) {
      if (b[1] > point[1] && side === 1) {
        winding += 1;
      }
    } else if (b[1] <= point[1] && side === -1) {
      winding -= 1;
    }

    if (bulgeIsZero(v1.bulge)) {
      continue;
    }
    const { radius, center } = arcRadiusAndCenter(v1, v2);
    if (distSq2(point, center) >= radius * radius) {
      continue;
    }
    // Counter-clockwise arcs bulge to the right of their chord.
    if (v1.bulge > 0 && side === -1) {
      winding += 1;
    } else if (v1.bulge < 0 && side === 1) {
      winding -= 1;
    }
  }
  return winding;
}

export interface ClosestPointResult {
  segIndex: number;
  point: Vec2;
  distance: number;
}

/**
 * Closest point on the polyline to `point`, or null for an empty view. A
 * single-vertex view answers with that vertex.
 */
export function closestPoint(view: PolylineRead, point: Vec2): ClosestPointResult | null {
  if (view.vertexCount === 0) {
    return null;
  }
  if (view.vertexCount === 1) {
    const only = vertexPos(view.at(0));
    return { segIndex: 0, point: only, distance: dist2(only, point) };
  }
  let best: ClosestPointResult | null = null;
  const count = segmentCount(view);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(view, i);
    const candidate = segClosestPoint(v1, v2, point);
    const distance = dist2(candidate, point);
    if (best === null || distance < best.distance) {
      best = { segIndex: i, point: candidate, distance };
    }
  }
  return best;
}

/**
 * Copy without consecutive vertices closer than `eps`. When two vertices
 * coincide the later one's bulge is kept, so a zero-length segment disappears
 * without changing the shape. The closing vertex of a closed polyline is also
 * dropped when it coincides with the first.
 */
export function removeRepeatPos(view: PolylineRead, eps: number): Polyline {
  const builder = new PolylineBuilder(view.isClosed);
  for (let i = 0; i < view.vertexCount; i++) {
    builder.addOrReplace(view.at(i), eps);
  }
  if (view.isClosed && builder.vertexCount > 1) {
    const first = builder.at(0);
    const last = builder.at(builder.vertexCount - 1);
    if (fuzzyEqPoint(vertexPos(first), vertexPos(last), eps)) {
      builder.remove(builder.vertexCount - 1);
    }
  }
  return builder.build();
}

/**
 * Copy running in the opposite direction
 */
export function invertedDirection(view: PolylineRead): Polyline {
  const builder = new PolylineBuilder(view.isClosed);
  for (let i = 0; i < view.vertexCount; i++) {
    builder.add(view.at(i));
  }
  builder.invertDirection();
  return builder.build();
}

export function translate(view: PolylineRead, dx: number, dy: number): Polyline {
  const out: PlineVertex[] = [];
  for (let i = 0; i < view.vertexCount; i++) {
    const v = view.at(i);
    out.push(plineVertex(v.x + dx, v.y + dy, v.bulge));
  }
  return new Polyline(out, view.isClosed);
}

/**
 * Uniform scale about the origin. A negative factor mirrors through the
 * origin, which keeps arc directions.
 */
export function scale(view: PolylineRead, factor: number): Polyline {
  const out: PlineVertex[] = [];
  for (let i = 0; i < view.vertexCount; i++) {
    const v = view.at(i);
    out.push(plineVertex(v.x * factor, v.y * factor, v.bulge));
  }
  return new Polyline(out, view.isClosed);
}

/**
 * Same closure, vertex count, and vertices within `eps` (bulges included)
 */
export function fuzzyEqual(a: PolylineRead, b: PolylineRead, eps: number): boolean {
  if (a.isClosed !== b.isClosed || a.vertexCount !== b.vertexCount) {
    return false;
  }
  for (let i = 0; i < a.vertexCount; i++) {
    const va = a.at(i);
    const vb = b.at(i);
    if (!fuzzyEqPoint(vertexPos(va), vertexPos(vb), eps) || Math.abs(va.bulge - vb.bulge) > eps) {
      return false;
    }
  }
  return true;
}

/**
 * Bulge that replaces `v1 → v2 → v3` with a single segment from `v1` to
 * `v3`, or null when `v2` cannot be dropped. Lines merge when collinear and
 * running the same way; arcs merge when they share a circle and direction
 * and the combined sweep stays within a half turn.
 */
function mergedBulge(v1: PlineVertex, v2: PlineVertex, v3: PlineVertex, eps: number): number | null {
  const p1 = vertexPos(v1);
  const p2 = vertexPos(v2);
  const p3 = vertexPos(v3);
  if (bulgeIsZero(v1.bulge) && bulgeIsZero(v2.bulge)) {
    const chord = dist2(p1, p3);
    if (chord <= eps) {
      return null;
    }
    const offLine = Math.abs(cross2(sub2(p3, p1), sub2(p2, p1))) / chord;
    return offLine <= eps && dot2(sub2(p2, p1), sub2(p3, p2)) > 0 ? 0 : null;
  }
  if (bulgeIsZero(v1.bulge) || bulgeIsZero(v2.bulge) || (v1.bulge > 0) !== (v2.bulge > 0)) {
    return null;
  }
  const first = arcRadiusAndCenter(v1, v2);
  const second = arcRadiusAndCenter(v2, v3);
  if (Math.abs(first.radius - second.radius) > eps || !fuzzyEqPoint(first.center, second.center, eps)) {
    return null;
  }
  const sweep = bulgeToSweep(v1.bulge) + bulgeToSweep(v2.bulge);
  return Math.abs(sweep) <= Math.PI + 1e-9 ? sweepToBulge(sweep) : null;
}

/**
 * Copy without repeated positions, collinear line vertices, or vertices
 * splitting one arc into pieces. The first and last vertex of an open
 * polyline always stay.
 */
export function removeRedundant(view: PolylineRead, eps: number): Polyline {
  const clean = removeRepeatPos(view, eps);
  const out: PlineVertex[] = [];
  for (let i = 0; i < clean.vertexCount; i++) {
    const v = clean.at(i);
    while (out.length >= 2) {
      const bulge = mergedBulge(out[out.length - 2], out[out.length - 1], v, eps);
      if (bulge === null) {
        break;
      }
      out.pop();
      out[out.length - 1] = withBulge(out[out.length - 1], bulge);
    }
    out.push(v);
  }

  while (clean.isClosed && out.length > 2) {
    const n = out.length;
    const tail = mergedBulge(out[n - 2], out[n - 1], out[0], eps);
    if (tail !== null) {
      out.pop();
      out[n - 2] = withBulge(out[n - 2], tail);
      continue;
    }
    const head = mergedBulge(out[n - 1], out[0], out[1], eps);
    if (head === null) {
      break;
    }
    out.shift();
    out[n - 2] = withBulge(out[n - 2], head);
  }
  return new Polyline(out, clean.isClosed);
}

/**
 * Closed polyline with the same shape starting at `point`, which lies on
 * segment `segIndex`. The segment is split unless `point` is one of its ends.
 */
export function rotateStart(view: PolylineRead, segIndex: number, point: Vec2, eps: number): Polyline {
  const count = view.vertexCount;
  if (!view.isClosed || count < 2) {
    throw new RangeError('rotateStart needs a closed polyline with at least 2 vertices');
  }
  if (!Number.isInteger(segIndex) || segIndex < 0 || segIndex >= count) {
    throw new RangeError(`Segment index ${segIndex} out of range [0, ${count})`);
  }
  const startingAt = (start: number): PlineVertex[] => {
    const out: PlineVertex[] = [];
    for (let k = 0; k < count; k++) {
      out.push(view.at((start + k) % count));
    }
    return out;
  };

  const next = (segIndex + 1) % count;
  if (fuzzyEqPoint(vertexPos(view.at(segIndex)), point, eps)) {
    return new Polyline(startingAt(segIndex), true);
  }
  if (fuzzyEqPoint(vertexPos(view.at(next)), point, eps)) {
    return new Polyline(startingAt(next), true);
  }
  const { updatedStart, splitVertex } = segSplitAtPoint(view.at(segIndex), view.at(next), point, eps);
  const rest = startingAt(next);
  rest[rest.length - 1] = updatedStart;
  return new Polyline([splitVertex, ...rest], true);
}

/**
 * Copy with every arc replaced by chords whose ends lie on the arc and that
 * stray at most `errorDistance` from it. Arcs with a radius below
 * `errorDistance` become a single chord.
 */
export function arcsToApproxLines(view: PolylineRead, errorDistance: number): Polyline {
  if (!(errorDistance > 0)) {
    throw new RangeError(`Error distance must be positive, got ${errorDistance}`);
  }
  const out: PlineVertex[] = [];
  for (const [v1, v2] of segmentPairs(view)) {
    out.push(withBulge(v1, 0));
    if (bulgeIsZero(v1.bulge)) {
      continue;
    }
    const { radius, center } = arcRadiusAndCenter(v1, v2);
    if (radius <= errorDistance) {
      continue;
    }
    const sweep = bulgeToSweep(v1.bulge);
    const stepAngle = 2 * Math.acos(1 - errorDistance / radius);
    const steps = Math.ceil(Math.abs(sweep) / stepAngle);
    const startAngle = angleTo2(center, vertexPos(v1));
    for (let k = 1; k < steps; k++) {
      const [x, y] = pointOnCircle2(center, radius, startAngle + (sweep * k) / steps);
      out.push(plineVertex(x, y));
    }
  }
  if (!view.isClosed && view.vertexCount > 0) {
    out.push(withBulge(view.at(view.vertexCount - 1), 0));
  }
  return new Polyline(out, view.isClosed);
}
