/**
 * Classification for polyline booleans
 *
 * Slices are judged at the point halfway along their length: on the other
 * boundary they are coincident (same or opposite direction, by tangent),
 * otherwise the other operand's winding number decides inside or outside.
 */

import type { Vec2 } from '../num/vec2.js';
import { dist2, dot2 } from '../num/vec2.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import { segClosestPoint, segLength, segPointAt, segTangentAt } from '../pline/segment.js';
import { segmentCount, segmentPairs, segmentVertices } from '../pline/traverse.js';
import { pathLength, windingNumber } from '../pline/query.js';
import type { StaticAABB2DIndex } from '../spatial/StaticAABB2DIndex.js';
import type { Containment, SliceClassification } from './types.js';

/**
 * An operand together with its segment index
 */
export interface IndexedPline {
  pline: PolylineRead;
  index: StaticAABB2DIndex;
}

interface BoundaryHit {
  segIndex: number;
  point: Vec2;
  distance: number;
}

/**
 * Closest boundary point of `target` within `reach` of `point`, or null
 */
export function nearestWithin(target: IndexedPline, point: Vec2, reach: number): BoundaryHit | null {
  let best: BoundaryHit | null = null;
  const found = target.index
    .query(point[0] - reach, point[1] - reach, point[0] + reach, point[1] + reach)
    .sort((a, b) => a - b);
  for (const i of found) {
    const [v1, v2] = segmentVertices(target.pline, i);
    const candidate = segClosestPoint(v1, v2, point);
    const distance = dist2(candidate, point);
    if (distance <= reach && (best === null || distance < best.distance)) {
      best = { segIndex: i, point: candidate, distance };
    }
  }
  return best;
}

const SAMPLE_PARAMS = [0.5, 0.25, 0.75] as const;

/**
 * A point on `source` that is not on the boundary of `other`. Falls back to
 * the first vertex when every candidate touches `other`.
 */
export function samplePointOff(source: PolylineRead, other: IndexedPline, eps: number): Vec2 {
  const count = segmentCount(source);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(source, i);
    for (const t of SAMPLE_PARAMS) {
      const p = segPointAt(v1, v2, t);
      if (nearestWithin(other, p, eps) === null) {
        return p;
      }
    }
  }
  return vertexPos(source.at(0));
}

/**
 * Relation between two closed operands that do not cross
 */
export function classifyContainment(a: IndexedPline, b: IndexedPline, eps: number): Containment {
  if (windingNumber(b.pline, samplePointOff(a.pline, b, eps)) !== 0) {
    return 'aInsideB';
  }
  if (windingNumber(a.pline, samplePointOff(b.pline, a, eps)) !== 0) {
    return 'bInsideA';
  }
  return 'disjoint';
}

/**
 * Point and unit tangent halfway along `slice`
 */
export function sliceMidpoint(slice: PolylineRead): { point: Vec2; tangent: Vec2 } {
  let remaining = pathLength(slice) / 2;
  let last: { point: Vec2; tangent: Vec2 } | undefined;
  for (const [v1, v2] of segmentPairs(slice)) {
    const length = segLength(v1, v2);
    const point = remaining <= length && length > 0 ? segPointAt(v1, v2, remaining / length) : vertexPos(v2);
    last = { point, tangent: segTangentAt(v1, v2, point) };
    if (remaining <= length) {
      return last;
    }
    remaining -= length;
  }
  return last ?? { point: vertexPos(slice.at(0)), tangent: [1, 0] };
}

export function classifySlice(slice: PolylineRead, other: IndexedPline, eps: number): SliceClassification {
  const { point, tangent } = sliceMidpoint(slice);
  const hit = nearestWithin(other, point, eps);
  if (hit !== null) {
    const [u1, u2] = segmentVertices(other.pline, hit.segIndex);
    const otherTangent = segTangentAt(u1, u2, hit.point);
    return dot2(tangent, otherTangent) > 0 ? 'coincidentSame' : 'coincidentOpposite';
  }
  return windingNumber(other.pline, point) !== 0 ? 'inside' : 'outside';
}
