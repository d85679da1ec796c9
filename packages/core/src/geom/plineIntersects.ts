/**
 * Polyline-level intersection collection
 *
 * Runs the broad phase through a StaticAABB2DIndex and the narrow phase
 * through `intersectSegments`. Tangent touches are not collected: they mark
 * contact, not a place where either polyline needs to be cut.
 */

import type { Vec2 } from '../num/vec2.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import { segBoundingBox } from '../pline/segment.js';
import { segmentCount, segmentVertices } from '../pline/traverse.js';
import type { StaticAABB2DIndex } from '../spatial/StaticAABB2DIndex.js';
import { queryBox } from '../spatial/plineIndex.js';
import type { SegIntersect } from './segIntersect.js';
import { intersectSegments } from './segIntersect.js';

export interface PlineBasicIntersect {
  /** Segment index on the first polyline */
  index1: number;
  /** Segment index on the second polyline (or the same one, for self intersects) */
  index2: number;
  point: Vec2;
}

export interface PlineOverlappingIntersect {
  index1: number;
  index2: number;
  /** Start of the shared range, in the first segment's direction */
  point1: Vec2;
  point2: Vec2;
}

export interface PlineIntersectsCollection {
  basic: PlineBasicIntersect[];
  overlapping: PlineOverlappingIntersect[];
}

function collect(
  out: PlineIntersectsCollection,
  index1: number,
  index2: number,
  result: SegIntersect,
  skip: (point: Vec2) => boolean
): void {
  if (result.kind === 'crossing') {
    for (const point of result.points) {
      if (!skip(point)) {
        out.basic.push({ index1, index2, point });
      }
    }
    return;
  }
  if (result.kind === 'overlap') {
    for (const [point1, point2] of result.ranges) {
      if (point1[0] === point2[0] && point1[1] === point2[1]) {
        if (!skip(point1)) {
          out.basic.push({ index1, index2, point: point1 });
        }
      } else {
        out.overlapping.push({ index1, index2, point1, point2 });
      }
    }
  }
}

/**
 * Intersections among a polyline's own segments. Each pair is visited once
 * (`index1 < index2`). Adjacent segments always meet at their shared vertex,
 * so intersection points there are ignored.
 */
export function findSelfIntersects(
  view: PolylineRead,
  index: StaticAABB2DIndex,
  eps: number
): PlineIntersectsCollection {
  const out: PlineIntersectsCollection = { basic: [], overlapping: [] };
  const count = segmentCount(view);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(view, i);
    const box = segBoundingBox(v1, v2);
    const candidates = queryBox(index, box, eps)
      .filter((j) => j > i)
      .sort((a, b) => a - b);

    for (const j of candidates) {
      const [u1, u2] = segmentVertices(view, j);
      const shared: Vec2[] = [];
      if (j === i + 1) {
        shared.push(vertexPos(v2));
      }
      if (view.isClosed && i === 0 && j === count - 1) {
        shared.push(vertexPos(v1));
      }
      const result = intersectSegments(v1, v2, u1, u2, eps);
      collect(out, i, j, result, (point) => shared.some((s) => fuzzyEqPoint(s, point, eps)));
    }
  }
  return out;
}

/**
 * Intersections between the segments of `a` and those of `b`, using an index
 * built over `b`. Results are ordered by `index1`, then `index2`.
 */
export function findIntersects(
  a: PolylineRead,
  b: PolylineRead,
  bIndex: StaticAABB2DIndex,
  eps: number
): PlineIntersectsCollection {
  const out: PlineIntersectsCollection = { basic: [], overlapping: [] };
  const count = segmentCount(a);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(a, i);
    const box = segBoundingBox(v1, v2);
    const candidates = queryBox(bIndex, box, eps).sort((x, y) => x - y);
    for (const j of candidates) {
      const [u1, u2] = segmentVertices(b, j);
      collect(out, i, j, intersectSegments(v1, v2, u1, u2, eps), () => false);
    }
  }
  return out;
}

/**
 * True when any two non-adjacent parts of the polyline cross or overlap
 */
export function hasSelfIntersects(view: PolylineRead, index: StaticAABB2DIndex, eps: number): boolean {
  const found = findSelfIntersects(view, index, eps);
  return found.basic.length > 0 || found.overlapping.length > 0;
}
