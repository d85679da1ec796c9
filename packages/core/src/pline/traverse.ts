/**
 * Index arithmetic and segment traversal over any read view
 *
 * Closed polylines wrap with `(i + 1) % n`; the last vertex of a closed view
 * starts the closing segment.
 */

import type { PlineSegment, PlineVertex, PolylineRead } from './types.js';
import { segmentFromVertices } from './segment.js';

export function segmentCount(view: PolylineRead): number {
  const n = view.vertexCount;
  if (n < 2) {
    return 0;
  }
  return view.isClosed ? n : n - 1;
}

export function nextWrappingIndex(index: number, vertexCount: number): number {
  return index + 1 === vertexCount ? 0 : index + 1;
}

/**
 * `start` advanced by `offset` positions, wrapping at `vertexCount`
 */
export function fwdWrappingIndex(start: number, offset: number, vertexCount: number): number {
  return (start + offset) % vertexCount;
}

/**
 * Number of forward steps from `start` to `end`, wrapping at `vertexCount`
 */
export function fwdWrappingDist(start: number, end: number, vertexCount: number): number {
  return end >= start ? end - start : vertexCount - start + end;
}

/**
 * The two vertices bounding segment `index`
 */
export function segmentVertices(view: PolylineRead, index: number): [PlineVertex, PlineVertex] {
  const next = nextWrappingIndex(index, view.vertexCount);
  return [view.at(index), view.at(next)];
}

export function segmentAt(view: PolylineRead, index: number): PlineSegment {
  const [v1, v2] = segmentVertices(view, index);
  return segmentFromVertices(v1, v2);
}

/**
 * Lazy sequence of vertex pairs, front to back. Every iteration starts over.
 */
export function segmentPairs(view: PolylineRead): Iterable<[PlineVertex, PlineVertex]> {
  return {
    *[Symbol.iterator]() {
      const count = segmentCount(view);
      for (let i = 0; i < count; i++) {
        yield segmentVertices(view, i);
      }
    },
  };
}

/**
 * Lazy sequence of derived segments, front to back. Every iteration starts over.
 */
export function segments(view: PolylineRead): Iterable<PlineSegment> {
  return {
    *[Symbol.iterator]() {
      for (const [v1, v2] of segmentPairs(view)) {
        yield segmentFromVertices(v1, v2);
      }
    },
  };
}

/**
 * Copy of every vertex of a view
 */
export function collectVertices(view: PolylineRead): PlineVertex[] {
  const out: PlineVertex[] = [];
  for (let i = 0; i < view.vertexCount; i++) {
    out.push(view.at(i));
  }
  return out;
}
