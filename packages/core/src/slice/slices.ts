/**
 * Cutting a polyline into slices at split points
 *
 * Both engines find the points where a polyline must be cut (self crossings
 * for offsets, crossings with the other operand for booleans), then describe
 * each piece between consecutive cuts as a PlineView over the unmodified
 * source.
 */

import type { Vec2 } from '../num/vec2.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import { segParamOfPoint, segSplitAtPoint } from '../pline/segment.js';
import {
  fwdWrappingDist,
  fwdWrappingIndex,
  nextWrappingIndex,
  segmentCount,
  segmentVertices,
} from '../pline/traverse.js';
import type { PlineViewData } from '../pline/PlineView.js';
import { PlineView } from '../pline/PlineView.js';

export interface SplitPoint {
  segIndex: number;
  point: Vec2;
}

interface OrderedSplit extends SplitPoint {
  /** Normalized position along the segment, 0 at its start vertex */
  param: number;
}

function samePlace(a: OrderedSplit, b: OrderedSplit, eps: number): boolean {
  return a.segIndex === b.segIndex && fuzzyEqPoint(a.point, b.point, eps);
}

/**
 * Normalize, sort and de-duplicate split points. A point on a segment's end
 * vertex is moved to the start of the following segment, and points within
 * `eps` of a vertex take the vertex's exact position.
 */
export function orderSplitPoints(view: PolylineRead, points: readonly SplitPoint[], eps: number): OrderedSplit[] {
  const count = segmentCount(view);
  const ordered: OrderedSplit[] = [];
  for (const { segIndex, point } of points) {
    const [v1, v2] = segmentVertices(view, segIndex);
    const start = vertexPos(v1);
    const end = vertexPos(v2);
    if (fuzzyEqPoint(point, end, eps)) {
      if (view.isClosed || segIndex < count - 1) {
        ordered.push({ segIndex: nextWrappingIndex(segIndex, view.vertexCount), point: end, param: 0 });
      } else {
        ordered.push({ segIndex, point: end, param: 1 });
      }
    } else if (fuzzyEqPoint(point, start, eps)) {
      ordered.push({ segIndex, point: start, param: 0 });
    } else {
      const param = Math.min(1, Math.max(0, segParamOfPoint(v1, v2, point)));
      ordered.push({ segIndex, point, param });
    }
  }

  ordered.sort((a, b) => a.segIndex - b.segIndex || a.param - b.param);

  // A crossing reached from two places along the path stays as two entries.
  const unique: OrderedSplit[] = [];
  for (const split of ordered) {
    const last = unique[unique.length - 1];
    if (last === undefined || !samePlace(last, split, eps)) {
      unique.push(split);
    }
  }
  return unique;
}

/**
 * View data for the stretch of `view` from `from` to `to`. `fullLoop` marks
 * a closed polyline cut at a single point, whose one slice runs all the way
 * round.
 */
function sliceData(
  view: PolylineRead,
  from: OrderedSplit,
  to: OrderedSplit,
  fullLoop: boolean,
  eps: number
): PlineViewData {
  const n = view.vertexCount;
  let offset = view.isClosed ? fwdWrappingDist(from.segIndex, to.segIndex, n) : to.segIndex - from.segIndex;
  if (view.isClosed && offset === 0 && (fullLoop || to.param <= from.param)) {
    offset = n;
  }

  const [fv1, fv2] = segmentVertices(view, from.segIndex);
  const updatedStart = segSplitAtPoint(fv1, fv2, from.point, eps).splitVertex;

  if (offset === 0) {
    const sub = segSplitAtPoint(updatedStart, fv2, to.point, eps).updatedStart;
    return {
      startIndex: from.segIndex,
      endIndexOffset: 0,
      updatedStart: sub,
      updatedEndBulge: sub.bulge,
      endPoint: to.point,
      invertedDirection: false,
    };
  }

  let updatedEndBulge: number;
  if (to.param === 0) {
    // Ends exactly on a vertex: the slice's last segment is the whole one before it.
    offset -= 1;
    updatedEndBulge =
      offset === 0 ? updatedStart.bulge : view.at(fwdWrappingIndex(from.segIndex, offset, n)).bulge;
  } else {
    const [tv1, tv2] = segmentVertices(view, to.segIndex);
    updatedEndBulge = segSplitAtPoint(tv1, tv2, to.point, eps).updatedStart.bulge;
  }

  return {
    startIndex: from.segIndex,
    endIndexOffset: offset,
    updatedStart,
    updatedEndBulge,
    endPoint: to.point,
    invertedDirection: false,
  };
}

/**
 * Cut `view` at the given points. A closed polyline with no split points
 * yields no slices; an open one yields a single slice covering it.
 */
export function sliceAtPoints(view: PolylineRead, points: readonly SplitPoint[], eps: number): PlineView[] {
  const count = segmentCount(view);
  if (count === 0) {
    return [];
  }
  const ordered = orderSplitPoints(view, points, eps);

  if (view.isClosed) {
    const m = ordered.length;
    const slices: PlineView[] = [];
    for (let k = 0; k < m; k++) {
      const from = ordered[k];
      const to = ordered[(k + 1) % m];
      if (from && to) {
        slices.push(new PlineView(view, sliceData(view, from, to, m === 1, eps)));
      }
    }
    return slices;
  }

  const first: OrderedSplit = { segIndex: 0, point: vertexPos(view.at(0)), param: 0 };
  const last: OrderedSplit = {
    segIndex: count - 1,
    point: vertexPos(view.at(view.vertexCount - 1)),
    param: 1,
  };
  const bounds: OrderedSplit[] = [first];
  for (const split of [...ordered, last]) {
    const prev = bounds[bounds.length - 1];
    if (prev === undefined || !samePlace(prev, split, eps)) {
      bounds.push(split);
    } else if (split === last) {
      bounds[bounds.length - 1] = last;
    }
  }

  const slices: PlineView[] = [];
  for (let k = 0; k + 1 < bounds.length; k++) {
    const from = bounds[k];
    const to = bounds[k + 1];
    if (from && to) {
      slices.push(new PlineView(view, sliceData(view, from, to, false, eps)));
    }
  }
  return slices;
}
