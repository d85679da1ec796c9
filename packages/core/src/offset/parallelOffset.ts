/**
 * Parallel offset
 *
 * Pipeline: raw offset → self-intersection split points → slices → validity
 * pruning against the input → stitching. Positive distances offset to the
 * right of the direction of travel, which is outward for counter-clockwise
 * loops.
 */

import type { Vec2 } from '../num/vec2.js';
import { dist2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import {
  pointWithinArcSweep,
  segBoundingBox,
  segClosestPoint,
  segMidpoint,
  segmentFromVertices,
} from '../pline/segment.js';
import { fwdWrappingIndex, segmentCount, segmentPairs, segmentVertices } from '../pline/traverse.js';
import type { Polyline } from '../pline/Polyline.js';
import { PlineView } from '../pline/PlineView.js';
import { removeRepeatPos } from '../pline/query.js';
import { createPlineIndex, queryBox } from '../spatial/plineIndex.js';
import type { StaticAABB2DIndex } from '../spatial/StaticAABB2DIndex.js';
import { intersectLineCircle, intersectCircleCircle } from '../geom/intersect2d.js';
import { intersectSegments } from '../geom/segIntersect.js';
import { findIntersects, findSelfIntersects } from '../geom/plineIntersects.js';
import type { SplitPoint } from '../slice/slices.js';
import { sliceAtPoints } from '../slice/slices.js';
import { stitchSlices } from '../slice/stitch.js';
import type { RawOffsetPline } from './rawOffset.js';
import { createRawOffsetPline } from './rawOffset.js';
import type { OffsetOptions } from './types.js';
import { resolveOffsetOptions } from './types.js';

/**
 * Points where the segment `index` of `pline` meets the circle, within its
 * bounds
 */
function segCircleIntersects(pline: PolylineRead, index: number, center: Vec2, radius: number, eps: number): Vec2[] {
  const [v1, v2] = segmentVertices(pline, index);
  const seg = segmentFromVertices(v1, v2);
  if (seg.kind === 'line') {
    const res = intersectLineCircle(seg.start, seg.end, center, radius, eps);
    const len = dist2(seg.start, seg.end);
    const tTol = len > 0 ? eps / len : 0;
    const inside = (t: number): boolean => t >= -tTol && t <= 1 + tTol;
    if (res.kind === 'tangent') {
      return inside(res.t) ? [res.point] : [];
    }
    if (res.kind === 'two') {
      return [
        ...(inside(res.t0) ? [res.point0] : []),
        ...(inside(res.t1) ? [res.point1] : []),
      ];
    }
    return [];
  }
  const res = intersectCircleCircle(seg.center, seg.radius, center, radius, eps);
  if (res.kind === 'tangent') {
    return pointWithinArcSweep(seg, res.point, eps) ? [res.point] : [];
  }
  if (res.kind === 'two') {
    return [res.point0, res.point1].filter((p) => pointWithinArcSweep(seg, p, eps));
  }
  return [];
}

function collectSplitPoints(
  input: PolylineRead,
  raw: RawOffsetPline,
  rawIndex: StaticAABB2DIndex,
  distance: number,
  eps: number,
  handleSelfIntersects: boolean
): SplitPoint[] {
  const splits: SplitPoint[] = [];
  const selfIntersects = findSelfIntersects(raw.pline, rawIndex, eps);
  for (const { index1, index2, point } of selfIntersects.basic) {
    splits.push({ segIndex: index1, point }, { segIndex: index2, point });
  }
  for (const { index1, index2, point1, point2 } of selfIntersects.overlapping) {
    splits.push(
      { segIndex: index1, point: point1 },
      { segIndex: index1, point: point2 },
      { segIndex: index2, point: point1 },
      { segIndex: index2, point: point2 }
    );
  }

  if (handleSelfIntersects && input.isClosed) {
    const dual = createRawOffsetPline(input, -distance, eps).pline;
    const crossings = findIntersects(raw.pline, dual, createPlineIndex(dual, eps), eps);
    for (const { index1, point } of crossings.basic) {
      splits.push({ segIndex: index1, point });
    }
    for (const { index1, point1, point2 } of crossings.overlapping) {
      splits.push({ segIndex: index1, point: point1 }, { segIndex: index1, point: point2 });
    }
  }

  // Open input: the offset must also stop where it comes round the input's ends.
  if (!input.isClosed) {
    const radius = Math.abs(distance);
    const ends = [vertexPos(input.at(0)), vertexPos(input.at(input.vertexCount - 1))];
    const count = segmentCount(raw.pline);
    for (const end of ends) {
      const candidates = rawIndex
        .query(end[0] - radius - eps, end[1] - radius - eps, end[0] + radius + eps, end[1] + radius + eps)
        .sort((a, b) => a - b);
      for (const j of candidates) {
        if (j >= count) {
          continue;
        }
        for (const point of segCircleIntersects(raw.pline, j, end, radius, eps)) {
          splits.push({ segIndex: j, point });
        }
      }
    }
  }
  return splits;
}

interface ValidationContext {
  input: PolylineRead;
  inputIndex: StaticAABB2DIndex;
  /** Minimum allowed distance to the input */
  minDistance: number;
  eps: number;
}

/**
 * Raw segment indices covered by a slice
 */
function coveredRawSegs(slice: PlineView, rawVertexCount: number): number[] {
  const { startIndex, endIndexOffset } = slice.data;
  const covered: number[] = [];
  for (let k = 0; k <= endIndexOffset; k++) {
    covered.push(fwdWrappingIndex(startIndex, k, rawVertexCount));
  }
  return covered;
}

function distanceToInput(point: Vec2, ctx: ValidationContext): number {
  const reach = ctx.minDistance + ctx.eps;
  let best = Infinity;
  ctx.inputIndex.visitQuery(point[0] - reach, point[1] - reach, point[0] + reach, point[1] + reach, (i) => {
    const [v1, v2] = segmentVertices(ctx.input, i);
    best = Math.min(best, dist2(segClosestPoint(v1, v2, point), point));
  });
  return best;
}

/**
 * A part of the raw offset is kept only if every segment stays at least the
 * offset distance (less tolerance) from the input and none touches it.
 */
function isValidPart(part: PolylineRead, ctx: ValidationContext): boolean {
  for (const [v1, v2] of segmentPairs(part)) {
    if (distanceToInput(segMidpoint(v1, v2), ctx) < ctx.minDistance) {
      return false;
    }
    const box = segBoundingBox(v1, v2);
    const candidates = queryBox(ctx.inputIndex, box, ctx.eps);
    for (const i of candidates) {
      const [u1, u2] = segmentVertices(ctx.input, i);
      if (intersectSegments(v1, v2, u1, u2, ctx.eps).kind !== 'none') {
        return false;
      }
    }
  }
  return true;
}

/**
 * Offset `view` by `distance`. Returns the resulting polylines in a
 * deterministic order; empty when the offset collapses completely.
 */
export function parallelOffset(
  view: PolylineRead,
  distance: number,
  ctx: NumericContext,
  options?: OffsetOptions
): Polyline[] {
  const opts = resolveOffsetOptions(ctx, options);
  const eps = opts.posEqualEps;
  const input = removeRepeatPos(view, eps);
  if (segmentCount(input) === 0) {
    return [];
  }
  if (Math.abs(distance) <= eps) {
    return [input];
  }

  const raw = createRawOffsetPline(input, distance, eps);
  if (segmentCount(raw.pline) === 0) {
    if (opts.verbose) {
      console.log('[offset] raw offset collapsed to nothing');
    }
    return [];
  }

  const rawIndex = createPlineIndex(raw.pline, eps);
  const validation: ValidationContext = {
    input,
    inputIndex: createPlineIndex(input, eps),
    minDistance: Math.abs(distance) - opts.offsetDistEps,
    eps,
  };

  const splits = collectSplitPoints(input, raw, rawIndex, distance, eps, opts.handleSelfIntersects);
  if (opts.verbose) {
    console.log(
      `[offset] raw offset: ${raw.pline.vertexCount} vertices, ${splits.length} split points`
    );
  }

  if (splits.length === 0) {
    const anyCollapsed = raw.collapsed.some((c) => c);
    return !anyCollapsed && isValidPart(raw.pline, validation) ? [raw.pline] : [];
  }

  const slices = sliceAtPoints(raw.pline, splits, eps);
  const valid = slices.filter(
    (slice) =>
      !coveredRawSegs(slice, raw.pline.vertexCount).some((i) => raw.collapsed[i] === true) &&
      isValidPart(slice, validation)
  );
  if (opts.verbose) {
    console.log(`[offset] ${slices.length} slices, ${valid.length} valid`);
  }

  return stitchSlices(valid, {
    joinEps: opts.sliceJoinEps,
    posEqualEps: eps,
    includeOpen: !input.isClosed,
  });
}
