/**
 * Stitching slices back into polylines
 *
 * Slices connect where one ends and another starts (within `joinEps`). When a
 * node offers several continuations the one with the smallest signed turning
 * angle wins, ties going to the lower slice index, so the output never
 * depends on storage or query order.
 */

import type { Vec2 } from '../num/vec2.js';
import { cross2, dot2 } from '../num/vec2.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import { segEndTangent, segStartTangent } from '../pline/segment.js';
import type { Polyline } from '../pline/Polyline.js';
import { PolylineBuilder } from '../pline/PolylineBuilder.js';
import { area, removeRepeatPos } from '../pline/query.js';
import { StaticAABB2DIndexBuilder } from '../spatial/StaticAABB2DIndex.js';

export interface StitchOptions {
  /** Distance within which a slice end joins the next slice's start */
  joinEps: number;
  /** Distance within which consecutive output vertices merge */
  posEqualEps: number;
  /** Emit chains that do not close (open input); otherwise they are dropped */
  includeOpen: boolean;
}

interface SliceEnds {
  start: Vec2;
  end: Vec2;
  startTangent: Vec2;
  endTangent: Vec2;
}

function sliceEnds(slice: PolylineRead): SliceEnds {
  const n = slice.vertexCount;
  const first = slice.at(0);
  const second = slice.at(1);
  const beforeLast = slice.at(n - 2);
  const last = slice.at(n - 1);
  return {
    start: vertexPos(first),
    end: vertexPos(last),
    startTangent: segStartTangent(first, second),
    endTangent: segEndTangent(beforeLast, last),
  };
}

/**
 * Signed angle from direction `a` to direction `b`, in (-π, π]
 */
export function turningAngle(a: Vec2, b: Vec2): number {
  return Math.atan2(cross2(a, b), dot2(a, b));
}

/**
 * Join slices into polylines. Each slice must have at least two vertices.
 */
export function stitchSlices(slices: readonly PolylineRead[], options: StitchOptions): Polyline[] {
  const { joinEps, posEqualEps, includeOpen } = options;
  const count = slices.length;
  if (count === 0) {
    return [];
  }

  const ends = slices.map(sliceEnds);
  const startIndexBuilder = new StaticAABB2DIndexBuilder(count);
  for (const e of ends) {
    startIndexBuilder.add(e.start[0], e.start[1], e.start[0], e.start[1]);
  }
  const startIndex = startIndexBuilder.build();

  const startsNear = (point: Vec2): number[] =>
    startIndex
      .query(point[0] - joinEps, point[1] - joinEps, point[0] + joinEps, point[1] + joinEps)
      .sort((a, b) => a - b);

  // Open output must begin at chain heads, so slices nothing leads into go first.
  let order = Array.from({ length: count }, (_, i) => i);
  if (includeOpen) {
    const hasPredecessor = new Array<boolean>(count).fill(false);
    ends.forEach((e, i) => {
      for (const j of startsNear(e.end)) {
        if (j !== i) {
          hasPredecessor[j] = true;
        }
      }
    });
    order = [...order.filter((i) => !hasPredecessor[i]), ...order.filter((i) => hasPredecessor[i])];
  }

  const used = new Array<boolean>(count).fill(false);
  const results: Polyline[] = [];

  for (const head of order) {
    if (used[head]) {
      continue;
    }
    used[head] = true;
    const chain = [head];
    const headStart = ends[head]?.start;
    let current = head;
    let closed = false;

    while (headStart !== undefined) {
      const currentEnds = ends[current];
      if (currentEnds === undefined) {
        break;
      }
      if (fuzzyEqPoint(currentEnds.end, headStart, joinEps)) {
        closed = true;
        break;
      }
      let best: number | undefined;
      let bestTurn = Infinity;
      for (const candidate of startsNear(currentEnds.end)) {
        const candidateEnds = ends[candidate];
        if (used[candidate] || candidateEnds === undefined) {
          continue;
        }
        if (!fuzzyEqPoint(candidateEnds.start, currentEnds.end, joinEps)) {
          continue;
        }
        const turn = turningAngle(currentEnds.endTangent, candidateEnds.startTangent);
        if (turn < bestTurn - 1e-12) {
          best = candidate;
          bestTurn = turn;
        }
      }
      if (best === undefined) {
        break;
      }
      used[best] = true;
      chain.push(best);
      current = best;
    }

    if (!closed && !includeOpen) {
      continue;
    }
    const stitched = buildChain(
      chain.flatMap((i) => {
        const s = slices[i];
        return s ? [s] : [];
      }),
      closed,
      posEqualEps
    );
    if (stitched !== null && isUsable(stitched, joinEps)) {
      results.push(stitched);
    }
  }

  return results;
}

function buildChain(chain: readonly PolylineRead[], closed: boolean, posEqualEps: number): Polyline | null {
  const builder = new PolylineBuilder(closed);
  for (const slice of chain) {
    for (let k = 0; k < slice.vertexCount - 1; k++) {
      builder.addOrReplace(slice.at(k), posEqualEps);
    }
  }
  const tail = chain[chain.length - 1];
  if (!closed && tail !== undefined) {
    builder.addOrReplace(tail.at(tail.vertexCount - 1), posEqualEps);
  }
  const result = removeRepeatPos(builder, posEqualEps);
  return result.vertexCount < 2 ? null : result;
}

function isUsable(pline: Polyline, joinEps: number): boolean {
  if (!pline.isClosed) {
    return true;
  }
  return Math.abs(area(pline)) > joinEps * joinEps;
}
