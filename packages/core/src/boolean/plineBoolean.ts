/**
 * Polyline boolean operations
 *
 * This module orchestrates the pipeline for two closed, non-self-intersecting
 * operands:
 * 1. Intersect - collect crossings and overlap ends between the operands
 * 2. Slice - cut both operands at those points
 * 3. Classify - inside / outside / coincident for each slice
 * 4. Select - keep, reverse or drop each slice according to the operation
 * 5. Stitch - join the kept slices into closed loops
 *
 * Operands without crossings are settled by a containment test instead.
 */

import type { NumericContext } from '../num/tolerance.js';
import type { PolylineRead } from '../pline/types.js';
import type { Polyline } from '../pline/Polyline.js';
import { area, invertedDirection, removeRedundant, removeRepeatPos } from '../pline/query.js';
import { createPlineIndex } from '../spatial/plineIndex.js';
import { findIntersects } from '../geom/plineIntersects.js';
import type { SplitPoint } from '../slice/slices.js';
import { sliceAtPoints } from '../slice/slices.js';
import { stitchSlices } from '../slice/stitch.js';
import type { IndexedPline } from './classify.js';
import { classifyContainment, classifySlice } from './classify.js';
import type { ClassifiedSlice } from './select.js';
import { selectSlices } from './select.js';
import type { BooleanOp, BooleanOptions, BooleanResult, Containment } from './types.js';
import { resolveBooleanOptions } from './types.js';

function toCounterClockwise(pline: Polyline): Polyline {
  return area(pline) < 0 ? invertedDirection(pline) : pline;
}

function indexed(pline: Polyline, eps: number): IndexedPline & { pline: Polyline } {
  return { pline, index: createPlineIndex(pline, eps) };
}

type Piece = 'a' | 'b' | 'aReversed' | 'bReversed';

const CONTAINMENT_RESULTS: Record<Containment, Record<BooleanOp, readonly Piece[]>> = {
  disjoint: { union: ['a', 'b'], intersect: [], subtract: ['a'], xor: ['a', 'b'] },
  aInsideB: { union: ['b'], intersect: ['a'], subtract: [], xor: ['b', 'aReversed'] },
  bInsideA: { union: ['a'], intersect: ['b'], subtract: ['a', 'bReversed'], xor: ['a', 'bReversed'] },
};

/**
 * Result loops for operands that do not cross, both counter-clockwise
 */
export function containmentResult(a: Polyline, b: Polyline, containment: Containment, op: BooleanOp): Polyline[] {
  return CONTAINMENT_RESULTS[containment][op].map((piece) => {
    switch (piece) {
      case 'a':
        return a;
      case 'b':
        return b;
      case 'aReversed':
        return invertedDirection(a);
      case 'bReversed':
        return invertedDirection(b);
    }
  });
}

function collectSplitPoints(a: IndexedPline, b: IndexedPline, eps: number): { a: SplitPoint[]; b: SplitPoint[] } {
  const found = findIntersects(a.pline, b.pline, b.index, eps);
  const splitsA: SplitPoint[] = [];
  const splitsB: SplitPoint[] = [];
  for (const { index1, index2, point } of found.basic) {
    splitsA.push({ segIndex: index1, point });
    splitsB.push({ segIndex: index2, point });
  }
  for (const { index1, index2, point1, point2 } of found.overlapping) {
    splitsA.push({ segIndex: index1, point: point1 }, { segIndex: index1, point: point2 });
    splitsB.push({ segIndex: index2, point: point1 }, { segIndex: index2, point: point2 });
  }
  return { a: splitsA, b: splitsB };
}

function classifyAll(source: IndexedPline, splits: SplitPoint[], other: IndexedPline, eps: number): ClassifiedSlice[] {
  return sliceAtPoints(source.pline, splits, eps).map((slice) => ({
    slice,
    classification: classifySlice(slice, other, eps),
  }));
}

/**
 * Sort counter-clockwise-frame loops into material and holes, turning them
 * back to the first operand's orientation when it was clockwise.
 */
function splitByOrientation(loops: Polyline[], flip: boolean): BooleanResult {
  const result: BooleanResult = { positive: [], negative: [] };
  for (const loop of loops) {
    const out = flip ? invertedDirection(loop) : loop;
    if (area(loop) > 0) {
      result.positive.push(out);
    } else {
      result.negative.push(out);
    }
  }
  return result;
}

/**
 * Combine two closed polylines. Both must be valid and free of
 * self-intersections; the operation API checks this before calling.
 */
export function plineBoolean(
  a: PolylineRead,
  b: PolylineRead,
  op: BooleanOp,
  ctx: NumericContext,
  options?: BooleanOptions
): BooleanResult {
  const opts = resolveBooleanOptions(ctx, options);
  const eps = opts.posEqualEps;

  const cleanA = removeRepeatPos(a, eps);
  const flip = area(cleanA) < 0;
  const opA = indexed(toCounterClockwise(cleanA), eps);
  const opB = indexed(toCounterClockwise(removeRepeatPos(b, eps)), eps);

  const splits = collectSplitPoints(opA, opB, eps);
  if (opts.verbose) {
    console.log(`[boolean] ${op}: ${splits.a.length} split points on A, ${splits.b.length} on B`);
  }

  if (splits.a.length === 0) {
    const containment = classifyContainment(opA, opB, eps);
    if (opts.verbose) {
      console.log(`[boolean] no crossings, containment: ${containment}`);
    }
    return splitByOrientation(containmentResult(opA.pline, opB.pline, containment, op), flip);
  }

  const slicesA = classifyAll(opA, splits.a, opB, eps);
  const slicesB = classifyAll(opB, splits.b, opA, eps);
  const selected = selectSlices(slicesA, slicesB, op);
  if (opts.verbose) {
    console.log(
      `[boolean] ${slicesA.length + slicesB.length} slices, ${selected.length} selected`
    );
  }

  const loops = stitchSlices(selected, {
    joinEps: opts.sliceJoinEps,
    posEqualEps: eps,
    includeOpen: false,
  }).map((loop) => removeRedundant(loop, eps));
  return splitByOrientation(loops, flip);
}
