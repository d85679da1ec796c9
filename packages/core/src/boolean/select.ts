/**
 * Selection rules for polyline booleans
 *
 * Operands are counter-clockwise when slices reach this point, so keeping a
 * slice as is contributes material on its left and reversing it carves a
 * hole.
 *
 * - UNION: A outside, B outside, coincidentSame from A
 * - INTERSECT: A inside, B inside, coincidentSame from A
 * - SUBTRACT: A outside, B inside reversed, coincidentOpposite from A
 * - XOR: A and B outside, A and B inside reversed, coincidentOpposite from both
 */

import type { PlineView } from '../pline/PlineView.js';
import type { BooleanOp, SliceClassification } from './types.js';

export interface ClassifiedSlice {
  slice: PlineView;
  classification: SliceClassification;
}

type Rule = 'keep' | 'reverse' | 'drop';

type RuleTable = Record<SliceClassification, Rule>;

const RULES: Record<BooleanOp, { a: RuleTable; b: RuleTable }> = {
  union: {
    a: { outside: 'keep', inside: 'drop', coincidentSame: 'keep', coincidentOpposite: 'drop' },
    b: { outside: 'keep', inside: 'drop', coincidentSame: 'drop', coincidentOpposite: 'drop' },
  },
  intersect: {
    a: { outside: 'drop', inside: 'keep', coincidentSame: 'keep', coincidentOpposite: 'drop' },
    b: { outside: 'drop', inside: 'keep', coincidentSame: 'drop', coincidentOpposite: 'drop' },
  },
  subtract: {
    a: { outside: 'keep', inside: 'drop', coincidentSame: 'drop', coincidentOpposite: 'keep' },
    b: { outside: 'drop', inside: 'reverse', coincidentSame: 'drop', coincidentOpposite: 'drop' },
  },
  xor: {
    a: { outside: 'keep', inside: 'reverse', coincidentSame: 'drop', coincidentOpposite: 'keep' },
    b: { outside: 'keep', inside: 'reverse', coincidentSame: 'drop', coincidentOpposite: 'keep' },
  },
};

function apply(slices: readonly ClassifiedSlice[], table: RuleTable): PlineView[] {
  const out: PlineView[] = [];
  for (const { slice, classification } of slices) {
    const rule = table[classification];
    if (rule === 'keep') {
      out.push(slice);
    } else if (rule === 'reverse') {
      out.push(slice.inverted());
    }
  }
  return out;
}

/**
 * Slices that make up the result of `op`, A's first
 */
export function selectSlices(
  slicesA: readonly ClassifiedSlice[],
  slicesB: readonly ClassifiedSlice[],
  op: BooleanOp
): PlineView[] {
  const rules = RULES[op];
  return [...apply(slicesA, rules.a), ...apply(slicesB, rules.b)];
}
