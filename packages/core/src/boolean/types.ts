/**
 * Types for polyline boolean operations
 */

import type { NumericContext } from '../num/tolerance.js';
import type { Polyline } from '../pline/Polyline.js';

export type BooleanOp = 'union' | 'intersect' | 'subtract' | 'xor';

/**
 * Where a slice of one operand lies relative to the other operand
 */
export type SliceClassification = 'inside' | 'outside' | 'coincidentSame' | 'coincidentOpposite';

export interface BooleanOptions {
  /** Distance below which two positions are the same vertex (default: ε) */
  posEqualEps?: number;
  /** Distance within which slice ends are joined while stitching (default: 10ε) */
  sliceJoinEps?: number;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Multipliers applied to the context's length tolerance for defaulted options
 */
export const DEFAULT_BOOLEAN_EPS_FACTORS = {
  posEqual: 1,
  sliceJoin: 10,
} as const;

export function resolveBooleanOptions(ctx: NumericContext, options?: BooleanOptions): Required<BooleanOptions> {
  const eps = ctx.tol.length;
  return {
    posEqualEps: options?.posEqualEps ?? eps * DEFAULT_BOOLEAN_EPS_FACTORS.posEqual,
    sliceJoinEps: options?.sliceJoinEps ?? eps * DEFAULT_BOOLEAN_EPS_FACTORS.sliceJoin,
    verbose: options?.verbose ?? false,
  };
}

/**
 * Result loops. Positive loops run the same way as the first operand; negative
 * loops are holes and run the opposite way.
 */
export interface BooleanResult {
  positive: Polyline[];
  negative: Polyline[];
}

/**
 * How two operands without crossings relate
 */
export type Containment = 'disjoint' | 'aInsideB' | 'bInsideA';
