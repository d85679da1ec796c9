/**
 * Offset engine options
 */

import type { NumericContext } from '../num/tolerance.js';

export interface OffsetOptions {
  /** Distance below which two positions are the same vertex (default: ε) */
  posEqualEps?: number;
  /** Distance within which slice ends are joined while stitching (default: 10ε) */
  sliceJoinEps?: number;
  /** Slack allowed when checking that a slice keeps its distance from the input (default: 10ε) */
  offsetDistEps?: number;
  /**
   * Also cut the raw offset where it crosses the offset at the opposite
   * distance, so closed inputs that cross themselves offset correctly
   * (default: false)
   */
  handleSelfIntersects?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Multipliers applied to the context's length tolerance for defaulted options
 */
export const DEFAULT_OFFSET_EPS_FACTORS = {
  posEqual: 1,
  sliceJoin: 10,
  offsetDist: 10,
} as const;

export function resolveOffsetOptions(ctx: NumericContext, options?: OffsetOptions): Required<OffsetOptions> {
  const eps = ctx.tol.length;
  return {
    posEqualEps: options?.posEqualEps ?? eps * DEFAULT_OFFSET_EPS_FACTORS.posEqual,
    sliceJoinEps: options?.sliceJoinEps ?? eps * DEFAULT_OFFSET_EPS_FACTORS.sliceJoin,
    offsetDistEps: options?.offsetDistEps ?? eps * DEFAULT_OFFSET_EPS_FACTORS.offsetDist,
    handleSelfIntersects: options?.handleSelfIntersects ?? false,
    verbose: options?.verbose ?? false,
  };
}
