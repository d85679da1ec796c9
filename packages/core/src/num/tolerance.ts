/**
 * Tolerance model and numeric context
 *
 * Every near-equality decision in the kernel goes through a `NumericContext`
 * instead of raw comparisons. The length tolerance is the ε that decides
 * whether two points coincide and whether a near-tangent touch counts as a
 * crossing.
 */

import type { Vec2 } from './vec2.js';

export interface Tolerances {
  /** Absolute distance below which two positions are the same point */
  length: number;
  /** Angle tolerance in radians */
  angle: number;
}

export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default tolerances, tuned for outlines measured in millimetres
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-5,
  angle: 1e-8,
};

export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
      angle: tol?.angle ?? DEFAULT_TOLERANCES.angle,
    },
  };
}

/**
 * Context identical to `ctx` but with a different length tolerance
 */
export function withLengthTolerance(ctx: NumericContext, length: number): NumericContext {
  return { tol: { ...ctx.tol, length } };
}

/**
 * Component-wise point equality within `eps`
 */
export function fuzzyEqPoint(a: Vec2, b: Vec2, eps: number): boolean {
  return Math.abs(a[0] - b[0]) <= eps && Math.abs(a[1] - b[1]) <= eps;
}

/**
 * True if `value` lies in `[min, max]` widened by `eps` on both sides
 */
export function inRange(value: number, min: number, max: number, eps: number): boolean {
  return value >= min - eps && value <= max + eps;
}
