/**
 * Angle and bulge conversions
 */

export const TAU = 2 * Math.PI;

/**
 * Wrap an angle into [0, 2π)
 */
export function normalizeRadians(angle: number): number {
  const wrapped = angle % TAU;
  if (wrapped < 0) {
    return wrapped + TAU;
  }
  return wrapped;
}

/**
 * Shortest signed rotation from `a1` to `a2`, in (-π, π]
 */
export function deltaAngle(a1: number, a2: number): number {
  const diff = normalizeRadians(a2 - a1);
  return diff > Math.PI ? diff - TAU : diff;
}

/**
 * Rotation from `a1` to `a2` travelling counter-clockwise (result in [0, 2π))
 * or, when `negative` is set, clockwise (result in (-2π, 0]).
 */
export function deltaAngleSigned(a1: number, a2: number, negative: boolean): number {
  const diff = normalizeRadians(a2 - a1);
  if (!negative || diff === 0) {
    return diff;
  }
  return diff - TAU;
}

/**
 * Signed included angle of an arc segment
 */
export function bulgeToSweep(bulge: number): number {
  return 4 * Math.atan(bulge);
}

export function sweepToBulge(sweep: number): number {
  return Math.tan(sweep / 4);
}
