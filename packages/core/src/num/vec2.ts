/**
 * 2D points and vectors
 *
 * Stored as `[x, y]` tuples. Every helper returns a fresh tuple; none mutate.
 */

export type Vec2 = [number, number];

export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

export function add2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function mul2(v: Vec2, s: number): Vec2 {
  return [v[0] * s, v[1] * s];
}

export function dot2(a: Vec2, b: Vec2): number {
  return a[0] * b[0] + a[1] * b[1];
}

/**
 * Z component of the 3D cross product; positive when `b` lies counter-clockwise of `a`
 */
export function cross2(a: Vec2, b: Vec2): number {
  return a[0] * b[1] - a[1] * b[0];
}

export function lengthSq2(v: Vec2): number {
  return v[0] * v[0] + v[1] * v[1];
}

export function length2(v: Vec2): number {
  return Math.sqrt(lengthSq2(v));
}

/**
 * Unit vector in the direction of `v`, or `[0, 0]` for the zero vector
 */
export function normalize2(v: Vec2): Vec2 {
  const len = length2(v);
  if (len === 0) {
    return [0, 0];
  }
  return [v[0] / len, v[1] / len];
}

/**
 * `v` rotated by -90° (the right-hand normal of a direction)
 */
export function perpRight2(v: Vec2): Vec2 {
  return [v[1], -v[0]];
}

/**
 * `v` rotated by +90°
 */
export function perpLeft2(v: Vec2): Vec2 {
  return [-v[1], v[0]];
}

export function lerp2(a: Vec2, b: Vec2, t: number): Vec2 {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t];
}

export function distSq2(a: Vec2, b: Vec2): number {
  return lengthSq2(sub2(a, b));
}

export function dist2(a: Vec2, b: Vec2): number {
  return length2(sub2(a, b));
}

/**
 * Direction angle of the vector from `from` to `to`, in (-π, π]
 */
export function angleTo2(from: Vec2, to: Vec2): number {
  return Math.atan2(to[1] - from[1], to[0] - from[0]);
}

/**
 * Point at `radius` from `center` in direction `angle`
 */
export function pointOnCircle2(center: Vec2, radius: number, angle: number): Vec2 {
  return [center[0] + radius * Math.cos(angle), center[1] + radius * Math.sin(angle)];
}
