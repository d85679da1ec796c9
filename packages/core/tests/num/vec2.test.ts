import { describe, it, expect } from "vitest";
import {
  vec2,
  add2,
  sub2,
  mul2,
  dot2,
  cross2,
  lengthSq2,
  length2,
  normalize2,
  perpRight2,
  perpLeft2,
  lerp2,
  distSq2,
  dist2,
  angleTo2,
  pointOnCircle2,
} from "../../src/num/vec2.js";

describe(`vec2`, () => {
  describe(`basic operations`, () => {
    it(`should create vectors`, () => {
      const v = vec2(3, 4);
      expect(v[0]).toBe(3);
      expect(v[1]).toBe(4);
    });

    it(`should add and subtract vectors`, () => {
      expect(add2(vec2(1, 2), vec2(3, 4))).toEqual([4, 6]);
      expect(sub2(vec2(5, 7), vec2(3, 4))).toEqual([2, 3]);
    });

    it(`should scale vectors`, () => {
      expect(mul2(vec2(1.5, -2), 2)).toEqual([3, -4]);
    });

    it(`should compute dot and cross products`, () => {
      expect(dot2(vec2(1, 2), vec2(3, 4))).toBe(11);
      expect(cross2(vec2(1, 0), vec2(0, 1))).toBe(1);
      expect(cross2(vec2(0, 1), vec2(1, 0))).toBe(-1);
    });
  });

  describe(`lengths and distances`, () => {
    it(`should compute length`, () => {
      expect(lengthSq2(vec2(3, 4))).toBe(25);
      expect(length2(vec2(3, 4))).toBe(5);
    });

    it(`should normalize to unit length`, () => {
      expect(normalize2(vec2(3, 4))).toEqual([0.6, 0.8]);
    });

    it(`should return the zero vector when normalizing zero`, () => {
      expect(normalize2(vec2(0, 0))).toEqual([0, 0]);
    });

    it(`should compute distances`, () => {
      expect(distSq2(vec2(1, 1), vec2(4, 5))).toBe(25);
      expect(dist2(vec2(1, 1), vec2(4, 5))).toBe(5);
    });
  });

  describe(`perpendiculars`, () => {
    it(`should rotate right and left by a quarter turn`, () => {
      expect(perpRight2(vec2(2, 3))).toEqual([3, -2]);
      expect(perpLeft2(vec2(2, 3))).toEqual([-3, 2]);
    });
  });

  describe(`interpolation`, () => {
    it(`should interpolate linearly`, () => {
      expect(lerp2(vec2(0, 0), vec2(4, 8), 0.25)).toEqual([1, 2]);
    });
  });

  describe(`angles`, () => {
    it(`should measure the direction angle between points`, () => {
      expect(angleTo2(vec2(1, 1), vec2(1, 3))).toBeCloseTo(Math.PI / 2, 12);
      expect(angleTo2(vec2(1, 1), vec2(-1, 1))).toBeCloseTo(Math.PI, 12);
    });

    it(`should place points on a circle`, () => {
      const p = pointOnCircle2(vec2(1, 2), 2, Math.PI / 2);
      expect(p[0]).toBeCloseTo(1, 12);
      expect(p[1]).toBeCloseTo(4, 12);
    });
  });
});
