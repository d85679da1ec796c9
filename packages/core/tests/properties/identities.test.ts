import { describe, it, expect } from "vitest";
import { createNumericContext } from "../../src/num/tolerance.js";
import { Polyline } from "../../src/pline/Polyline.js";
import { area } from "../../src/pline/query.js";
import { parallelOffset } from "../../src/offset/parallelOffset.js";
import { plineBoolean } from "../../src/boolean/plineBoolean.js";
import type { BooleanOp } from "../../src/boolean/types.js";

const ctx = createNumericContext();

function square(x: number, y: number, size: number): Polyline {
  return Polyline.fromTriples(
    [
      [x, y, 0],
      [x + size, y, 0],
      [x + size, y + size, 0],
      [x, y + size, 0],
    ],
    true
  );
}

function signedArea(a: Polyline, b: Polyline, op: BooleanOp): number {
  const { positive, negative } = plineBoolean(a, b, op, ctx);
  return [...positive, ...negative].reduce((sum, p) => sum + area(p), 0);
}

describe("boolean area identities", () => {
  const a = square(0, 0, 1);

  for (const shift of [0.25, 0.5, 0.75]) {
    describe(`unit squares shifted by ${shift}`, () => {
      const b = square(shift, shift, 1);
      const overlap = (1 - shift) ** 2;

      it("should match the overlap area for intersect", () => {
        expect(signedArea(a, b, "intersect")).toBeCloseTo(overlap, 10);
      });

      it("should satisfy |A ∪ B| = |A| + |B| - |A ∩ B|", () => {
        expect(signedArea(a, b, "union")).toBeCloseTo(2 - overlap, 10);
      });

      it("should satisfy |A - B| = |A| - |A ∩ B|", () => {
        expect(signedArea(a, b, "subtract")).toBeCloseTo(1 - overlap, 10);
      });

      it("should satisfy |A xor B| = |A ∪ B| - |A ∩ B|", () => {
        expect(signedArea(a, b, "xor")).toBeCloseTo(2 - 2 * overlap, 10);
      });
    });
  }
});

describe("offset area identities", () => {
  const circle = Polyline.fromTriples(
    [
      [0, 0, 1],
      [2, 0, 1],
    ],
    true
  );

  for (const distance of [-0.75, -0.25, 0.25, 1, 2]) {
    it(`should give a circle of radius ${1 + distance} for distance ${distance}`, () => {
      const result = parallelOffset(circle, distance, ctx);
      expect(result).toHaveLength(1);
      expect(area(result[0] ?? circle)).toBeCloseTo(Math.PI * (1 + distance) ** 2, 10);
    });
  }

  for (const distance of [0.25, 0.5]) {
    it(`should give a ${4 - 2 * distance} by ${2 - 2 * distance} rectangle for inward distance ${distance}`, () => {
      const rect = Polyline.fromTriples(
        [
          [0, 0, 0],
          [4, 0, 0],
          [4, 2, 0],
          [0, 2, 0],
        ],
        true
      );
      const result = parallelOffset(rect, -distance, ctx);
      expect(result).toHaveLength(1);
      expect(area(result[0] ?? rect)).toBeCloseTo((4 - 2 * distance) * (2 - 2 * distance), 10);
    });
  }
});
