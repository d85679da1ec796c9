import { describe, it, expect } from "vitest";
import { Polyline } from "../../src/pline/Polyline.js";
import { PolylineBuilder } from "../../src/pline/PolylineBuilder.js";
import { area } from "../../src/pline/query.js";
import { combine, offset, polylineFromTriples, validatePolyline } from "../../src/api/operations.js";
import { booleanOpSchema } from "../../src/api/schema.js";
import { isFailure, isSuccess, unwrapOr, unwrapResult } from "../../src/api/types.js";

const square = (x: number, y: number, size: number): Polyline =>
  Polyline.fromTriples(
    [
      [x, y, 0],
      [x + size, y, 0],
      [x + size, y + size, 0],
      [x, y + size, 0],
    ],
    true
  );

describe("polylineFromTriples", () => {
  it("should build a polyline from valid triples", () => {
    const result = polylineFromTriples(
      [
        [0, 0, 0],
        [1, 0, 0.5],
      ],
      false
    );
    expect(isSuccess(result)).toBe(true);
    expect(unwrapResult(result).toTriples()).toEqual([
      [0, 0, 0],
      [1, 0, 0.5],
    ]);
  });

  it("should reject a single vertex", () => {
    const result = polylineFromTriples([[0, 0, 0]], false);
    expect(result).toEqual({
      ok: false,
      error: {
        category: "invalidInput",
        message: "Invalid input: polyline.vertices: A polyline needs at least 2 vertices",
        operation: "construct",
        issues: [
          {
            kind: "tooFewVertices",
            path: "polyline.vertices",
            message: "polyline.vertices: A polyline needs at least 2 vertices",
          },
        ],
        hints: [{ summary: "A polyline needs at least two vertices", relatedParameters: ["vertices"] }],
      },
    });
  });

  it("should reject non-finite coordinates with the vertex path", () => {
    const result = polylineFromTriples(
      [
        [0, 0, 0],
        [Number.NaN, 1, 0],
      ],
      false
    );
    expect(isFailure(result)).toBe(true);
    if (!result.ok) {
      expect(result.error.issues?.map((i) => [i.kind, i.path])).toEqual([["nonFinite", "polyline.vertices.1.0"]]);
    }
  });

  it("should reject an arc between coincident vertices", () => {
    const result = polylineFromTriples(
      [
        [0, 0, 1],
        [0, 0, 0],
        [1, 1, 0],
      ],
      false
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual([
        {
          kind: "zeroLengthArc",
          path: "polyline.vertices.0",
          message: "polyline.vertices.0: arc with bulge 1 has a zero-length chord",
        },
      ]);
      expect(result.error.hints?.[0]?.summary).toBe("An arc starts and ends at the same point");
    }
  });
});

describe("validatePolyline", () => {
  it("should copy a valid view", () => {
    const builder = new PolylineBuilder(true);
    builder.addVertex(0, 0);
    builder.addVertex(2, 0);
    builder.addVertex(1, 1);
    const result = validatePolyline(builder);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBeInstanceOf(Polyline);
      expect(result.value.vertexCount).toBe(3);
    }
  });

  it("should reject a non-positive tolerance", () => {
    const result = validatePolyline(square(0, 0, 1), 0);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.operation).toBe("validate");
      expect(result.error.message).toBe("Invalid input: tolerance: Tolerance must be positive");
    }
  });
});

describe("offset", () => {
  it("should warn when nothing remains of the polyline", () => {
    const result = offset(square(0, 0, 2), -1.5);
    expect(result).toEqual({ ok: true, value: [], warnings: ["polyline: nothing remains at distance -1.5"] });
  });

  it("should offset with the default tolerance", () => {
    const result = offset(square(0, 0, 2), -0.5);
    expect(unwrapResult(result).map((p) => p.toTriples())).toEqual([
      [
        [0.5, 0.5, 0],
        [1.5, 0.5, 0],
        [1.5, 1.5, 0],
        [0.5, 1.5, 0],
      ],
    ]);
  });

  it("should accept the tolerance as a number or in options", () => {
    const byNumber = offset(square(0, 0, 2), -0.5, 1e-6);
    const byOptions = offset(square(0, 0, 2), -0.5, { tolerance: 1e-6 });
    expect(unwrapResult(byNumber).map((p) => p.toTriples())).toEqual(
      unwrapResult(byOptions).map((p) => p.toTriples())
    );
  });

  it("should reject a non-finite distance", () => {
    const result = offset(square(0, 0, 1), Number.POSITIVE_INFINITY);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues?.map((i) => i.path)).toEqual(["distance"]);
    }
  });

  it("should reject a non-positive tolerance", () => {
    const result = offset(square(0, 0, 1), 0.5, -1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid input: options.tolerance: Tolerance must be positive");
    }
  });

  it("should report the polyline that failed validation", () => {
    const builder = new PolylineBuilder(false);
    builder.addVertex(0, 0);
    const result = offset(builder, 1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.operation).toBe("offset");
      expect(result.error.issues?.[0]?.kind).toBe("tooFewVertices");
    }
  });
});

describe("combine", () => {
  const a = square(0, 0, 1);
  const b = square(0.5, 0.5, 1);

  it("should list material loops before holes", () => {
    const loops = unwrapResult(combine(a, b, "xor"));
    expect(loops.map((p) => area(p))).toEqual([1.75, -0.25]);
  });

  it("should reject an open operand", () => {
    const open = Polyline.fromTriples(
      [
        [0, 0, 0],
        [1, 0, 0],
        [1, 1, 0],
      ],
      false
    );
    const result = combine(open, b, "union");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid input: a: polyline must be closed");
      expect(result.error.issues).toEqual([
        { kind: "notClosed", path: "a.isClosed", message: "a: polyline must be closed" },
      ]);
    }
  });

  it("should reject a self-intersecting operand", () => {
    const bowTie = Polyline.fromTriples(
      [
        [0, 0, 0],
        [2, 2, 0],
        [2, 0, 0],
        [0, 2, 0],
      ],
      true
    );
    const result = combine(a, bowTie, "intersect");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues?.map((i) => [i.kind, i.path])).toEqual([["selfIntersecting", "b"]]);
      expect(result.error.hints?.map((h) => h.summary)).toEqual(["An input crosses or overlaps itself"]);
    }
  });

  it("should count further issues in the message", () => {
    const open = Polyline.fromTriples(
      [
        [0, 0, 0],
        [1, 0, 0],
      ],
      false
    );
    const result = combine(open, open, "union");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid input: a: polyline must be closed (and 1 more)");
    }
  });

  it("should accept operands with repeated vertices and report them", () => {
    const closedTwice = Polyline.fromTriples(
      [
        [0, 0, 0],
        [2, 0, 0],
        [2, 2, 0],
        [0, 2, 0],
        [0, 0, 0],
      ],
      true
    );
    const doubled = Polyline.fromTriples(
      [
        [0, 0, 0],
        [2, 0, 0],
        [2, 0, 0],
        [2, 2, 0],
        [0, 2, 0],
      ],
      true
    );
    for (const operand of [closedTwice, doubled]) {
      const result = combine(operand, square(1, 1, 2), "union");
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(1);
        expect(area(result.value[0] ?? operand)).toBeCloseTo(7, 12);
        expect(result.warnings).toEqual(["a: 1 repeated vertex ignored"]);
      }
    }
  });

  it("should not warn for clean operands", () => {
    const result = combine(a, b, "union");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.warnings).toBeUndefined();
    }
  });

  it("should fall back to a default on failure", () => {
    expect(unwrapOr(combine(a, b, "union", 0), [])).toEqual([]);
  });
});

describe("unwrapResult", () => {
  it("should throw with the operation and message", () => {
    expect(() => unwrapResult(polylineFromTriples([], true))).toThrow(
      "Operation construct failed: Invalid input: polyline.vertices: A polyline needs at least 2 vertices"
    );
  });
});

describe("booleanOpSchema", () => {
  it("should accept the four operations only", () => {
    expect(booleanOpSchema.options).toEqual(["union", "intersect", "subtract", "xor"]);
    expect(booleanOpSchema.safeParse("merge").success).toBe(false);
  });
});
