import { describe, it, expect } from 'vitest';
import { Polyline } from '../pline/Polyline.js';
import { createRawOffsetPline } from './rawOffset.js';

const eps = 1e-5;

const rect = Polyline.fromTriples(
  [
    [0, 0, 0],
    [4, 0, 0],
    [4, 2, 0],
    [0, 2, 0],
  ],
  true
);

const circle = Polyline.fromTriples(
  [
    [0, 0, 1],
    [2, 0, 1],
  ],
  true
);

describe('createRawOffsetPline', () => {
  it('should trim lines meeting at concave corners', () => {
    const raw = createRawOffsetPline(rect, -0.5, eps);
    expect(raw.pline.isClosed).toBe(true);
    expect(raw.pline.toTriples()).toEqual([
      [0.5, 0.5, 0],
      [3.5, 0.5, 0],
      [3.5, 1.5, 0],
      [0.5, 1.5, 0],
    ]);
    expect(raw.collapsed).toEqual([false, false, false, false]);
  });

  it('should fillet convex corners with arcs around the original vertex', () => {
    const raw = createRawOffsetPline(rect, 0.5, eps);
    const quarter = Math.tan(Math.PI / 8);
    const expected = [
      [0, -0.5, 0],
      [4, -0.5, quarter],
      [4.5, 0, 0],
      [4.5, 2, quarter],
      [4, 2.5, 0],
      [0, 2.5, quarter],
      [-0.5, 2, 0],
      [-0.5, 0, quarter],
    ];
    const triples = raw.pline.toTriples();
    expect(triples).toHaveLength(expected.length);
    triples.forEach((triple, i) => {
      const [x, y, bulge] = expected[i] ?? [];
      expect(triple[0]).toBeCloseTo(x ?? NaN, 12);
      expect(triple[1]).toBeCloseTo(y ?? NaN, 12);
      expect(triple[2]).toBeCloseTo(bulge ?? NaN, 12);
    });
  });

  it('should change arc radii by the distance', () => {
    const inner = createRawOffsetPline(circle, -0.5, eps).pline.toTriples();
    expect(inner).toHaveLength(2);
    expect(inner[0]?.[0]).toBeCloseTo(0.5, 12);
    expect(inner[1]?.[0]).toBeCloseTo(1.5, 12);
    expect(inner[0]?.[2]).toBeCloseTo(1, 12);

    const outer = createRawOffsetPline(circle, 0.5, eps).pline.toTriples();
    expect(outer[0]?.[0]).toBeCloseTo(-0.5, 12);
    expect(outer[1]?.[0]).toBeCloseTo(2.5, 12);
  });

  it('should flag arcs that shrink past their center', () => {
    const raw = createRawOffsetPline(circle, -1.2, eps);
    expect(raw.collapsed).toEqual([true, true]);
    expect(raw.pline.at(0).bulge).toBe(0);
  });

  it('should offset an open polyline without closing it', () => {
    const line = Polyline.fromTriples(
      [
        [0, 0, 0],
        [4, 0, 0],
      ],
      false
    );
    const raw = createRawOffsetPline(line, 0.5, eps);
    expect(raw.pline.isClosed).toBe(false);
    expect(raw.pline.toTriples()).toEqual([
      [0, -0.5, 0],
      [4, -0.5, 0],
    ]);
  });
});
