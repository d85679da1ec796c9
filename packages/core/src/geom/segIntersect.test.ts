import { describe, it, expect } from 'vitest';
import { plineVertex } from '../pline/types.js';
import { intersectSegments, intersectPoints } from './segIntersect.js';

const eps = 1e-5;
const v = plineVertex;

// Lower half of the unit circle around (1, 0), travelling (0, 0) → (2, 0)
const lowerArc = [v(0, 0, 1), v(2, 0)] as const;

describe('intersectSegments', () => {
  describe('line / line', () => {
    it('should find a transversal crossing', () => {
      expect(intersectSegments(v(0, 0), v(2, 2), v(0, 2), v(2, 0), eps)).toEqual({
        kind: 'crossing',
        points: [[1, 1]],
      });
    });

    it('should report a touch at end points as a crossing', () => {
      expect(intersectSegments(v(0, 0), v(1, 0), v(1, 0), v(1, 1), eps)).toEqual({
        kind: 'crossing',
        points: [[1, 0]],
      });
    });

    it('should snap a crossing within eps of an end point onto it', () => {
      const res = intersectSegments(v(0, 0), v(2, 0), v(1, 1e-6), v(1, 1), eps);
      expect(res).toEqual({ kind: 'crossing', points: [[1, 1e-6]] });
    });

    it('should return none for disjoint segments', () => {
      expect(intersectSegments(v(0, 0), v(1, 0), v(2, -1), v(2, 1), eps)).toEqual({ kind: 'none' });
    });

    it('should return the shared range of collinear segments', () => {
      expect(intersectSegments(v(0, 0), v(4, 0), v(2, 0), v(6, 0), eps)).toEqual({
        kind: 'overlap',
        curve: 'line',
        ranges: [
          [
            [2, 0],
            [4, 0],
          ],
        ],
      });
    });

    it('should order an overlap by the first segment regardless of the second', () => {
      expect(intersectSegments(v(0, 0), v(4, 0), v(6, 0), v(2, 0), eps)).toEqual({
        kind: 'overlap',
        curve: 'line',
        ranges: [
          [
            [2, 0],
            [4, 0],
          ],
        ],
      });
    });

    it('should reduce collinear segments meeting end to end to a point', () => {
      expect(intersectSegments(v(0, 0), v(2, 0), v(2, 0), v(3, 0), eps)).toEqual({
        kind: 'crossing',
        points: [[2, 0]],
      });
      expect(intersectSegments(v(0, 0), v(2, 0), v(3, 0), v(4, 0), eps)).toEqual({ kind: 'none' });
    });
  });

  describe('line / arc', () => {
    it('should keep only points within the arc sweep', () => {
      expect(intersectSegments(v(1, -2), v(1, 2), ...lowerArc, eps)).toEqual({
        kind: 'crossing',
        points: [[1, -1]],
      });
    });

    it('should classify a grazing line as tangent', () => {
      expect(intersectSegments(...lowerArc, v(0, -1), v(2, -1), eps)).toEqual({
        kind: 'tangent',
        point: [1, -1],
      });
    });

    it('should return none when the crossing is on the missing half', () => {
      expect(intersectSegments(v(1, 0.5), v(1, 2), ...lowerArc, eps)).toEqual({ kind: 'none' });
    });
  });

  describe('arc / arc', () => {
    it('should find the crossing of two arcs on different circles', () => {
      const res = intersectSegments(...lowerArc, v(1, 0, 1), v(3, 0), eps);
      expect(res.kind).toBe('crossing');
      if (res.kind === 'crossing') {
        expect(res.points).toHaveLength(1);
        expect(res.points[0]?.[0]).toBeCloseTo(1.5, 12);
        expect(res.points[0]?.[1]).toBeCloseTo(-Math.sqrt(0.75), 12);
      }
    });

    it('should return the shared range of arcs on one circle', () => {
      // Quarter arc from the bottom of the circle to its right end
      const quarter = [v(1, -1, Math.tan(Math.PI / 8)), v(2, 0)] as const;
      expect(intersectSegments(...lowerArc, ...quarter, eps)).toEqual({
        kind: 'overlap',
        curve: 'arc',
        ranges: [
          [
            [1, -1],
            [2, 0],
          ],
        ],
      });
    });
  });

  it('should treat a degenerate segment as a point', () => {
    expect(intersectSegments(v(1, 0), v(1, 0), v(0, 0), v(2, 0), eps)).toEqual({
      kind: 'crossing',
      points: [[1, 0]],
    });
    expect(intersectSegments(v(1, 1), v(1, 1), v(0, 0), v(2, 0), eps)).toEqual({ kind: 'none' });
  });
});

describe('intersectPoints', () => {
  it('should flatten every kind of result', () => {
    expect(intersectPoints({ kind: 'none' })).toEqual([]);
    expect(intersectPoints({ kind: 'tangent', point: [1, 2] })).toEqual([[1, 2]]);
    expect(
      intersectPoints({
        kind: 'overlap',
        curve: 'line',
        ranges: [
          [
            [0, 0],
            [1, 0],
          ],
        ],
      })
    ).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });
});
