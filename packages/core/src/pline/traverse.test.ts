import { describe, it, expect } from 'vitest';
import { Polyline } from './Polyline.js';
import {
  segmentCount,
  nextWrappingIndex,
  fwdWrappingIndex,
  fwdWrappingDist,
  segmentVertices,
  segmentAt,
  segmentPairs,
  segments,
  collectVertices,
} from './traverse.js';

describe('traverse', () => {
  const square = Polyline.fromTriples(
    [
      [0, 0, 0],
      [1, 0, 0],
      [1, 1, 0],
      [0, 1, 0],
    ],
    true
  );
  const open = Polyline.fromTriples(
    [
      [0, 0, 0],
      [1, 0, 0],
      [1, 1, 0],
    ],
    false
  );

  describe('segmentCount', () => {
    it('should count the closing segment of closed polylines', () => {
      expect(segmentCount(square)).toBe(4);
      expect(segmentCount(open)).toBe(2);
    });

    it('should be zero below two vertices', () => {
      expect(segmentCount(Polyline.fromTriples([[0, 0, 0]], true))).toBe(0);
      expect(segmentCount(Polyline.fromTriples([], false))).toBe(0);
    });
  });

  describe('index arithmetic', () => {
    it('should wrap forwards', () => {
      expect(nextWrappingIndex(3, 4)).toBe(0);
      expect(nextWrappingIndex(1, 4)).toBe(2);
      expect(fwdWrappingIndex(3, 2, 4)).toBe(1);
      expect(fwdWrappingDist(3, 1, 4)).toBe(2);
      expect(fwdWrappingDist(1, 3, 4)).toBe(2);
    });
  });

  describe('segment access', () => {
    it('should return the closing segment of a closed polyline', () => {
      const [v1, v2] = segmentVertices(square, 3);
      expect(v1).toEqual({ x: 0, y: 1, bulge: 0 });
      expect(v2).toEqual({ x: 0, y: 0, bulge: 0 });
      expect(segmentAt(square, 3)).toEqual({ kind: 'line', start: [0, 1], end: [0, 0] });
    });

    it('should iterate lazily and restart on every iteration', () => {
      const pairs = segmentPairs(open);
      expect([...pairs]).toHaveLength(2);
      expect([...pairs]).toHaveLength(2);
      expect([...segments(square)].map((s) => s.end)).toEqual([
        [1, 0],
        [1, 1],
        [0, 1],
        [0, 0],
      ]);
    });

    it('should collect all vertices', () => {
      expect(collectVertices(open)).toEqual([
        { x: 0, y: 0, bulge: 0 },
        { x: 1, y: 0, bulge: 0 },
        { x: 1, y: 1, bulge: 0 },
      ]);
    });
  });
});
