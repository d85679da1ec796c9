import { describe, it, expect } from 'vitest';
import { Polyline } from '../pline/Polyline.js';
import { area } from '../pline/query.js';
import { sliceAtPoints } from './slices.js';
import { stitchSlices, turningAngle } from './stitch.js';

const options = { joinEps: 1e-4, posEqualEps: 1e-5, includeOpen: false };

const open = (...points: Array<[number, number]>): Polyline =>
  Polyline.fromTriples(
    points.map(([x, y]) => [x, y, 0]),
    false
  );

describe('turningAngle', () => {
  it('should be positive for left turns and negative for right turns', () => {
    expect(turningAngle([1, 0], [0, 1])).toBeCloseTo(Math.PI / 2, 12);
    expect(turningAngle([1, 0], [0, -1])).toBeCloseTo(-Math.PI / 2, 12);
    expect(turningAngle([1, 0], [1, 0])).toBe(0);
  });
});

describe('stitchSlices', () => {
  it('should rebuild a closed polyline from its slices', () => {
    const rect = Polyline.fromTriples(
      [
        [0, 0, 0],
        [4, 0, 0],
        [4, 2, 0],
        [0, 2, 0],
      ],
      true
    );
    const slices = sliceAtPoints(
      rect,
      [
        { segIndex: 0, point: [2, 0] },
        { segIndex: 2, point: [2, 2] },
      ],
      1e-5
    );
    const result = stitchSlices(slices, options);
    expect(result).toHaveLength(1);
    expect(result[0]?.isClosed).toBe(true);
    expect(result[0]?.toTriples()).toEqual([
      [2, 0, 0],
      [4, 0, 0],
      [4, 2, 0],
      [2, 2, 0],
      [0, 2, 0],
      [0, 0, 0],
    ]);
    expect(area(result[0] ?? rect)).toBe(8);
  });

  it('should take the smallest turn at a branch', () => {
    const slices = [open([0, 0], [1, 0]), open([1, 0], [1, 1]), open([1, 0], [1, -1])];
    const result = stitchSlices(slices, { ...options, includeOpen: true });
    expect(result.map((p) => p.toTriples())).toEqual([
      [
        [0, 0, 0],
        [1, 0, 0],
        [1, -1, 0],
      ],
      [
        [1, 0, 0],
        [1, 1, 0],
      ],
    ]);
  });

  it('should drop chains that do not close unless open output is wanted', () => {
    const slices = [open([0, 0], [1, 0]), open([1, 0], [1, 1])];
    expect(stitchSlices(slices, options)).toEqual([]);
    expect(stitchSlices(slices, { ...options, includeOpen: true })).toHaveLength(1);
  });

  it('should join ends within the join tolerance', () => {
    const slices = [open([0, 0], [2, 0], [2, 2]), open([2, 2 + 5e-5], [0, 2], [0, 0])];
    const result = stitchSlices(slices, options);
    expect(result).toHaveLength(1);
    expect(result[0]?.vertexCount).toBe(4);
  });

  it('should drop loops without area', () => {
    const slices = [open([0, 0], [1, 0]), open([1, 0], [0, 0])];
    expect(stitchSlices(slices, options)).toEqual([]);
  });

  it('should return nothing for no slices', () => {
    expect(stitchSlices([], options)).toEqual([]);
  });
});
