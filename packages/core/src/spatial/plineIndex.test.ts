import { describe, it, expect } from 'vitest';
import { Polyline } from '../pline/Polyline.js';
import { createPlineIndex, queryBox } from './plineIndex.js';

describe('createPlineIndex', () => {
  // Square with a half-circle bulging out of its bottom edge
  const shape = Polyline.fromTriples(
    [
      [0, 0, 1],
      [2, 0, 0],
      [2, 2, 0],
      [0, 2, 0],
    ],
    true
  );

  it('should index every segment including the closing one', () => {
    const index = createPlineIndex(shape, 0);
    expect(index.numItems).toBe(4);
    expect(index.query(-0.5, 1, -0.1, 1.5)).toEqual([]);
    expect(index.query(-0.1, 1, 0.1, 1.5)).toEqual([3]);
  });

  it('should use the arc extents', () => {
    const index = createPlineIndex(shape, 0);
    expect(index.query(0.9, -0.95, 1.1, -0.9)).toEqual([0]);
  });

  it('should pad boxes', () => {
    const index = createPlineIndex(shape, 0.25);
    expect(queryBox(index, { minX: 2.2, minY: 1, maxX: 2.3, maxY: 1.1 }, 0)).toEqual([1]);
    expect(queryBox(index, { minX: 2.4, minY: 1, maxX: 2.5, maxY: 1.1 }, 0)).toEqual([]);
    expect(queryBox(index, { minX: 2.4, minY: 1, maxX: 2.5, maxY: 1.1 }, 0.2)).toEqual([1]);
  });
});
