import { describe, it, expect } from 'vitest';
import { Polyline } from '../pline/Polyline.js';
import { sliceAtPoints } from '../slice/slices.js';
import { selectSlices } from './select.js';

const rect = Polyline.fromTriples(
  [
    [0, 0, 0],
    [4, 0, 0],
    [4, 2, 0],
    [0, 2, 0],
  ],
  true
);

const [first, second] = sliceAtPoints(
  rect,
  [
    { segIndex: 0, point: [2, 0] },
    { segIndex: 2, point: [2, 2] },
  ],
  1e-5
);

describe('selectSlices', () => {
  if (first === undefined || second === undefined) {
    throw new Error('expected two slices');
  }

  it('should keep outside slices of both operands and shared edges once for union', () => {
    const selected = selectSlices(
      [
        { slice: first, classification: 'outside' },
        { slice: second, classification: 'coincidentSame' },
      ],
      [
        { slice: first, classification: 'coincidentSame' },
        { slice: second, classification: 'outside' },
      ],
      'union'
    );
    expect(selected).toHaveLength(3);
    expect(selected[0]).toBe(first);
    expect(selected[1]).toBe(second);
    expect(selected[2]).toBe(second);
  });

  it('should keep inside slices for intersect', () => {
    const selected = selectSlices(
      [
        { slice: first, classification: 'inside' },
        { slice: second, classification: 'outside' },
      ],
      [{ slice: second, classification: 'inside' }],
      'intersect'
    );
    expect(selected).toEqual([first, second]);
  });

  it('should reverse the inside slices of B for subtract', () => {
    const selected = selectSlices(
      [{ slice: first, classification: 'coincidentOpposite' }],
      [
        { slice: second, classification: 'inside' },
        { slice: first, classification: 'outside' },
      ],
      'subtract'
    );
    expect(selected).toHaveLength(2);
    expect(selected[0]).toBe(first);
    expect(selected[1]?.data.invertedDirection).toBe(true);
    expect(selected[1]?.startPoint).toEqual([2, 0]);
    expect(selected[1]?.endPoint).toEqual([2, 2]);
  });

  it('should drop coincident same-direction slices for xor', () => {
    const selected = selectSlices(
      [
        { slice: first, classification: 'coincidentSame' },
        { slice: second, classification: 'inside' },
      ],
      [{ slice: first, classification: 'coincidentSame' }],
      'xor'
    );
    expect(selected).toHaveLength(1);
    expect(selected[0]?.data.invertedDirection).toBe(true);
  });
});
