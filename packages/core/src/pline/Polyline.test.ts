import { describe, it, expect } from 'vitest';
import type { VertexTriple } from './types.js';
import { plineVertex } from './types.js';
import { Polyline } from './Polyline.js';
import { PolylineBuilder } from './PolylineBuilder.js';

describe('Polyline', () => {
  it('should round-trip triples exactly', () => {
    const triples: VertexTriple[] = [
      [0.1, 0.2, 0.3],
      [1e-12, -7.25, -0.999],
      [123456.789, 0, 0],
    ];
    expect(Polyline.fromTriples(triples, false).toTriples()).toEqual(triples);
  });

  it('should copy its input', () => {
    const vertices = [plineVertex(0, 0), plineVertex(1, 0)];
    const pline = new Polyline(vertices, false);
    vertices.push(plineVertex(2, 2));
    expect(pline.vertexCount).toBe(2);
  });

  it('should copy any read view', () => {
    const builder = new PolylineBuilder(true);
    builder.addVertex(0, 0, 0.5);
    builder.addVertex(2, 0);
    const pline = Polyline.from(builder);
    builder.addVertex(9, 9);
    expect(pline.isClosed).toBe(true);
    expect(pline.vertices).toEqual([
      { x: 0, y: 0, bulge: 0.5 },
      { x: 2, y: 0, bulge: 0 },
    ]);
  });

  it('should reject out of range indices', () => {
    const pline = Polyline.fromTriples([[0, 0, 0]], false);
    expect(() => pline.at(1)).toThrow(RangeError);
    expect(() => pline.at(-1)).toThrow(RangeError);
  });
});
