import { describe, it, expect } from 'vitest';
import { plineVertex } from './types.js';
import { PolylineBuilder } from './PolylineBuilder.js';

describe('PolylineBuilder', () => {
  describe('invertDirection', () => {
    it('should move bulges with their segments on open polylines', () => {
      const builder = new PolylineBuilder(false, [plineVertex(0, 0, 0.5), plineVertex(1, 0), plineVertex(2, 1)]);
      builder.invertDirection();
      expect(builder.build().vertices).toEqual([
        { x: 2, y: 1, bulge: 0 },
        { x: 1, y: 0, bulge: -0.5 },
        { x: 0, y: 0, bulge: 0 },
      ]);
    });

    it('should keep the closing bulge paired with its segment', () => {
      const builder = new PolylineBuilder(true, [
        plineVertex(0, 0, 0.1),
        plineVertex(1, 0, 0.2),
        plineVertex(1, 1, 0.3),
      ]);
      builder.invertDirection();
      expect(builder.build().vertices).toEqual([
        { x: 1, y: 1, bulge: -0.2 },
        { x: 1, y: 0, bulge: -0.1 },
        { x: 0, y: 0, bulge: -0.3 },
      ]);
    });

    it('should be exact when applied twice', () => {
      const original = [plineVertex(0, 0, 0.5), plineVertex(3, 0, 0), plineVertex(3, 2, -0.25), plineVertex(0, 2, 0)];
      for (const closed of [true, false]) {
        const builder = new PolylineBuilder(closed, original);
        builder.invertDirection();
        builder.invertDirection();
        expect(builder.build().vertices).toEqual(original);
      }
    });
  });

  describe('editing', () => {
    it('should set, insert and remove vertices', () => {
      const builder = new PolylineBuilder();
      builder.addVertex(0, 0);
      builder.addVertex(2, 0);
      builder.insert(1, plineVertex(1, 1));
      builder.set(0, plineVertex(0, 0, 0.25));
      expect(builder.remove(2)).toEqual({ x: 2, y: 0, bulge: 0 });
      expect(builder.build().vertices).toEqual([
        { x: 0, y: 0, bulge: 0.25 },
        { x: 1, y: 1, bulge: 0 },
      ]);
    });

    it('should reject out of range edits', () => {
      const builder = new PolylineBuilder();
      expect(() => builder.set(0, plineVertex(0, 0))).toThrow(RangeError);
      expect(() => builder.remove(0)).toThrow(RangeError);
    });

    it('should clear and change closure', () => {
      const builder = new PolylineBuilder(false, [plineVertex(0, 0)]);
      builder.reserve(10);
      builder.setClosed(true);
      builder.clear();
      expect(builder.vertexCount).toBe(0);
      expect(builder.isClosed).toBe(true);
      expect(builder.last()).toBeUndefined();
    });
  });

  describe('addOrReplace', () => {
    it('should merge a vertex coincident with the last one', () => {
      const builder = new PolylineBuilder();
      builder.addVertex(0, 0);
      builder.addOrReplace(plineVertex(0, 1e-7, 0.5), 1e-5);
      expect(builder.build().vertices).toEqual([{ x: 0, y: 0, bulge: 0.5 }]);
    });

    it('should append a distinct vertex', () => {
      const builder = new PolylineBuilder();
      builder.addVertex(0, 0);
      builder.addOrReplace(plineVertex(1, 0), 1e-5);
      expect(builder.vertexCount).toBe(2);
    });
  });

  it('should build immutable snapshots', () => {
    const builder = new PolylineBuilder(true);
    builder.addVertex(0, 0);
    builder.addVertex(1, 0);
    const first = builder.build();
    builder.addVertex(1, 1);
    expect(first.vertexCount).toBe(2);
    expect(builder.build().vertexCount).toBe(3);
  });
});
