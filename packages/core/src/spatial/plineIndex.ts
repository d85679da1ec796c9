/**
 * Broad phase over a polyline's segments
 */

import type { AABB, PolylineRead } from '../pline/types.js';
import { segBoundingBox } from '../pline/segment.js';
import { segmentCount, segmentVertices } from '../pline/traverse.js';
import { StaticAABB2DIndex, StaticAABB2DIndexBuilder } from './StaticAABB2DIndex.js';

/**
 * Index with one item per segment (item i is segment i). Boxes are the exact
 * segment extents grown by `pad` on every side.
 */
export function createPlineIndex(view: PolylineRead, pad: number): StaticAABB2DIndex {
  const count = segmentCount(view);
  const builder = new StaticAABB2DIndexBuilder(count);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(view, i);
    const box = segBoundingBox(v1, v2);
    builder.add(box.minX - pad, box.minY - pad, box.maxX + pad, box.maxY + pad);
  }
  return builder.build();
}

/**
 * Query with a box grown by `pad`
 */
export function queryBox(index: StaticAABB2DIndex, box: AABB, pad: number): number[] {
  return index.query(box.minX - pad, box.minY - pad, box.maxX + pad, box.maxY + pad);
}
