/**
 * PlineView - non-copying sub-range of another read view
 *
 * A slice of a source polyline is described by where it starts (a vertex
 * index and a replacement for that vertex, since a slice usually begins part
 * way along a segment), how many whole segments it spans, the bulge of its
 * final partial segment and its end point. The view answers `at()` from the
 * source on demand and can present the range reversed.
 *
 * Forward vertex layout (vertexCount = endIndexOffset + 2):
 *
 *   0                     updatedStart
 *   1 .. offset - 1       source vertices startIndex + k (wrapping)
 *   offset                source vertex startIndex + offset, bulge replaced
 *                         by updatedEndBulge (only when offset > 0)
 *   offset + 1            endPoint, bulge 0
 */

import type { Vec2 } from '../num/vec2.js';
import type { PlineVertex, PolylineRead } from './types.js';
import { vertexAt, withBulge } from './types.js';
import { fwdWrappingIndex } from './traverse.js';

export interface PlineViewData {
  /** Source index of the vertex that starts the first segment of the slice */
  startIndex: number;
  /** Number of source vertices the slice advances past `startIndex` */
  endIndexOffset: number;
  /** First vertex: the start point with the bulge of its (partial) segment */
  updatedStart: PlineVertex;
  /** Bulge of the final (partial) segment */
  updatedEndBulge: number;
  endPoint: Vec2;
  invertedDirection: boolean;
}

function negate(bulge: number): number {
  return bulge === 0 ? 0 : -bulge;
}

export class PlineView implements PolylineRead {
  readonly source: PolylineRead;
  readonly data: PlineViewData;

  constructor(source: PolylineRead, data: PlineViewData) {
    this.source = source;
    this.data = data;
  }

  get vertexCount(): number {
    return this.data.endIndexOffset + 2;
  }

  get isClosed(): boolean {
    return false;
  }

  at(index: number): PlineVertex {
    if (index < 0 || index >= this.vertexCount) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this.vertexCount})`);
    }
    return this.data.invertedDirection ? this.invertedAt(index) : this.forwardAt(index);
  }

  /**
   * The same slice with its direction of travel flipped
   */
  inverted(): PlineView {
    return new PlineView(this.source, {
      ...this.data,
      invertedDirection: !this.data.invertedDirection,
    });
  }

  get startPoint(): Vec2 {
    const v = this.at(0);
    return [v.x, v.y];
  }

  get endPoint(): Vec2 {
    const v = this.at(this.vertexCount - 1);
    return [v.x, v.y];
  }

  private forwardAt(index: number): PlineVertex {
    const { startIndex, endIndexOffset, updatedStart, updatedEndBulge, endPoint } = this.data;
    const n = this.source.vertexCount;
    if (index === 0) {
      return updatedStart;
    }
    if (index === endIndexOffset + 1) {
      return vertexAt(endPoint, 0);
    }
    const v = this.source.at(fwdWrappingIndex(startIndex, index, n));
    return index === endIndexOffset ? withBulge(v, updatedEndBulge) : v;
  }

  /**
   * Reversed traversal: vertex k of the inverted view sits where vertex
   * (count - 1 - k) of the forward view does, and carries the negated bulge of
   * the forward segment that ends there.
   */
  private invertedAt(index: number): PlineVertex {
    const { startIndex, endIndexOffset, updatedStart, updatedEndBulge, endPoint } = this.data;
    const n = this.source.vertexCount;
    if (index === 0) {
      return vertexAt(endPoint, negate(updatedEndBulge));
    }
    if (index === endIndexOffset + 1) {
      return withBulge(updatedStart, 0);
    }
    if (index === endIndexOffset) {
      const v = this.source.at(fwdWrappingIndex(startIndex, 1, n));
      return withBulge(v, negate(updatedStart.bulge));
    }
    const bulgeIndex = fwdWrappingIndex(startIndex, endIndexOffset - index, n);
    const v = this.source.at(fwdWrappingIndex(bulgeIndex, 1, n));
    return withBulge(v, negate(this.source.at(bulgeIndex).bulge));
  }
}
