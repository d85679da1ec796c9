/**
 * PolylineBuilder - mutable vertex storage
 *
 * Implements all three view capabilities. Engines assemble their output here
 * and hand out the result of `build()`; the builder itself never escapes.
 */

import type { PlineVertex, PolylineCreate, PolylineReadWrite } from './types.js';
import { plineVertex, withBulge } from './types.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import { Polyline } from './Polyline.js';

function negateBulge(bulge: number): number {
  return bulge === 0 ? 0 : -bulge;
}

export class PolylineBuilder implements PolylineReadWrite, PolylineCreate {
  private _vertices: PlineVertex[];
  private _isClosed: boolean;

  constructor(isClosed = false, vertices: Iterable<PlineVertex> = []) {
    this._vertices = Array.from(vertices);
    this._isClosed = isClosed;
  }

  get vertexCount(): number {
    return this._vertices.length;
  }

  get isClosed(): boolean {
    return this._isClosed;
  }

  at(index: number): PlineVertex {
    const v = this._vertices[index];
    if (v === undefined) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this._vertices.length})`);
    }
    return v;
  }

  /**
   * Last vertex, if any
   */
  last(): PlineVertex | undefined {
    return this._vertices[this._vertices.length - 1];
  }

  // ==========================================================================
  // Read-write
  // ==========================================================================

  set(index: number, vertex: PlineVertex): void {
    if (index < 0 || index >= this._vertices.length) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this._vertices.length})`);
    }
    this._vertices[index] = vertex;
  }

  insert(index: number, vertex: PlineVertex): void {
    this._vertices.splice(index, 0, vertex);
  }

  remove(index: number): PlineVertex {
    const [removed] = this._vertices.splice(index, 1);
    if (removed === undefined) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this._vertices.length})`);
    }
    return removed;
  }

  /**
   * Reverse the direction of travel. The bulge of the closing segment (or, for
   * open polylines, the unused bulge of the last vertex) moves with it, so
   * inverting twice restores the original exactly.
   */
  invertDirection(): void {
    const count = this._vertices.length;
    if (count < 2) {
      return;
    }
    this._vertices.reverse();
    const first = this.at(0);
    for (let i = 1; i < count; i++) {
      const prev = this.at(i - 1);
      this._vertices[i - 1] = withBulge(prev, negateBulge(this.at(i).bulge));
    }
    this._vertices[count - 1] = withBulge(this.at(count - 1), negateBulge(first.bulge));
  }

  // ==========================================================================
  // Create
  // ==========================================================================

  add(vertex: PlineVertex): void {
    this._vertices.push(vertex);
  }

  addVertex(x: number, y: number, bulge = 0): void {
    this._vertices.push(plineVertex(x, y, bulge));
  }

  /**
   * Append `vertex`, or when it coincides with the last vertex (within `eps`)
   * give the last vertex its bulge instead.
   */
  addOrReplace(vertex: PlineVertex, eps: number): void {
    const last = this.last();
    if (last !== undefined && fuzzyEqPoint([last.x, last.y], [vertex.x, vertex.y], eps)) {
      this._vertices[this._vertices.length - 1] = withBulge(last, vertex.bulge);
      return;
    }
    this._vertices.push(vertex);
  }

  setClosed(closed: boolean): void {
    this._isClosed = closed;
  }

  // Arrays grow on demand; there is nothing to preallocate.
  reserve(_additional: number): void {}

  clear(): void {
    this._vertices = [];
  }

  build(): Polyline {
    return new Polyline(this._vertices, this._isClosed);
  }
}
