/**
 * Polyline - owning, immutable vertex sequence
 *
 * The value type every engine returns. Construction copies the given
 * vertices, so later changes to the caller's arrays never leak in.
 */

import type { PlineVertex, PolylineRead, VertexTriple } from './types.js';
import { plineVertex } from './types.js';

export class Polyline implements PolylineRead {
  private readonly _vertices: readonly PlineVertex[];
  readonly isClosed: boolean;

  constructor(vertices: Iterable<PlineVertex>, isClosed: boolean) {
    this._vertices = Array.from(vertices, (v) => plineVertex(v.x, v.y, v.bulge));
    this.isClosed = isClosed;
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Build from `[x, y, bulge]` triples. `toTriples()` returns exactly the
   * same numbers.
   */
  static fromTriples(triples: readonly VertexTriple[], isClosed: boolean): Polyline {
    return new Polyline(
      triples.map(([x, y, bulge]) => plineVertex(x, y, bulge)),
      isClosed
    );
  }

  /**
   * Copy any read view into an owning polyline
   */
  static from(view: PolylineRead): Polyline {
    const vertices: PlineVertex[] = [];
    for (let i = 0; i < view.vertexCount; i++) {
      vertices.push(view.at(i));
    }
    return new Polyline(vertices, view.isClosed);
  }

  // ==========================================================================
  // Read view
  // ==========================================================================

  get vertexCount(): number {
    return this._vertices.length;
  }

  at(index: number): PlineVertex {
    const v = this._vertices[index];
    if (v === undefined) {
      throw new RangeError(`Vertex index ${index} out of range (count ${this._vertices.length})`);
    }
    return v;
  }

  get vertices(): readonly PlineVertex[] {
    return this._vertices;
  }

  toTriples(): VertexTriple[] {
    return this._vertices.map((v) => [v.x, v.y, v.bulge]);
  }
}
