/**
 * Polyline data model and view capabilities
 *
 * A polyline is a flat list of vertices. Each vertex's bulge describes the
 * segment that leaves it: 0 for a straight line, otherwise an arc whose
 * included angle is `4·atan(bulge)` (counter-clockwise when positive). A closed
 * polyline has an implicit segment from its last vertex back to the first.
 *
 * Algorithms are written against the three capability interfaces below and
 * take the narrowest one they need.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Polyline } from './Polyline.js';

export interface PlineVertex {
  readonly x: number;
  readonly y: number;
  readonly bulge: number;
}

/**
 * `[x, y, bulge]` triple used at the construction boundary
 */
export type VertexTriple = [number, number, number];

export function plineVertex(x: number, y: number, bulge = 0): PlineVertex {
  return { x, y, bulge };
}

export function vertexPos(v: PlineVertex): Vec2 {
  return [v.x, v.y];
}

export function withBulge(v: PlineVertex, bulge: number): PlineVertex {
  return { x: v.x, y: v.y, bulge };
}

export function vertexAt(pos: Vec2, bulge = 0): PlineVertex {
  return { x: pos[0], y: pos[1], bulge };
}

// ============================================================================
// View capabilities
// ============================================================================

/**
 * Read access to an ordered vertex sequence
 */
export interface PolylineRead {
  readonly vertexCount: number;
  readonly isClosed: boolean;
  /** Vertex at `index`, 0 ≤ index < vertexCount */
  at(index: number): PlineVertex;
}

/**
 * In-place modification of an existing vertex sequence
 */
export interface PolylineReadWrite extends PolylineRead {
  set(index: number, vertex: PlineVertex): void;
  /**
   * Reverse traversal direction: vertex order is reversed and every bulge is
   * negated and moved onto the vertex that now starts its segment.
   */
  invertDirection(): void;
}

/**
 * Construction of a new polyline
 */
export interface PolylineCreate {
  add(vertex: PlineVertex): void;
  setClosed(closed: boolean): void;
  /** Hint that `additional` more vertices will be added */
  reserve(additional: number): void;
  build(): Polyline;
}

// ============================================================================
// Segments
// ============================================================================

export interface LineSegment {
  kind: 'line';
  start: Vec2;
  end: Vec2;
}

export interface ArcSegment {
  kind: 'arc';
  start: Vec2;
  end: Vec2;
  center: Vec2;
  radius: number;
  ccw: boolean;
  /** Signed included angle, positive for counter-clockwise */
  sweep: number;
}

/**
 * Segment derived on demand from two consecutive vertices
 */
export type PlineSegment = LineSegment | ArcSegment;

/**
 * Axis-aligned bounding box
 */
export interface AABB {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
