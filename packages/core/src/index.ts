/**
 * @contourkit/core - 2D line/arc polyline kernel
 *
 * ## Primary API
 * - offset: parallel offset of closed and open polylines
 * - combine: union / intersect / subtract / xor of closed polylines
 * - polylineFromTriples, validatePolyline: checked construction
 *
 * All primary operations return OperationResult<T>.
 *
 * ## Building blocks (for advanced use)
 * - pline: vertex model, read / read-write / create views, queries
 * - spatial: static packed bounding-box index
 * - geom: segment intersection
 * - offset, boolean: the engines behind the primary API
 */

// =============================================================================
// Primary API
// =============================================================================
export { offset, combine, polylineFromTriples, validatePolyline, polylineIssues } from './api/operations.js';
export * from './api/types.js';
export {
  vertexTripleSchema,
  polylineInputSchema,
  toleranceSchema,
  distanceSchema,
  booleanOpSchema,
  offsetOptionsSchema,
  booleanOptionsSchema,
  type PolylineInput,
  type OffsetCallOptions,
  type BooleanCallOptions,
} from './api/schema.js';

// =============================================================================
// Numerics
// =============================================================================
export { vec2, type Vec2 } from './num/vec2.js';
export {
  type NumericContext,
  type Tolerances,
  DEFAULT_TOLERANCES,
  createNumericContext,
  withLengthTolerance,
  fuzzyEqPoint,
} from './num/tolerance.js';
export { orient2D, orient2DRobust, isLeft, isRight } from './num/predicates.js';

// =============================================================================
// Polylines
// =============================================================================
export type {
  PlineVertex,
  VertexTriple,
  PolylineRead,
  PolylineReadWrite,
  PolylineCreate,
  PlineSegment,
  LineSegment,
  ArcSegment,
  AABB,
} from './pline/types.js';
export { plineVertex, vertexPos } from './pline/types.js';
export { Polyline } from './pline/Polyline.js';
export { PolylineBuilder } from './pline/PolylineBuilder.js';
export { PlineView, type PlineViewData } from './pline/PlineView.js';
export {
  arcRadiusAndCenter,
  segLength,
  segPointAt,
  segMidpoint,
  segSplitAtPoint,
  segClosestPoint,
  segBoundingBox,
  segTangentAt,
} from './pline/segment.js';
export { segmentCount, segmentAt, segments, segmentPairs } from './pline/traverse.js';
export {
  area,
  pathLength,
  extents,
  orientation,
  windingNumber,
  closestPoint,
  removeRepeatPos,
  removeRedundant,
  rotateStart,
  arcsToApproxLines,
  invertedDirection,
  translate,
  scale,
  fuzzyEqual,
  type Orientation,
  type ClosestPointResult,
} from './pline/query.js';

// =============================================================================
// Spatial index & intersection
// =============================================================================
export { StaticAABB2DIndex, StaticAABB2DIndexBuilder } from './spatial/StaticAABB2DIndex.js';
export { createPlineIndex } from './spatial/plineIndex.js';
export { intersectSegments, type SegIntersect } from './geom/segIntersect.js';
export {
  findIntersects,
  findSelfIntersects,
  hasSelfIntersects,
  type PlineIntersectsCollection,
} from './geom/plineIntersects.js';

// =============================================================================
// Engines
// =============================================================================
export { parallelOffset } from './offset/parallelOffset.js';
export { type OffsetOptions, DEFAULT_OFFSET_EPS_FACTORS } from './offset/types.js';
export { plineBoolean } from './boolean/plineBoolean.js';
export {
  type BooleanOp,
  type BooleanOptions,
  type BooleanResult,
  DEFAULT_BOOLEAN_EPS_FACTORS,
} from './boolean/types.js';
