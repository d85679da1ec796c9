/**
 * Public operations
 *
 * Validated entry points over the offset and boolean engines. Inputs are
 * checked before anything is computed; engines only ever see valid polylines.
 */

import type { NumericContext } from '../num/tolerance.js';
import { DEFAULT_TOLERANCES, createNumericContext } from '../num/tolerance.js';
import type { PolylineRead, VertexTriple } from '../pline/types.js';
import { vertexPos } from '../pline/types.js';
import { bulgeIsZero } from '../pline/segment.js';
import { segmentCount, segmentVertices } from '../pline/traverse.js';
import { Polyline } from '../pline/Polyline.js';
import { removeRepeatPos } from '../pline/query.js';
import { createPlineIndex } from '../spatial/plineIndex.js';
import { hasSelfIntersects } from '../geom/plineIntersects.js';
import { parallelOffset } from '../offset/parallelOffset.js';
import { plineBoolean } from '../boolean/plineBoolean.js';
import type { BooleanOp } from '../boolean/types.js';
import type { OperationResult, OperationType, PolylineIssue } from './types.js';
import { failure, invalidInputError, success } from './types.js';
import type { BooleanCallOptions, OffsetCallOptions } from './schema.js';
import {
  booleanOpSchema,
  booleanOptionsSchema,
  checkSchema,
  distanceSchema,
  issuesFromZod,
  offsetOptionsSchema,
  polylineInputSchema,
  toleranceSchema,
} from './schema.js';

// ============================================================================
// Validation
// ============================================================================

function toTriples(view: PolylineRead): VertexTriple[] {
  const triples: VertexTriple[] = [];
  for (let i = 0; i < view.vertexCount; i++) {
    const v = view.at(i);
    triples.push([v.x, v.y, v.bulge]);
  }
  return triples;
}

/**
 * Problems that make `view` unusable by the engines. `path` prefixes each
 * issue's path.
 */
export function polylineIssues(view: PolylineRead, path: string, eps: number): PolylineIssue[] {
  const parsed = polylineInputSchema.safeParse({ vertices: toTriples(view), isClosed: view.isClosed });
  if (!parsed.success) {
    return issuesFromZod(parsed.error, path);
  }

  const issues: PolylineIssue[] = [];
  const count = segmentCount(view);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(view, i);
    const [x1, y1] = vertexPos(v1);
    const [x2, y2] = vertexPos(v2);
    if (!bulgeIsZero(v1.bulge) && Math.hypot(x2 - x1, y2 - y1) <= eps) {
      const issuePath = `${path}.vertices.${i}`;
      issues.push({
        kind: 'zeroLengthArc',
        path: issuePath,
        message: `${issuePath}: arc with bulge ${v1.bulge} has a zero-length chord`,
      });
    }
  }
  return issues;
}

function invalid<T>(operation: OperationType, issues: PolylineIssue[]): OperationResult<T> {
  const first = issues[0]?.message ?? 'invalid input';
  const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
  return failure(invalidInputError(`Invalid input: ${first}${more}`, operation, issues));
}

function contextFor(tolerance: number | undefined): NumericContext {
  return createNumericContext({ length: tolerance ?? DEFAULT_TOLERANCES.length });
}

/**
 * Check a polyline and return an immutable copy of it
 */
export function validatePolyline(view: PolylineRead, tolerance?: number): OperationResult<Polyline> {
  const tolIssues = checkSchema(toleranceSchema.optional(), tolerance, 'tolerance');
  if (tolIssues.length > 0) {
    return invalid('validate', tolIssues);
  }
  const issues = polylineIssues(view, 'polyline', contextFor(tolerance).tol.length);
  return issues.length > 0 ? invalid('validate', issues) : success(Polyline.from(view));
}

/**
 * Build a polyline from `[x, y, bulge]` triples, validating them first
 */
export function polylineFromTriples(
  triples: readonly (readonly number[])[],
  isClosed: boolean,
  tolerance?: number
): OperationResult<Polyline> {
  const parsed = polylineInputSchema.safeParse({ vertices: triples, isClosed });
  if (!parsed.success) {
    return invalid('construct', issuesFromZod(parsed.error, 'polyline'));
  }
  const pline = Polyline.fromTriples(parsed.data.vertices, parsed.data.isClosed);
  const issues = polylineIssues(pline, 'polyline', contextFor(tolerance).tol.length);
  return issues.length > 0 ? invalid('construct', issues) : success(pline);
}

// ============================================================================
// Offset
// ============================================================================

/**
 * Parallel offset of `polyline` by `distance` (positive is to the right of
 * travel). The third argument is either the length tolerance or an options
 * object.
 */
export function offset(
  polyline: PolylineRead,
  distance: number,
  options: number | OffsetCallOptions = {}
): OperationResult<Polyline[]> {
  const opts = typeof options === 'number' ? { tolerance: options } : options;
  const issues = [
    ...checkSchema(distanceSchema, distance, 'distance'),
    ...checkSchema(offsetOptionsSchema, opts, 'options'),
  ];
  if (issues.length > 0) {
    return invalid('offset', issues);
  }

  const { tolerance, ...engineOptions } = opts;
  const ctx = contextFor(tolerance);
  const inputIssues = polylineIssues(polyline, 'polyline', ctx.tol.length);
  if (inputIssues.length > 0) {
    return invalid('offset', inputIssues);
  }

  const loops = parallelOffset(polyline, distance, ctx, engineOptions);
  const warnings = loops.length === 0 ? [`polyline: nothing remains at distance ${distance}`] : undefined;
  return success(loops, warnings);
}

// ============================================================================
// Boolean
// ============================================================================

function closedSimpleIssues(view: PolylineRead, path: string, eps: number): PolylineIssue[] {
  if (!view.isClosed) {
    return [{ kind: 'notClosed', path: `${path}.isClosed`, message: `${path}: polyline must be closed` }];
  }
  // Same cleanup the engine applies, so repeated vertices do not count as crossings.
  const clean = removeRepeatPos(view, eps);
  if (clean.vertexCount < 2) {
    return [
      {
        kind: 'tooFewVertices',
        path: `${path}.vertices`,
        message: `${path}.vertices: A polyline needs at least 2 distinct vertices`,
      },
    ];
  }
  if (hasSelfIntersects(clean, createPlineIndex(clean, eps), eps)) {
    return [{ kind: 'selfIntersecting', path, message: `${path}: polyline intersects itself` }];
  }
  return [];
}

function repeatWarnings(view: PolylineRead, path: string, eps: number): string[] {
  const removed = view.vertexCount - removeRepeatPos(view, eps).vertexCount;
  if (removed === 0) {
    return [];
  }
  return [`${path}: ${removed} repeated ${removed === 1 ? 'vertex' : 'vertices'} ignored`];
}

/**
 * Boolean combination of two closed polylines. Loops with material come
 * first (oriented like `a`), then holes (oriented opposite).
 */
export function combine(
  a: PolylineRead,
  b: PolylineRead,
  op: BooleanOp,
  options: number | BooleanCallOptions = {}
): OperationResult<Polyline[]> {
  const opts = typeof options === 'number' ? { tolerance: options } : options;
  const paramIssues = [
    ...checkSchema(booleanOpSchema, op, 'op'),
    ...checkSchema(booleanOptionsSchema, opts, 'options'),
  ];
  if (paramIssues.length > 0) {
    return invalid('combine', paramIssues);
  }

  const { tolerance, ...engineOptions } = opts;
  const ctx = contextFor(tolerance);
  const eps = engineOptions.posEqualEps ?? ctx.tol.length;
  let issues = [...polylineIssues(a, 'a', eps), ...polylineIssues(b, 'b', eps)];
  if (issues.length === 0) {
    issues = [...closedSimpleIssues(a, 'a', eps), ...closedSimpleIssues(b, 'b', eps)];
  }
  if (issues.length > 0) {
    return invalid('combine', issues);
  }

  const { positive, negative } = plineBoolean(a, b, op, ctx, engineOptions);
  const warnings = [...repeatWarnings(a, 'a', eps), ...repeatWarnings(b, 'b', eps)];
  return success([...positive, ...negative], warnings.length > 0 ? warnings : undefined);
}
