/**
 * Input schemas
 *
 * Zod schemas for the public operation inputs. `z.number()` rejects NaN and
 * the infinities, which is what makes a coordinate, bulge or distance valid.
 */

import { z } from 'zod';
import type { PolylineIssue } from './types.js';

// ============================================================================
// Polyline Schemas
// ============================================================================

/**
 * `[x, y, bulge]`
 */
export const vertexTripleSchema = z.tuple([z.number(), z.number(), z.number()]);

export const polylineInputSchema = z.object({
  vertices: z.array(vertexTripleSchema).min(2, 'A polyline needs at least 2 vertices'),
  isClosed: z.boolean(),
});

// ============================================================================
// Parameter Schemas
// ============================================================================

export const toleranceSchema = z.number().positive('Tolerance must be positive');

export const distanceSchema = z.number();

export const booleanOpSchema = z.enum(['union', 'intersect', 'subtract', 'xor']);

const epsSchema = z.number().positive();

export const offsetOptionsSchema = z.object({
  tolerance: toleranceSchema.optional(),
  posEqualEps: epsSchema.optional(),
  sliceJoinEps: epsSchema.optional(),
  offsetDistEps: epsSchema.optional(),
  handleSelfIntersects: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export const booleanOptionsSchema = z.object({
  tolerance: toleranceSchema.optional(),
  posEqualEps: epsSchema.optional(),
  sliceJoinEps: epsSchema.optional(),
  verbose: z.boolean().optional(),
});

// ============================================================================
// Types
// ============================================================================

export type PolylineInput = z.infer<typeof polylineInputSchema>;
export type OffsetCallOptions = z.infer<typeof offsetOptionsSchema>;
export type BooleanCallOptions = z.infer<typeof booleanOptionsSchema>;

// ============================================================================
// Issue Mapping
// ============================================================================

/**
 * Turn zod issues into polyline issues, with paths prefixed by `root`
 */
export function issuesFromZod<T>(error: z.ZodError<T>, root: string): PolylineIssue[] {
  return error.issues.map((issue) => {
    const segments = issue.path.map((p) => String(p));
    const path = [root, ...segments].filter((s) => s.length > 0).join('.');
    let kind: PolylineIssue['kind'] = 'schema';
    if (segments[0] === 'vertices') {
      kind = issue.code === 'too_small' && segments.length === 1 ? 'tooFewVertices' : 'nonFinite';
    }
    return { kind, path, message: `${path}: ${issue.message}` };
  });
}

/**
 * Issues from checking `value` against `schema`; empty when it passes
 */
export function checkSchema<T>(schema: z.ZodType<T>, value: unknown, root: string): PolylineIssue[] {
  const result = schema.safeParse(value);
  return result.success ? [] : issuesFromZod(result.error, root);
}
