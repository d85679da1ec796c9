/**
 * Operation result types
 *
 * Every public operation returns OperationResult<T> so that callers see
 * success or failure (with diagnostics) in the type, and nothing throws at
 * the boundary.
 */

// ============================================================================
// Operation Types
// ============================================================================

/**
 * Public operation that produced an error
 */
export type OperationType = `offset` | `combine` | `construct` | `validate`;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error category for operation failures
 */
export type OperationErrorCategory = `invalidInput`; // Bad input parameters

/**
 * Hint to help callers understand and fix an error
 */
export interface OperationHint {
  /** Short description of what might be wrong */
  summary: string;
  /** Suggested action to fix the issue */
  suggestion?: string;
  /** Related parameter names that might need adjustment */
  relatedParameters?: string[];
}

export interface OperationError {
  category: OperationErrorCategory;
  /** Human-readable error message */
  message: string;
  operation: OperationType;
  /** Individual problems found in the input */
  issues?: PolylineIssue[];
  hints?: OperationHint[];
}

/**
 * A single problem found while validating a polyline
 */
export interface PolylineIssue {
  kind:
    | `nonFinite`
    | `tooFewVertices`
    | `zeroLengthArc`
    | `notClosed`
    | `selfIntersecting`
    | `schema`;
  /** Input path, e.g. `a.vertices.3` */
  path: string;
  message: string;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of a public operation
 *
 * Usage:
 * ```ts
 * const result = offset(outline, 2.5, 1e-5);
 * if (result.ok) {
 *   for (const loop of result.value) draw(loop);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type OperationResult<T> =
  | { ok: true; value: T; warnings?: string[] }
  | { ok: false; error: OperationError };

// ============================================================================
// Result Constructors
// ============================================================================

export function success<T>(value: T, warnings?: string[]): OperationResult<T> {
  return warnings === undefined ? { ok: true, value } : { ok: true, value, warnings };
}

export function failure<T>(error: OperationError): OperationResult<T> {
  return { ok: false, error };
}

export function createOperationError(
  category: OperationErrorCategory,
  message: string,
  operation: OperationType,
  options?: {
    issues?: PolylineIssue[];
    hints?: OperationHint[];
  }
): OperationError {
  return {
    category,
    message,
    operation,
    ...options,
  };
}

/**
 * Create an error for invalid input; hints are derived from the issues when
 * none are given
 */
export function invalidInputError(
  message: string,
  operation: OperationType,
  issues: PolylineIssue[] = [],
  hints?: OperationHint[]
): OperationError {
  return createOperationError(`invalidInput`, message, operation, {
    issues,
    hints: hints ?? hintsFromIssues(issues),
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isSuccess<T>(
  result: OperationResult<T>
): result is { ok: true; value: T; warnings?: string[] } {
  return result.ok;
}

export function isFailure<T>(
  result: OperationResult<T>
): result is { ok: false; error: OperationError } {
  return !result.ok;
}

/**
 * Map over a successful result
 */
export function mapResult<T, U>(result: OperationResult<T>, fn: (value: T) => U): OperationResult<U> {
  if (result.ok) {
    return success(fn(result.value), result.warnings);
  }
  return result;
}

/**
 * Chain operations (flatMap)
 */
export function chainResult<T, U>(
  result: OperationResult<T>,
  fn: (value: T) => OperationResult<U>
): OperationResult<U> {
  if (result.ok) {
    const nextResult = fn(result.value);
    if (nextResult.ok && result.warnings) {
      return {
        ...nextResult,
        warnings: [...result.warnings, ...(nextResult.warnings ?? [])],
      };
    }
    return nextResult;
  }
  return result;
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapResult<T>(result: OperationResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Operation ${result.error.operation} failed: ${result.error.message}`);
}

export function unwrapOr<T>(result: OperationResult<T>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

/**
 * Create hints from validation issues
 */
export function hintsFromIssues(issues: readonly PolylineIssue[]): OperationHint[] {
  const kinds = new Set(issues.map((issue) => issue.kind));
  const hints: OperationHint[] = [];

  if (kinds.has(`nonFinite`) || kinds.has(`schema`)) {
    hints.push({
      summary: `Some values are missing or not finite numbers`,
      suggestion: `Check for NaN or Infinity in coordinates, bulges, distance and tolerance`,
    });
  }

  if (kinds.has(`tooFewVertices`)) {
    hints.push({
      summary: `A polyline needs at least two vertices`,
      relatedParameters: [`vertices`],
    });
  }

  if (kinds.has(`zeroLengthArc`)) {
    hints.push({
      summary: `An arc starts and ends at the same point`,
      suggestion: `Split full circles into two arcs with bulge 1`,
      relatedParameters: [`bulge`],
    });
  }

  if (kinds.has(`notClosed`)) {
    hints.push({
      summary: `Boolean operations need closed polylines`,
      suggestion: `Set isClosed on both inputs`,
      relatedParameters: [`isClosed`],
    });
  }

  if (kinds.has(`selfIntersecting`)) {
    hints.push({
      summary: `An input crosses or overlaps itself`,
      suggestion: `Split the outline into simple loops first`,
    });
  }

  return hints;
}
