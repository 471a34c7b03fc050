/**
 * Mesh error types
 *
 * Construction and editing operations return `MeshResult<T>`, a discriminated
 * union, so callers handle failure explicitly. Input and topology-safety
 * failures are ordinary results; the mesh is left untouched when they occur.
 *
 * Internal consistency failures (a stale handle, a cycle that never closes)
 * are not results: they are thrown as `MeshInvariantError`, because they mean
 * a link was mis-maintained somewhere, not that the caller asked for
 * something unsupported.
 */

// ============================================================================
// Operation Types
// ============================================================================

export type MeshOperation =
  | `build`
  | `parse`
  | `splitEdge`
  | `collapseEdge`
  | `flipEdge`
  | `deleteFace`
  | `deleteVertex`
  | `pokeFace`
  | `splitFace`
  | `attachPoint`
  | `traverse`;

// ============================================================================
// Error Kinds
// ============================================================================

/**
 * Errors detected while resolving polygon soup
 */
export type InputErrorKind =
  | `NonManifoldEdge`
  | `NonManifoldVertex`
  | `DegenerateFace`
  | `UnresolvedBoundary`
  | `InvalidVertexIndex`
  | `InvalidSoup`;

/**
 * Errors detected by an operator before it rewrites any link
 */
export type TopologyErrorKind =
  | `CollapseWouldCreateNonManifold`
  | `FlipRequiresTriangles`
  | `FlipWouldDuplicateEdge`
  | `BoundaryEdgeUnsupported`
  | `VertexStillReferenced`
  | `InvalidFaceSplit`
  | `DeleteWouldCreateNonManifold`
  | `InvalidAttachRegion`;

/**
 * Errors that indicate a bug in link maintenance or a stale handle
 */
export type InternalErrorKind = `DanglingHandle` | `CorruptTopology`;

export type MeshErrorKind = InputErrorKind | TopologyErrorKind;

export type MeshErrorCategory = `input` | `topology`;

const INPUT_KINDS: ReadonlySet<MeshErrorKind> = new Set<MeshErrorKind>([
  `NonManifoldEdge`,
  `NonManifoldVertex`,
  `DegenerateFace`,
  `UnresolvedBoundary`,
  `InvalidVertexIndex`,
  `InvalidSoup`,
]);

export interface MeshError {
  kind: MeshErrorKind;
  category: MeshErrorCategory;
  /** Human-readable error message */
  message: string;
  operation: MeshOperation;
  /** Handles, indices and reasons useful for debugging */
  details?: Record<string, unknown>;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of a mesh operation
 *
 * ```ts
 * const result = buildMesh(positions, faces);
 * if (result.ok) {
 *   const mesh = result.value;
 * } else {
 *   console.error(result.error.kind, result.error.message);
 * }
 * ```
 */
export type MeshResult<T> = { ok: true; value: T } | { ok: false; error: MeshError };

export function success<T>(value: T): MeshResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: MeshError): MeshResult<T> {
  return { ok: false, error };
}

export function createMeshError(
  kind: MeshErrorKind,
  message: string,
  operation: MeshOperation,
  details?: Record<string, unknown>
): MeshError {
  return {
    kind,
    category: INPUT_KINDS.has(kind) ? `input` : `topology`,
    message,
    operation,
    ...(details ? { details } : {}),
  };
}

/**
 * Shorthand for `failure(createMeshError(...))`
 */
export function fail<T>(
  kind: MeshErrorKind,
  message: string,
  operation: MeshOperation,
  details?: Record<string, unknown>
): MeshResult<T> {
  return failure(createMeshError(kind, message, operation, details));
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isSuccess<T>(result: MeshResult<T>): result is { ok: true; value: T } {
  return result.ok;
}

export function isFailure<T>(result: MeshResult<T>): result is { ok: false; error: MeshError } {
  return !result.ok;
}

export function mapResult<T, U>(result: MeshResult<T>, fn: (value: T) => U): MeshResult<U> {
  if (result.ok) {
    return { ok: true, value: fn(result.value) };
  }
  return result;
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapResult<T>(result: MeshResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Mesh operation ${result.error.operation} failed (${result.error.kind}): ${result.error.message}`);
}

export function unwrapOr<T>(result: MeshResult<T>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

// ============================================================================
// Internal consistency errors
// ============================================================================

export class MeshInvariantError extends Error {
  readonly kind: InternalErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: InternalErrorKind, message: string, details?: Record<string, unknown>) {
    super(`${kind}: ${message}`);
    this.name = `MeshInvariantError`;
    this.kind = kind;
    this.details = details;
  }
}

export function isMeshInvariantError(err: unknown): err is MeshInvariantError {
  return err instanceof MeshInvariantError;
}
