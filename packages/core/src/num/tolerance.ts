/**
 * Tolerance model and numeric context
 *
 * Geometric comparisons made by the mesh (zero-area faces, coplanar points)
 * go through these helpers rather than raw comparisons.
 */

/**
 * Tolerance values for a mesh
 */
export interface Tolerances {
  /** Model-space length tolerance (absolute distance) */
  length: number;
  /** Angle tolerance in radians */
  angle: number;
}

export interface NumericContext {
  tol: Tolerances;
}

export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-7,
  angle: 1e-8,
};

/**
 * Create a numeric context, filling unspecified tolerances with defaults
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
      angle: tol?.angle ?? DEFAULT_TOLERANCES.angle,
    },
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

export function eqLength(a: number, b: number, ctx: NumericContext): boolean {
  return Math.abs(a - b) <= ctx.tol.length;
}

/**
 * Areas up to the square of the length tolerance count as zero
 */
export function isNegligibleArea(area: number, ctx: NumericContext): boolean {
  return Math.abs(area) <= ctx.tol.length * ctx.tol.length;
}

export function withinAngle(angle: number, ctx: NumericContext): boolean {
  return Math.abs(angle) <= ctx.tol.angle;
}
