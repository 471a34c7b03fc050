/**
 * Geometric predicates
 *
 * Orientation tests use Shewchuk-style adaptive precision predicates from
 * mourner/robust-predicates, so near-coplanar configurations classify
 * consistently.
 */

import { orient3d as robustOrient3d } from 'robust-predicates';
import type { Vec3 } from './vec3.js';
import type { NumericContext } from './tolerance.js';
import { cross3, dot3, sub3 } from './vec3.js';
import { isZero } from './tolerance.js';

/**
 * Exact sign of the 3D orientation determinant:
 * - positive: d is above the plane through a, b, c (counter-clockwise side)
 * - negative: d is below it
 * - zero: coplanar
 *
 * robust-predicates uses the opposite sign convention, so the result is negated.
 */
export function orient3DRobust(a: Vec3, b: Vec3, c: Vec3, d: Vec3): number {
  return -robustOrient3d(
    a[0], a[1], a[2],
    b[0], b[1], b[2],
    c[0], c[1], c[2],
    d[0], d[1], d[2]
  );
}

/**
 * Tolerance-aware 3D orientation, returning -1, 0 or 1
 */
export function orient3D(a: Vec3, b: Vec3, c: Vec3, d: Vec3, ctx: NumericContext): -1 | 0 | 1 {
  const result = orient3DRobust(a, b, c, d);

  // The determinant is proportional to (base area * height); scale the
  // length tolerance by the base area.
  const n = cross3(sub3(b, a), sub3(c, a));
  const areaScale = Math.sqrt(dot3(n, n));
  if (Math.abs(result) <= ctx.tol.length * areaScale) {
    return 0;
  }
  return result > 0 ? 1 : -1;
}

export type PlaneClassification = 'on' | 'above' | 'below';

/**
 * Classify a point against a plane given by origin and (unit) normal
 */
export function classifyPointPlane(
  point: Vec3,
  planeOrigin: Vec3,
  planeNormal: Vec3,
  ctx: NumericContext
): PlaneClassification {
  const distance = dot3(sub3(point, planeOrigin), planeNormal);
  if (isZero(distance, ctx)) {
    return 'on';
  }
  return distance > 0 ? 'above' : 'below';
}
