/**
 * Numeric collaborator interface
 *
 * The half-edge mesh is generic over its point type. Everything geometric it
 * does (interpolating a split position, face normals, centroids) goes through
 * a `PointOps<P>` supplied at construction time.
 */

import { type Vec3, add3, sub3, mul3, dot3, cross3 } from './vec3.js';

export interface PointOps<P> {
  add(a: P, b: P): P;
  sub(a: P, b: P): P;
  scale(v: P, s: number): P;
  dot(a: P, b: P): number;
  cross(a: P, b: P): P;
}

/**
 * Default collaborator over `[x, y, z]` tuples
 */
export const VEC3_OPS: PointOps<Vec3> = {
  add: add3,
  sub: sub3,
  scale: mul3,
  dot: dot3,
  cross: cross3,
};

// Helpers composed only from the interface

export function lerpPoint<P>(ops: PointOps<P>, a: P, b: P, t: number): P {
  return ops.add(a, ops.scale(ops.sub(b, a), t));
}

export function lengthOf<P>(ops: PointOps<P>, v: P): number {
  return Math.sqrt(ops.dot(v, v));
}

/**
 * Average of a non-empty list of points
 */
export function averagePoint<P>(ops: PointOps<P>, points: readonly P[]): P {
  if (points.length === 0) {
    throw new Error('Cannot average an empty point list');
  }
  let sum = points[0];
  for (let i = 1; i < points.length; i++) {
    sum = ops.add(sum, points[i]);
  }
  return ops.scale(sum, 1 / points.length);
}
