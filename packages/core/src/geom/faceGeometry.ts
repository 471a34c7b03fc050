/**
 * Face geometry
 *
 * Normal, centroid and area of a polygonal face, plus point-vs-face queries.
 * The normal is the normalized sum of `p_i x p_(i+1)` over the boundary
 * (Newell's method), so it is well defined for non-planar and non-convex
 * polygons and its length is twice the area.
 */

import type { Vec3 } from '../num/vec3.js';
import { type PointOps, averagePoint, lengthOf } from '../num/pointOps.js';
import { isNegligibleArea, withinAngle } from '../num/tolerance.js';
import { orient3D, classifyPointPlane, type PlaneClassification } from '../num/predicates.js';
import type { HalfEdgeMesh } from '../topo/HalfEdgeMesh.js';
import type { FaceHandle, HalfEdgeHandle } from '../topo/handles.js';
import type { FaceAttributes } from '../topo/types.js';
import { faceVertices } from '../topo/traverse.js';

function cornerPositions<P>(mesh: HalfEdgeMesh<P>, f: FaceHandle): P[] {
  const positions: P[] = [];
  for (const v of faceVertices(mesh, f)) {
    positions.push(mesh.position(v));
  }
  return positions;
}

function areaVector<P>(ops: PointOps<P>, points: readonly P[]): P {
  let sum = ops.cross(points[points.length - 1], points[0]);
  for (let i = 0; i + 1 < points.length; i++) {
    sum = ops.add(sum, ops.cross(points[i], points[i + 1]));
  }
  return sum;
}

/**
 * Compute attributes from scratch. `mesh.faceAttributes` caches the result.
 */
export function computeFaceAttributes<P>(mesh: HalfEdgeMesh<P>, f: FaceHandle): FaceAttributes<P> {
  const { ops } = mesh;
  const points = cornerPositions(mesh, f);
  const sum = areaVector(ops, points);
  const twiceArea = lengthOf(ops, sum);
  const degenerate = isNegligibleArea(twiceArea / 2, mesh.config.ctx);

  return {
    normal: ops.scale(sum, degenerate ? 0 : 1 / twiceArea),
    centroid: averagePoint(ops, points),
    area: twiceArea / 2,
  };
}

/**
 * Signed distance from the face's plane (through its centroid) to `point`;
 * positive on the side the normal points to
 */
export function distanceToFace<P>(mesh: HalfEdgeMesh<P>, f: FaceHandle, point: P): number {
  const { normal, centroid } = mesh.faceAttributes(f);
  return mesh.ops.dot(mesh.ops.sub(point, centroid), normal);
}

/**
 * Which side of a face a point lies on. Triangles use the exact orientation
 * predicate; larger faces compare against the plane through the centroid.
 */
export function classifyPointToFace(mesh: HalfEdgeMesh<Vec3>, f: FaceHandle, point: Vec3): PlaneClassification {
  const points = cornerPositions(mesh, f);
  const ctx = mesh.config.ctx;

  if (points.length === 3) {
    const sign = orient3D(points[0], points[1], points[2], point, ctx);
    return sign > 0 ? 'above' : sign < 0 ? 'below' : 'on';
  }

  const { normal, centroid } = mesh.faceAttributes(f);
  return classifyPointPlane(point, centroid, normal, ctx);
}

/**
 * True when `point` is strictly in front of the face
 */
export function canFaceSee(mesh: HalfEdgeMesh<Vec3>, f: FaceHandle, point: Vec3): boolean {
  return classifyPointToFace(mesh, f, point) === 'above';
}

/**
 * Angle in radians between the normals of the two faces at an edge, 0 where
 * they are coplanar; null on the boundary
 */
export function dihedralAngle<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): number | null {
  const f = mesh.face(h);
  const g = mesh.face(mesh.twin(h));
  if (f === null || g === null) return null;

  const { ops } = mesh;
  const n1 = mesh.faceNormal(f);
  const n2 = mesh.faceNormal(g);
  return Math.atan2(lengthOf(ops, ops.cross(n1, n2)), ops.dot(n1, n2));
}

/**
 * True for an interior edge whose faces bend by no more than the angle tolerance
 */
export function isFlatEdge<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): boolean {
  const angle = dihedralAngle(mesh, h);
  return angle !== null && withinAngle(angle, mesh.config.ctx);
}
