/**
 * @meshweave/core - half-edge mesh kernel
 *
 * ## Primary API
 * - buildMesh / buildMeshWith: resolve polygon soup into a HalfEdgeMesh
 * - HalfEdgeMesh: adjacency queries, walks and editing operators
 * - VertexHandle, HalfEdgeHandle, FaceHandle: Opaque handles for mesh entities
 *
 * ## Supporting modules
 * - num: vectors, tolerances, predicates and the PointOps collaborator
 * - geom: face normals, centroids, point-vs-face queries
 * - io: polygon soup schemas
 * - model: primitive meshes
 */

// Topology
export * from './topo/index.js';

// Numeric types and utilities
export { vec3, type Vec3, ZERO3, add3, sub3, mul3, dot3, cross3, length3, normalize3, lerp3, dist3 } from './num/vec3.js';
export { type PointOps, VEC3_OPS, lerpPoint, lengthOf, averagePoint } from './num/pointOps.js';
export {
  type NumericContext,
  type Tolerances,
  DEFAULT_TOLERANCES,
  createNumericContext,
  isZero,
  eqLength,
  isNegligibleArea,
  withinAngle,
} from './num/tolerance.js';
export { orient3D, orient3DRobust, classifyPointPlane, type PlaneClassification } from './num/predicates.js';

// Geometry
export {
  computeFaceAttributes,
  distanceToFace,
  classifyPointToFace,
  canFaceSee,
  dihedralAngle,
  isFlatEdge,
} from './geom/faceGeometry.js';

// Soup input
export { parsePolygonSoup, polygonSoupSchema, vec3Schema, faceIndicesSchema, type PolygonSoupInput } from './io/soup.js';

// Primitives
export {
  createTetrahedron,
  createOctahedron,
  createCube,
  createGrid,
  type PrimitiveOptions,
  type GridOptions,
} from './model/primitives.js';
