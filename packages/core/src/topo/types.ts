/**
 * Entity records stored in the mesh arenas
 *
 * All links are handles; none of them own anything. The mesh owns every
 * record through its three stores.
 */

import type { VertexHandle, HalfEdgeHandle, FaceHandle } from './handles.js';

export interface VertexRecord<P> {
  position: P;
  /** Any half-edge leaving this vertex; null only while the vertex is isolated */
  outgoing: HalfEdgeHandle | null;
}

export interface HalfEdgeRecord {
  origin: VertexHandle;
  twin: HalfEdgeHandle;
  next: HalfEdgeHandle;
  prev: HalfEdgeHandle;
  /** Face on the left of this half-edge; null on the open boundary */
  face: FaceHandle | null;
}

/**
 * Geometric attributes of a face, computed through the numeric collaborator
 */
export interface FaceAttributes<P> {
  /** Unit normal (zero vector for a degenerate face) */
  normal: P;
  centroid: P;
  area: number;
}

export interface FaceRecord<P> {
  /** One half-edge of the boundary cycle */
  halfEdge: HalfEdgeHandle;
  /** Cached attributes; cleared whenever the face or one of its vertices changes */
  attributes: FaceAttributes<P> | null;
}

/**
 * Vertex positions plus per-face vertex index lists, with no adjacency
 */
export interface PolygonSoup<P> {
  positions: P[];
  faces: number[][];
}

export interface MeshStats {
  vertices: number;
  halfEdges: number;
  edges: number;
  faces: number;
  boundaryLoops: number;
}
