/**
 * HalfEdgeMesh - the mesh aggregate
 *
 * Owns the vertex, half-edge and face stores. Entities refer to each other
 * only through handles resolved against these stores. The class exposes O(1)
 * link accessors, delegates walks to the traversal layer and edits to the
 * operators in `./ops`, and caches per-face geometric attributes.
 *
 * Meshes are normally created through `buildMesh` / `buildMeshWith`, which
 * resolve polygon soup into a consistent link structure.
 */

import type { Vec3 } from '../num/vec3.js';
import type { PointOps } from '../num/pointOps.js';
import {
  type VertexHandle,
  type HalfEdgeHandle,
  type FaceHandle,
  asVertexHandle,
  asHalfEdgeHandle,
  asFaceHandle,
} from './handles.js';
import type { VertexRecord, HalfEdgeRecord, FaceRecord, FaceAttributes, PolygonSoup, MeshStats } from './types.js';
import type { MeshConfig } from './config.js';
import type { MeshResult } from './errors.js';
import { EntityStore } from './EntityStore.js';
import {
  faceBoundary,
  faceVertices,
  faceNeighbors,
  boundaryLoop,
  boundaryLoops,
  vertexOutgoingEdges,
  vertexIncidentFaces,
  vertexNeighbors,
  undirectedEdges,
  findHalfEdge,
  areFacesAdjacent,
  edgeVertices,
  edgeAdjacentEdges,
  edgeFaces,
  countOf,
} from './traverse.js';
import { splitEdge, type SplitEdgeOptions, type SplitEdgeResult } from './ops/splitEdge.js';
import { collapseEdge, type CollapseEdgeResult } from './ops/collapseEdge.js';
import { flipEdge } from './ops/flipEdge.js';
import { deleteFace, type DeleteFaceResult } from './ops/deleteFace.js';
import { deleteVertex } from './ops/deleteVertex.js';
import { pokeFace, type PokeFaceResult } from './ops/pokeFace.js';
import { splitFace, type SplitFaceResult } from './ops/splitFace.js';
import { attachPointToFaces } from './ops/attachPoint.js';
import { invalidateAroundVertex } from './ops/shared.js';
import { validateMesh, type ValidationReport } from './validate.js';
import { computeFaceAttributes } from '../geom/faceGeometry.js';

export class HalfEdgeMesh<P = Vec3> {
  readonly vertices = new EntityStore<VertexHandle, VertexRecord<P>>(`vertex`, asVertexHandle);
  readonly halfEdges = new EntityStore<HalfEdgeHandle, HalfEdgeRecord>(`halfEdge`, asHalfEdgeHandle);
  readonly faces = new EntityStore<FaceHandle, FaceRecord<P>>(`face`, asFaceHandle);

  constructor(
    readonly ops: PointOps<P>,
    readonly config: MeshConfig
  ) {}

  // ==========================================================================
  // Link accessors
  // ==========================================================================

  origin(h: HalfEdgeHandle): VertexHandle {
    return this.halfEdges.get(h).origin;
  }

  destination(h: HalfEdgeHandle): VertexHandle {
    return this.halfEdges.get(this.halfEdges.get(h).twin).origin;
  }

  twin(h: HalfEdgeHandle): HalfEdgeHandle {
    return this.halfEdges.get(h).twin;
  }

  next(h: HalfEdgeHandle): HalfEdgeHandle {
    return this.halfEdges.get(h).next;
  }

  prev(h: HalfEdgeHandle): HalfEdgeHandle {
    return this.halfEdges.get(h).prev;
  }

  /** Face on the left of `h`, or null for a boundary half-edge */
  face(h: HalfEdgeHandle): FaceHandle | null {
    return this.halfEdges.get(h).face;
  }

  isBoundaryHalfEdge(h: HalfEdgeHandle): boolean {
    return this.halfEdges.get(h).face === null;
  }

  /** True if either side of the edge is open */
  isBoundaryEdge(h: HalfEdgeHandle): boolean {
    return this.isBoundaryHalfEdge(h) || this.isBoundaryHalfEdge(this.twin(h));
  }

  outgoing(v: VertexHandle): HalfEdgeHandle | null {
    return this.vertices.get(v).outgoing;
  }

  halfEdgeOf(f: FaceHandle): HalfEdgeHandle {
    return this.faces.get(f).halfEdge;
  }

  position(v: VertexHandle): P {
    return this.vertices.get(v).position;
  }

  /**
   * Move a vertex. Cached attributes of the faces around it are dropped.
   */
  setPosition(v: VertexHandle, position: P): void {
    this.vertices.get(v).position = position;
    invalidateAroundVertex(this, v);
  }

  /**
   * Add a vertex with no incident edges
   */
  addVertex(position: P): VertexHandle {
    return this.vertices.allocate({ position, outgoing: null });
  }

  // ==========================================================================
  // Counts
  // ==========================================================================

  get vertexCount(): number {
    return this.vertices.liveCount;
  }

  get halfEdgeCount(): number {
    return this.halfEdges.liveCount;
  }

  get edgeCount(): number {
    return this.halfEdges.liveCount / 2;
  }

  get faceCount(): number {
    return this.faces.liveCount;
  }

  /** V - E + F */
  eulerCharacteristic(): number {
    return this.vertexCount - this.edgeCount + this.faceCount;
  }

  /** True when no half-edge lies on an open boundary */
  isClosed(): boolean {
    for (const h of this.halfEdges.handles()) {
      if (this.halfEdges.get(h).face === null) return false;
    }
    return true;
  }

  stats(): MeshStats {
    return {
      vertices: this.vertexCount,
      halfEdges: this.halfEdgeCount,
      edges: this.edgeCount,
      faces: this.faceCount,
      boundaryLoops: countOf(boundaryLoops(this)),
    };
  }

  vertexHandles(): Iterable<VertexHandle> {
    return { [Symbol.iterator]: () => this.vertices.handles() };
  }

  halfEdgeHandles(): Iterable<HalfEdgeHandle> {
    return { [Symbol.iterator]: () => this.halfEdges.handles() };
  }

  faceHandles(): Iterable<FaceHandle> {
    return { [Symbol.iterator]: () => this.faces.handles() };
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  faceBoundary(f: FaceHandle): Iterable<HalfEdgeHandle> {
    return faceBoundary(this, f);
  }

  faceVertices(f: FaceHandle): Iterable<VertexHandle> {
    return faceVertices(this, f);
  }

  faceNeighbors(f: FaceHandle): Iterable<FaceHandle> {
    return faceNeighbors(this, f);
  }

  faceDegree(f: FaceHandle): number {
    return countOf(faceBoundary(this, f));
  }

  vertexOutgoingEdges(v: VertexHandle): Iterable<HalfEdgeHandle> {
    return vertexOutgoingEdges(this, v);
  }

  vertexIncidentFaces(v: VertexHandle): Iterable<FaceHandle> {
    return vertexIncidentFaces(this, v);
  }

  vertexNeighbors(v: VertexHandle): Iterable<VertexHandle> {
    return vertexNeighbors(this, v);
  }

  vertexValence(v: VertexHandle): number {
    return countOf(vertexOutgoingEdges(this, v));
  }

  isBoundaryVertex(v: VertexHandle): boolean {
    for (const h of vertexOutgoingEdges(this, v)) {
      if (this.halfEdges.get(h).face === null) return true;
    }
    return false;
  }

  isIsolatedVertex(v: VertexHandle): boolean {
    return this.vertices.get(v).outgoing === null;
  }

  boundaryLoop(h: HalfEdgeHandle): Iterable<HalfEdgeHandle> {
    return boundaryLoop(this, h);
  }

  boundaryLoops(): Iterable<HalfEdgeHandle> {
    return boundaryLoops(this);
  }

  undirectedEdges(): Iterable<HalfEdgeHandle> {
    return undirectedEdges(this);
  }

  edgeVertices(h: HalfEdgeHandle): Iterable<VertexHandle> {
    return edgeVertices(this, h);
  }

  edgeAdjacentEdges(h: HalfEdgeHandle): Iterable<HalfEdgeHandle> {
    return edgeAdjacentEdges(this, h);
  }

  edgeFaces(h: HalfEdgeHandle): Iterable<FaceHandle> {
    return edgeFaces(this, h);
  }

  findHalfEdge(from: VertexHandle, to: VertexHandle): HalfEdgeHandle | null {
    return findHalfEdge(this, from, to);
  }

  areFacesAdjacent(a: FaceHandle, b: FaceHandle): boolean {
    return areFacesAdjacent(this, a, b);
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  splitEdge(h: HalfEdgeHandle, position?: P, options?: SplitEdgeOptions): MeshResult<SplitEdgeResult> {
    return splitEdge(this, h, position, options);
  }

  collapseEdge(h: HalfEdgeHandle, position?: P): MeshResult<CollapseEdgeResult> {
    return collapseEdge(this, h, position);
  }

  flipEdge(h: HalfEdgeHandle): MeshResult<HalfEdgeHandle> {
    return flipEdge(this, h);
  }

  deleteFace(f: FaceHandle): MeshResult<DeleteFaceResult> {
    return deleteFace(this, f);
  }

  deleteVertex(v: VertexHandle): MeshResult<void> {
    return deleteVertex(this, v);
  }

  pokeFace(f: FaceHandle, position?: P): MeshResult<PokeFaceResult> {
    return pokeFace(this, f, position);
  }

  splitFace(f: FaceHandle, u: VertexHandle, v: VertexHandle): MeshResult<SplitFaceResult> {
    return splitFace(this, f, u, v);
  }

  attachPointToFaces(faces: readonly FaceHandle[], position: P): MeshResult<FaceHandle[]> {
    return attachPointToFaces(this, faces, position);
  }

  // ==========================================================================
  // Geometry
  // ==========================================================================

  /**
   * Normal, centroid and area of a face, computed on first use and cached
   * until the face or one of its vertices changes
   */
  faceAttributes(f: FaceHandle): FaceAttributes<P> {
    const record = this.faces.get(f);
    if (record.attributes === null) {
      record.attributes = computeFaceAttributes(this, f);
    }
    return record.attributes;
  }

  faceNormal(f: FaceHandle): P {
    return this.faceAttributes(f).normal;
  }

  faceCentroid(f: FaceHandle): P {
    return this.faceAttributes(f).centroid;
  }

  faceArea(f: FaceHandle): number {
    return this.faceAttributes(f).area;
  }

  // ==========================================================================
  // Export / checks
  // ==========================================================================

  /**
   * Flatten to polygon soup: live vertices in slot order, each face listed
   * from its boundary half-edge
   */
  toPolygonSoup(): PolygonSoup<P> {
    const index = new Map<VertexHandle, number>();
    const positions: P[] = [];
    for (const v of this.vertices.handles()) {
      index.set(v, positions.length);
      positions.push(this.vertices.get(v).position);
    }

    const faces: number[][] = [];
    for (const f of this.faces.handles()) {
      const corners: number[] = [];
      for (const v of faceVertices(this, f)) {
        const i = index.get(v);
        if (i === undefined) {
          throw new Error(`Face ${f} references vertex ${v} that is not live`);
        }
        corners.push(i);
      }
      faces.push(corners);
    }

    return { positions, faces };
  }

  validate(): ValidationReport {
    return validateMesh(this);
  }
}
