/**
 * Traversal layer
 *
 * Every walk here is derived from the link structure alone. Walks are lazy
 * and restartable: each `for..of` over the returned iterable starts again from
 * the entity's current start handle. A walk that has not closed after the
 * configured bound throws `CorruptTopology` instead of looping forever.
 */

import type { HalfEdgeMesh } from './HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from './handles.js';
import { MeshInvariantError } from './errors.js';

function restartable<T>(walk: () => Generator<T>): Iterable<T> {
  return { [Symbol.iterator]: walk };
}

/**
 * Follow `next` from `start` until it comes back around
 */
function* cycleFrom<P>(mesh: HalfEdgeMesh<P>, start: HalfEdgeHandle, what: string): Generator<HalfEdgeHandle> {
  const bound = mesh.config.maxFaceDegree;
  let h = start;
  for (let steps = 1; ; steps++) {
    yield h;
    h = mesh.halfEdges.get(h).next;
    if (h === start) return;
    if (steps >= bound) {
      throw new MeshInvariantError(`CorruptTopology`, `${what} did not close within ${bound} half-edges`, {
        start,
      });
    }
  }
}

/**
 * Rotate around the origin of `start` with `next(twin(h))`
 */
function* rotationFrom<P>(mesh: HalfEdgeMesh<P>, start: HalfEdgeHandle): Generator<HalfEdgeHandle> {
  const bound = mesh.config.maxVertexValence;
  let h = start;
  for (let steps = 1; ; steps++) {
    yield h;
    h = mesh.halfEdges.get(mesh.halfEdges.get(h).twin).next;
    if (h === start) return;
    if (steps >= bound) {
      throw new MeshInvariantError(`CorruptTopology`, `vertex rotation did not close within ${bound} half-edges`, {
        start,
      });
    }
  }
}

// ============================================================================
// Face walks
// ============================================================================

/**
 * Half-edges of a face's boundary cycle, starting at the face's half-edge
 */
export function faceBoundary<P>(mesh: HalfEdgeMesh<P>, face: FaceHandle): Iterable<HalfEdgeHandle> {
  mesh.faces.get(face);
  return restartable(() => cycleFrom(mesh, mesh.faces.get(face).halfEdge, `face ${face}`));
}

/**
 * Corner vertices of a face in cycle order
 */
export function faceVertices<P>(mesh: HalfEdgeMesh<P>, face: FaceHandle): Iterable<VertexHandle> {
  const boundary = faceBoundary(mesh, face);
  return restartable(function* () {
    for (const h of boundary) {
      yield mesh.halfEdges.get(h).origin;
    }
  });
}

/**
 * Faces sharing an edge with `face`, each reported once
 */
export function faceNeighbors<P>(mesh: HalfEdgeMesh<P>, face: FaceHandle): Iterable<FaceHandle> {
  const boundary = faceBoundary(mesh, face);
  return restartable(function* () {
    const seen = new Set<FaceHandle>();
    for (const h of boundary) {
      const other = mesh.halfEdges.get(mesh.halfEdges.get(h).twin).face;
      if (other !== null && other !== face && !seen.has(other)) {
        seen.add(other);
        yield other;
      }
    }
  });
}

/**
 * Walk a boundary loop starting from a faceless half-edge
 */
export function boundaryLoop<P>(mesh: HalfEdgeMesh<P>, start: HalfEdgeHandle): Iterable<HalfEdgeHandle> {
  mesh.halfEdges.get(start);
  return restartable(() => cycleFrom(mesh, start, `boundary loop at ${start}`));
}

// ============================================================================
// Vertex walks
// ============================================================================

/**
 * Half-edges leaving a vertex, in rotation order. Empty for an isolated vertex.
 */
export function vertexOutgoingEdges<P>(mesh: HalfEdgeMesh<P>, vertex: VertexHandle): Iterable<HalfEdgeHandle> {
  mesh.vertices.get(vertex);
  return restartable(function* () {
    const start = mesh.vertices.get(vertex).outgoing;
    if (start !== null) {
      yield* rotationFrom(mesh, start);
    }
  });
}

/**
 * Faces around a vertex; boundary gaps are skipped
 */
export function vertexIncidentFaces<P>(mesh: HalfEdgeMesh<P>, vertex: VertexHandle): Iterable<FaceHandle> {
  const outgoing = vertexOutgoingEdges(mesh, vertex);
  return restartable(function* () {
    for (const h of outgoing) {
      const face = mesh.halfEdges.get(h).face;
      if (face !== null) {
        yield face;
      }
    }
  });
}

/**
 * Vertices joined to `vertex` by an edge
 */
export function vertexNeighbors<P>(mesh: HalfEdgeMesh<P>, vertex: VertexHandle): Iterable<VertexHandle> {
  const outgoing = vertexOutgoingEdges(mesh, vertex);
  return restartable(function* () {
    for (const h of outgoing) {
      yield mesh.destination(h);
    }
  });
}

// ============================================================================
// Edge walks
// ============================================================================

/**
 * The two end vertices of an edge, origin first
 */
export function edgeVertices<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): Iterable<VertexHandle> {
  mesh.halfEdges.get(h);
  return restartable(function* () {
    yield mesh.halfEdges.get(h).origin;
    yield mesh.destination(h);
  });
}

/**
 * Half-edges leaving either end of an edge: the rotation around the origin,
 * then the rotation around the destination
 */
export function edgeAdjacentEdges<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): Iterable<HalfEdgeHandle> {
  mesh.halfEdges.get(h);
  return restartable(function* () {
    yield* rotationFrom(mesh, h);
    yield* rotationFrom(mesh, mesh.halfEdges.get(h).twin);
  });
}

/**
 * Faces on either side of an edge, the face of `h` first; open sides are
 * skipped
 */
export function edgeFaces<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): Iterable<FaceHandle> {
  mesh.halfEdges.get(h);
  return restartable(function* () {
    for (const side of [h, mesh.halfEdges.get(h).twin]) {
      const face = mesh.halfEdges.get(side).face;
      if (face !== null) {
        yield face;
      }
    }
  });
}

// ============================================================================
// Whole-mesh walks
// ============================================================================

/**
 * One representative half-edge per undirected edge
 */
export function undirectedEdges<P>(mesh: HalfEdgeMesh<P>): Iterable<HalfEdgeHandle> {
  return restartable(function* () {
    for (const h of mesh.halfEdges.handles()) {
      if (h < mesh.halfEdges.get(h).twin) {
        yield h;
      }
    }
  });
}

/**
 * One faceless half-edge per boundary loop
 */
export function boundaryLoops<P>(mesh: HalfEdgeMesh<P>): Iterable<HalfEdgeHandle> {
  return restartable(function* () {
    const visited = new Set<HalfEdgeHandle>();
    for (const h of mesh.halfEdges.handles()) {
      if (visited.has(h) || mesh.halfEdges.get(h).face !== null) continue;
      for (const loopEdge of cycleFrom(mesh, h, `boundary loop at ${h}`)) {
        visited.add(loopEdge);
      }
      yield h;
    }
  });
}

// ============================================================================
// Queries
// ============================================================================

/**
 * The half-edge running from `from` to `to`, or null if they are not joined
 */
export function findHalfEdge<P>(mesh: HalfEdgeMesh<P>, from: VertexHandle, to: VertexHandle): HalfEdgeHandle | null {
  for (const h of vertexOutgoingEdges(mesh, from)) {
    if (mesh.destination(h) === to) {
      return h;
    }
  }
  return null;
}

export function areFacesAdjacent<P>(mesh: HalfEdgeMesh<P>, a: FaceHandle, b: FaceHandle): boolean {
  for (const neighbor of faceNeighbors(mesh, a)) {
    if (neighbor === b) return true;
  }
  return false;
}

export function countOf<T>(items: Iterable<T>): number {
  let n = 0;
  for (const _ of items) n++;
  return n;
}
