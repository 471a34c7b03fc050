/**
 * Link-rewriting helpers shared by the mutation operators
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { MeshInvariantError } from '../errors.js';
import { faceBoundary, vertexIncidentFaces } from '../traverse.js';

/**
 * Make `b` follow `a`
 */
export function linkNext<P>(mesh: HalfEdgeMesh<P>, a: HalfEdgeHandle, b: HalfEdgeHandle): void {
  mesh.halfEdges.get(a).next = b;
  mesh.halfEdges.get(b).prev = a;
}

export function setTwins<P>(mesh: HalfEdgeMesh<P>, a: HalfEdgeHandle, b: HalfEdgeHandle): void {
  mesh.halfEdges.get(a).twin = b;
  mesh.halfEdges.get(b).twin = a;
}

/**
 * Allocate a twin pair `from -> to`, `to -> from`. Both start faceless with
 * self-referential `next`/`prev`; the caller links them in.
 */
export function allocateEdgePair<P>(
  mesh: HalfEdgeMesh<P>,
  from: VertexHandle,
  to: VertexHandle
): [HalfEdgeHandle, HalfEdgeHandle] {
  const forward = mesh.halfEdges.allocateWith((h) => ({ origin: from, twin: h, next: h, prev: h, face: null }));
  const backward = mesh.halfEdges.allocateWith((h) => ({ origin: to, twin: forward, next: h, prev: h, face: null }));
  mesh.halfEdges.get(forward).twin = backward;
  return [forward, backward];
}

export function invalidateFace<P>(mesh: HalfEdgeMesh<P>, face: FaceHandle | null): void {
  if (face === null) return;
  const record = mesh.faces.tryGet(face);
  if (record) {
    record.attributes = null;
  }
}

export function invalidateAroundVertex<P>(mesh: HalfEdgeMesh<P>, v: VertexHandle): void {
  for (const f of vertexIncidentFaces(mesh, v)) {
    invalidateFace(mesh, f);
  }
}

/**
 * Connect the origins of `hu` and `hv` (both on `face`) with a new edge.
 *
 * The new half-edge `u -> v` starts a new face made of `hv` up to the
 * half-edge before `hu`; its twin `v -> u` stays in `face` ahead of `hu`.
 * Preconditions are the caller's job.
 */
export function insertDiagonal<P>(
  mesh: HalfEdgeMesh<P>,
  face: FaceHandle,
  hu: HalfEdgeHandle,
  hv: HalfEdgeHandle
): { halfEdge: HalfEdgeHandle; face: FaceHandle } {
  const he = mesh.halfEdges;
  const u = he.get(hu).origin;
  const v = he.get(hv).origin;
  const beforeU = he.get(hu).prev;
  const beforeV = he.get(hv).prev;

  const [d, e] = allocateEdgePair(mesh, u, v);
  const created = mesh.faces.allocate({ halfEdge: d, attributes: null });

  linkNext(mesh, beforeU, d);
  linkNext(mesh, d, hv);
  linkNext(mesh, beforeV, e);
  linkNext(mesh, e, hu);

  for (const h of faceBoundary(mesh, created)) {
    he.get(h).face = created;
  }
  he.get(e).face = face;

  const record = mesh.faces.get(face);
  record.halfEdge = hu;
  record.attributes = null;

  return { halfEdge: d, face: created };
}

export interface LocalRegion {
  halfEdges?: Iterable<HalfEdgeHandle>;
  vertices?: Iterable<VertexHandle>;
  faces?: Iterable<FaceHandle>;
}

/**
 * Re-check link invariants around an edited region
 *
 * @throws MeshInvariantError (`CorruptTopology`) on the first violation
 */
export function assertLocalInvariants<P>(mesh: HalfEdgeMesh<P>, region: LocalRegion, operation: string): void {
  const he = mesh.halfEdges;
  const corrupt = (message: string, details: Record<string, unknown>): never => {
    throw new MeshInvariantError(`CorruptTopology`, `after ${operation}: ${message}`, details);
  };

  for (const h of region.halfEdges ?? []) {
    const record = he.get(h);
    if (record.twin === h) corrupt(`half-edge is its own twin`, { halfEdge: h });
    const twin = he.get(record.twin);
    if (twin.twin !== h) corrupt(`twin link is not symmetric`, { halfEdge: h, twin: record.twin });
    const next = he.get(record.next);
    if (next.prev !== h) corrupt(`prev(next(h)) != h`, { halfEdge: h });
    if (he.get(record.prev).next !== h) corrupt(`next(prev(h)) != h`, { halfEdge: h });
    if (twin.origin !== next.origin) corrupt(`origin(twin(h)) != destination(h)`, { halfEdge: h });
    if (next.face !== record.face) corrupt(`next(h) lies on a different face`, { halfEdge: h });
    if (record.face !== null) mesh.faces.get(record.face);
  }

  for (const v of region.vertices ?? []) {
    const outgoing = mesh.vertices.get(v).outgoing;
    if (outgoing !== null && he.get(outgoing).origin !== v) {
      corrupt(`outgoing half-edge does not start at the vertex`, { vertex: v, outgoing });
    }
  }

  for (const f of region.faces ?? []) {
    for (const h of faceBoundary(mesh, f)) {
      if (he.get(h).face !== f) corrupt(`face cycle contains a half-edge of another face`, { face: f, halfEdge: h });
    }
  }
}
