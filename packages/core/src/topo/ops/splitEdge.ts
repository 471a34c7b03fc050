/**
 * Edge split
 *
 * Inserts a vertex `m` on the edge `a -> b`. The existing pair is reused as
 * `a -> m` / `b -> m` and one new pair `m -> b` / `m -> a` is allocated, so
 * each adjacent face gains one corner. With `triangulate`, adjacent triangles
 * are then cut from `m` to their opposite corner.
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { lerpPoint } from '../../num/pointOps.js';
import { countOf, faceBoundary } from '../traverse.js';
import { logDebug } from '../log.js';
import { insertDiagonal, invalidateFace, assertLocalInvariants } from './shared.js';

export interface SplitEdgeOptions {
  /** Cut each adjacent triangle from the new vertex to its opposite corner */
  triangulate?: boolean;
}

export interface SplitEdgeResult {
  /** The inserted vertex */
  vertex: VertexHandle;
  /** New half-edge `m -> b` continuing the split half-edge */
  halfEdge: HalfEdgeHandle;
  /** Faces created by triangulation (empty without it) */
  faces: FaceHandle[];
}

export function splitEdge<P>(
  mesh: HalfEdgeMesh<P>,
  h: HalfEdgeHandle,
  position?: P,
  options: SplitEdgeOptions = {}
): MeshResult<SplitEdgeResult> {
  const he = mesh.halfEdges;
  const hRec = he.get(h);
  const t = hRec.twin;
  const tRec = he.get(t);
  const a = hRec.origin;
  const b = tRec.origin;
  const faceH = hRec.face;
  const faceT = tRec.face;

  if (!mesh.config.allowBoundarySplit && (faceH === null || faceT === null)) {
    logDebug(mesh.config.logLevel, `split`, `rejected boundary edge ${h}`);
    return fail(`BoundaryEdgeUnsupported`, `Edge ${h} lies on the boundary and boundary splits are disabled`, `splitEdge`, {
      halfEdge: h,
    });
  }

  // Opposite-corner half-edges, captured while the faces are still triangles
  const triangulate = options.triangulate ?? false;
  const oppositeH = triangulate && faceH !== null && countOf(faceBoundary(mesh, faceH)) === 3 ? he.get(hRec.next).next : null;
  const oppositeT = triangulate && faceT !== null && countOf(faceBoundary(mesh, faceT)) === 3 ? he.get(tRec.next).next : null;

  const at = position ?? lerpPoint(mesh.ops, mesh.position(a), mesh.position(b), 0.5);
  const m = mesh.vertices.allocate({ position: at, outgoing: null });

  const hNext = hRec.next;
  const tNext = tRec.next;
  const h2 = he.allocateWith(() => ({ origin: m, twin: t, next: hNext, prev: h, face: faceH }));
  const t2 = he.allocateWith(() => ({ origin: m, twin: h, next: tNext, prev: t, face: faceT }));

  hRec.next = h2;
  he.get(hNext).prev = h2;
  tRec.next = t2;
  he.get(tNext).prev = t2;
  hRec.twin = t2;
  tRec.twin = h2;
  mesh.vertices.get(m).outgoing = h2;

  invalidateFace(mesh, faceH);
  invalidateFace(mesh, faceT);

  const created: FaceHandle[] = [];
  const diagonals: HalfEdgeHandle[] = [];
  if (faceH !== null && oppositeH !== null) {
    const cut = insertDiagonal(mesh, faceH, h2, oppositeH);
    created.push(cut.face);
    diagonals.push(cut.halfEdge, he.get(cut.halfEdge).twin);
  }
  if (faceT !== null && oppositeT !== null) {
    const cut = insertDiagonal(mesh, faceT, t2, oppositeT);
    created.push(cut.face);
    diagonals.push(cut.halfEdge, he.get(cut.halfEdge).twin);
  }

  assertLocalInvariants(
    mesh,
    {
      halfEdges: [h, t, h2, t2, hNext, tNext, ...diagonals],
      vertices: [a, b, m],
      faces: [faceH, faceT, ...created].filter((f): f is FaceHandle => f !== null),
    },
    `splitEdge`
  );
  logDebug(mesh.config.logLevel, `split`, `edge ${h} split at vertex ${m}, ${created.length} faces created`);

  return success({ vertex: m, halfEdge: h2, faces: created });
}
