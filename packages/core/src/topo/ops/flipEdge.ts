/**
 * Edge flip
 *
 * For triangles F = (a, b, c) and G = (b, a, d) sharing the edge a-b, the
 * diagonal is replaced by c-d. The two half-edges of the edge are reused, so
 * the returned handle is the one passed in, now running `c -> d`.
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { HalfEdgeHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { countOf, faceBoundary, findHalfEdge } from '../traverse.js';
import { logDebug } from '../log.js';
import { linkNext, invalidateFace, assertLocalInvariants } from './shared.js';

export function flipEdge<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): MeshResult<HalfEdgeHandle> {
  const he = mesh.halfEdges;
  const hRec = he.get(h);
  const t = hRec.twin;
  const tRec = he.get(t);
  const faceF = hRec.face;
  const faceG = tRec.face;
  const level = mesh.config.logLevel;

  if (faceF === null || faceG === null) {
    logDebug(level, `flip`, `rejected boundary edge ${h}`);
    return fail(`FlipRequiresTriangles`, `Edge ${h} lies on the boundary`, `flipEdge`, {
      halfEdge: h,
      reason: `boundary`,
    });
  }
  if (countOf(faceBoundary(mesh, faceF)) !== 3 || countOf(faceBoundary(mesh, faceG)) !== 3) {
    logDebug(level, `flip`, `rejected edge ${h} between non-triangles`);
    return fail(`FlipRequiresTriangles`, `Both faces of edge ${h} must be triangles`, `flipEdge`, {
      halfEdge: h,
      reason: `notTriangle`,
    });
  }

  const h1 = hRec.next;
  const h2 = he.get(h1).next;
  const t1 = tRec.next;
  const t2 = he.get(t1).next;
  const a = hRec.origin;
  const b = tRec.origin;
  const c = he.get(h2).origin;
  const d = he.get(t2).origin;

  if (c === d || findHalfEdge(mesh, c, d) !== null) {
    logDebug(level, `flip`, `rejected edge ${h}: ${c}-${d} already exists`);
    return fail(`FlipWouldDuplicateEdge`, `Flipping edge ${h} would duplicate edge ${c}-${d}`, `flipEdge`, {
      halfEdge: h,
      from: c,
      to: d,
    });
  }

  // F: c->d, d->b, b->c    G: d->c, c->a, a->d
  hRec.origin = c;
  tRec.origin = d;
  linkNext(mesh, h, t2);
  linkNext(mesh, t2, h1);
  linkNext(mesh, h1, h);
  linkNext(mesh, t, h2);
  linkNext(mesh, h2, t1);
  linkNext(mesh, t1, t);
  he.get(t2).face = faceF;
  he.get(h2).face = faceG;
  mesh.faces.get(faceF).halfEdge = h;
  mesh.faces.get(faceG).halfEdge = t;

  mesh.vertices.get(a).outgoing = t1;
  mesh.vertices.get(b).outgoing = h1;

  invalidateFace(mesh, faceF);
  invalidateFace(mesh, faceG);

  assertLocalInvariants(
    mesh,
    { halfEdges: [h, t, h1, h2, t1, t2], vertices: [a, b, c, d], faces: [faceF, faceG] },
    `flipEdge`
  );
  logDebug(level, `flip`, `edge ${h} now runs ${c} -> ${d}`);

  return success(h);
}
