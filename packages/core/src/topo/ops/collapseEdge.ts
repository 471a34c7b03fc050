/**
 * Edge collapse
 *
 * Merges `destination(h)` into `origin(h)`. The surviving vertex moves to
 * `position` (midpoint by default). Each adjacent triangle degenerates and is
 * removed, its two remaining sides fused by pairing their outer twins; an
 * adjacent polygon of higher degree just loses a corner.
 *
 * Before any link changes the link condition is checked: the two vertices may
 * share no neighbour other than the opposite corners of their adjacent
 * triangles, plus the boundary rules below. Any failure leaves the mesh
 * untouched.
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { lerpPoint } from '../../num/pointOps.js';
import { countOf, faceBoundary, faceVertices, vertexIncidentFaces, vertexNeighbors, vertexOutgoingEdges } from '../traverse.js';
import { logDebug } from '../log.js';
import { linkNext, setTwins, invalidateAroundVertex, assertLocalInvariants } from './shared.js';

export interface CollapseEdgeResult {
  /** The surviving vertex (origin of the collapsed half-edge) */
  vertex: VertexHandle;
  /** The vertex merged away; its handle no longer resolves */
  removedVertex: VertexHandle;
  /** Triangles deleted because they degenerated */
  removedFaces: FaceHandle[];
}

/** One side of the collapsing edge */
interface Side {
  halfEdge: HalfEdgeHandle;
  face: FaceHandle | null;
  /** Corner opposite the edge, when the face is a triangle */
  opposite: VertexHandle | null;
}

function describeSide<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): Side {
  const face = mesh.halfEdges.get(h).face;
  if (face === null || countOf(faceBoundary(mesh, face)) !== 3) {
    return { halfEdge: h, face, opposite: null };
  }
  return { halfEdge: h, face, opposite: mesh.halfEdges.get(mesh.halfEdges.get(h).prev).origin };
}

function hasFaceWith<P>(mesh: HalfEdgeMesh<P>, v: VertexHandle, c: VertexHandle, d: VertexHandle): boolean {
  for (const f of vertexIncidentFaces(mesh, v)) {
    const corners = [...faceVertices(mesh, f)];
    if (corners.includes(c) && corners.includes(d)) return true;
  }
  return false;
}

/**
 * Reason the collapse would break manifoldness, or null if it is safe
 */
function linkConditionViolation<P>(
  mesh: HalfEdgeMesh<P>,
  a: VertexHandle,
  b: VertexHandle,
  sides: [Side, Side]
): string | null {
  const he = mesh.halfEdges;
  const opposites = new Set<VertexHandle>();
  for (const side of sides) {
    if (side.opposite !== null) opposites.add(side.opposite);
  }

  if (sides[0].opposite !== null && sides[0].opposite === sides[1].opposite) {
    return `sharedOppositeVertex`;
  }

  const aNeighbors = new Set(vertexNeighbors(mesh, a));
  const common: VertexHandle[] = [];
  for (const n of vertexNeighbors(mesh, b)) {
    if (aNeighbors.has(n)) common.push(n);
  }
  if (common.length !== opposites.size || common.some((n) => !opposites.has(n))) {
    return `commonNeighbors`;
  }

  const interior = sides[0].face !== null && sides[1].face !== null;
  if (interior && mesh.isBoundaryVertex(a) && mesh.isBoundaryVertex(b)) {
    return `boundaryVerticesInteriorEdge`;
  }

  for (const f of vertexIncidentFaces(mesh, a)) {
    if (f === sides[0].face || f === sides[1].face) continue;
    for (const corner of faceVertices(mesh, f)) {
      if (corner === b) return `thirdFace`;
    }
  }

  // Faces (a, c, d) and (b, c, d) would fold onto each other
  const [c, d] = [sides[0].opposite, sides[1].opposite];
  if (c !== null && d !== null && hasFaceWith(mesh, a, c, d) && hasFaceWith(mesh, b, c, d)) {
    return `oppositeEdgeInBothLinks`;
  }

  for (const side of sides) {
    if (side.opposite === null) continue;
    const next = he.get(side.halfEdge).next;
    const prev = he.get(side.halfEdge).prev;
    if (he.get(he.get(next).twin).face === null && he.get(he.get(prev).twin).face === null) {
      return `wouldLeaveBareEdge`;
    }
  }

  return null;
}

export function collapseEdge<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle, position?: P): MeshResult<CollapseEdgeResult> {
  const he = mesh.halfEdges;
  const t = he.get(h).twin;
  const a = he.get(h).origin;
  const b = he.get(t).origin;
  const sides: [Side, Side] = [describeSide(mesh, h), describeSide(mesh, t)];

  const violation = linkConditionViolation(mesh, a, b, sides);
  if (violation !== null) {
    logDebug(mesh.config.logLevel, `collapse`, `rejected edge ${h} (${a}-${b}): ${violation}`);
    return fail(
      `CollapseWouldCreateNonManifold`,
      `Collapsing edge ${a}-${b} would make the mesh non-manifold`,
      `collapseEdge`,
      { halfEdge: h, reason: violation }
    );
  }

  const at = position ?? lerpPoint(mesh.ops, mesh.position(a), mesh.position(b), 0.5);

  // Everything that left b now leaves a
  for (const g of [...vertexOutgoingEdges(mesh, b)]) {
    he.get(g).origin = a;
  }

  const removedFaces: FaceHandle[] = [];
  const survivorCandidates: HalfEdgeHandle[] = [];
  const touchedHalfEdges: HalfEdgeHandle[] = [];
  const touchedVertices: VertexHandle[] = [a];

  for (const side of sides) {
    const record = he.get(side.halfEdge);
    const next = record.next;
    const prev = record.prev;

    if (side.face !== null && side.opposite !== null) {
      // Triangle (side, next, prev) degenerates: fuse the outer twins
      const outerNext = he.get(next).twin;
      const outerPrev = he.get(prev).twin;
      setTwins(mesh, outerNext, outerPrev);
      mesh.vertices.get(side.opposite).outgoing = outerNext;
      he.free(next);
      he.free(prev);
      mesh.faces.free(side.face);
      removedFaces.push(side.face);
      survivorCandidates.push(outerPrev);
      touchedHalfEdges.push(outerNext, outerPrev);
      touchedVertices.push(side.opposite);
    } else {
      linkNext(mesh, prev, next);
      if (side.face !== null) {
        const face = mesh.faces.get(side.face);
        if (face.halfEdge === side.halfEdge) face.halfEdge = next;
      }
      survivorCandidates.push(next);
      touchedHalfEdges.push(prev, next);
    }
  }

  he.free(h);
  he.free(t);
  mesh.vertices.free(b);

  const survivor = mesh.vertices.get(a);
  survivor.position = at;
  survivor.outgoing = survivorCandidates.find((g) => he.has(g) && he.get(g).origin === a) ?? null;

  invalidateAroundVertex(mesh, a);

  assertLocalInvariants(
    mesh,
    {
      halfEdges: [...touchedHalfEdges, ...vertexOutgoingEdges(mesh, a)],
      vertices: touchedVertices,
    },
    `collapseEdge`
  );
  logDebug(mesh.config.logLevel, `collapse`, `vertex ${b} merged into ${a}, ${removedFaces.length} faces removed`);

  return success({ vertex: a, removedVertex: b, removedFaces });
}
