/**
 * Face deletion
 *
 * The face's half-edges become boundary half-edges. Where the twin was
 * already on the boundary the whole edge goes, the two boundary loops it
 * separated are spliced together, and a vertex left with no edges is removed.
 *
 * A corner that already sits on the boundary must share an edge with that
 * boundary; otherwise the deletion would open a second gap there and leave
 * two fans joined only at the vertex. Such deletions are refused.
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { faceBoundary } from '../traverse.js';
import { logDebug } from '../log.js';
import { linkNext, assertLocalInvariants } from './shared.js';

export interface DeleteFaceResult {
  /** Number of undirected edges removed along with the face */
  removedEdges: number;
  /** Vertices removed because they lost their last edge */
  removedVertices: VertexHandle[];
}

/**
 * Remove the faceless pair `h` / `twin(h)`, keeping boundary loops closed.
 * Returns the end vertices that became isolated.
 */
function removeEdgePair<P>(mesh: HalfEdgeMesh<P>, h: HalfEdgeHandle): VertexHandle[] {
  const he = mesh.halfEdges;
  const hRec = he.get(h);
  const t = hRec.twin;
  const tRec = he.get(t);
  const u = hRec.origin;
  const v = tRec.origin;
  const hn = hRec.next;
  const hp = hRec.prev;
  const tn = tRec.next;
  const tp = tRec.prev;

  if (tn !== h) linkNext(mesh, hp, tn);
  if (hn !== t) linkNext(mesh, tp, hn);

  const uRec = mesh.vertices.get(u);
  if (uRec.outgoing === h) uRec.outgoing = tn !== h ? tn : null;
  const vRec = mesh.vertices.get(v);
  if (vRec.outgoing === t) vRec.outgoing = hn !== t ? hn : null;

  he.free(h);
  he.free(t);

  const isolated: VertexHandle[] = [];
  for (const vertex of [u, v]) {
    if (mesh.vertices.get(vertex).outgoing === null) {
      mesh.vertices.free(vertex);
      isolated.push(vertex);
    }
  }
  return isolated;
}

/**
 * First corner of the face that would be left with two separate fans
 */
function pinchedCorner<P>(mesh: HalfEdgeMesh<P>, cycle: readonly HalfEdgeHandle[]): VertexHandle | null {
  const he = mesh.halfEdges;
  for (const h of cycle) {
    const v = he.get(h).origin;
    if (!mesh.isBoundaryVertex(v)) continue;
    const outgoingOpen = he.get(he.get(h).twin).face === null;
    const incomingOpen = he.get(he.get(he.get(h).prev).twin).face === null;
    if (!outgoingOpen && !incomingOpen) return v;
  }
  return null;
}

export function deleteFace<P>(mesh: HalfEdgeMesh<P>, f: FaceHandle): MeshResult<DeleteFaceResult> {
  const he = mesh.halfEdges;
  const cycle = [...faceBoundary(mesh, f)];
  const corners = cycle.map((h) => he.get(h).origin);

  const pinched = pinchedCorner(mesh, cycle);
  if (pinched !== null) {
    logDebug(mesh.config.logLevel, `deleteFace`, `rejected face ${f}: vertex ${pinched} would be pinched`);
    return fail(
      `DeleteWouldCreateNonManifold`,
      `Deleting face ${f} would leave vertex ${pinched} joining two separate fans`,
      `deleteFace`,
      { face: f, vertex: pinched }
    );
  }

  for (const h of cycle) {
    he.get(h).face = null;
  }
  mesh.faces.free(f);

  let removedEdges = 0;
  const removedVertices: VertexHandle[] = [];
  const survivors: HalfEdgeHandle[] = [];
  for (const h of cycle) {
    if (he.get(he.get(h).twin).face === null) {
      removedVertices.push(...removeEdgePair(mesh, h));
      removedEdges++;
    } else {
      survivors.push(h);
    }
  }

  assertLocalInvariants(
    mesh,
    {
      halfEdges: survivors,
      vertices: corners.filter((v) => mesh.vertices.has(v)),
    },
    `deleteFace`
  );
  logDebug(
    mesh.config.logLevel,
    `deleteFace`,
    `face ${f} removed with ${removedEdges} edges and ${removedVertices.length} vertices`
  );

  return success({ removedEdges, removedVertices });
}
