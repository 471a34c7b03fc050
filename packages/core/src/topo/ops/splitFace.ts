import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { faceBoundary, findHalfEdge } from '../traverse.js';
import { logDebug } from '../log.js';
import { insertDiagonal, assertLocalInvariants } from './shared.js';

export interface SplitFaceResult {
  /** New half-edge `u -> v`, the first half-edge of the new face */
  halfEdge: HalfEdgeHandle;
  /** Face created on the `v ... u` side of the cut */
  face: FaceHandle;
}

/**
 * Cut a face in two with a new edge between two of its non-adjacent corners
 */
export function splitFace<P>(
  mesh: HalfEdgeMesh<P>,
  f: FaceHandle,
  u: VertexHandle,
  v: VertexHandle
): MeshResult<SplitFaceResult> {
  mesh.vertices.get(u);
  mesh.vertices.get(v);
  const reject = (reason: string, message: string): MeshResult<SplitFaceResult> => {
    logDebug(mesh.config.logLevel, `splitFace`, `rejected: ${message}`);
    return fail(`InvalidFaceSplit`, message, `splitFace`, { face: f, u, v, reason });
  };

  if (u === v) {
    return reject(`sameVertex`, `Cannot connect vertex ${u} to itself`);
  }

  let hu: HalfEdgeHandle | null = null;
  let hv: HalfEdgeHandle | null = null;
  for (const h of faceBoundary(mesh, f)) {
    const origin = mesh.halfEdges.get(h).origin;
    if (origin === u) hu = h;
    if (origin === v) hv = h;
  }
  if (hu === null || hv === null) {
    return reject(`vertexNotOnFace`, `Vertices ${u} and ${v} are not both corners of face ${f}`);
  }
  if (mesh.halfEdges.get(hu).next === hv || mesh.halfEdges.get(hv).next === hu) {
    return reject(`adjacentVertices`, `Vertices ${u} and ${v} are adjacent on face ${f}`);
  }
  if (findHalfEdge(mesh, u, v) !== null) {
    return reject(`alreadyConnected`, `Vertices ${u} and ${v} are already joined by an edge`);
  }

  const cut = insertDiagonal(mesh, f, hu, hv);
  const twin = mesh.halfEdges.get(cut.halfEdge).twin;

  assertLocalInvariants(
    mesh,
    { halfEdges: [cut.halfEdge, twin, hu, hv], vertices: [u, v], faces: [f, cut.face] },
    `splitFace`
  );
  logDebug(mesh.config.logLevel, `splitFace`, `face ${f} split into ${f} and ${cut.face}`);

  return success(cut);
}
