import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success } from '../errors.js';
import { averagePoint } from '../../num/pointOps.js';
import { faceBoundary } from '../traverse.js';
import { logDebug } from '../log.js';
import { allocateEdgePair, linkNext, assertLocalInvariants } from './shared.js';

export interface PokeFaceResult {
  /** The vertex inserted inside the face */
  vertex: VertexHandle;
  /** Fan triangles in boundary order; the first reuses the poked face */
  faces: FaceHandle[];
}

/**
 * Insert a vertex inside a face and fan it into one triangle per side
 * (default position: centroid of the corners)
 */
export function pokeFace<P>(mesh: HalfEdgeMesh<P>, f: FaceHandle, position?: P): MeshResult<PokeFaceResult> {
  const he = mesh.halfEdges;
  const cycle = [...faceBoundary(mesh, f)];
  const corners = cycle.map((h) => he.get(h).origin);
  const at = position ?? averagePoint(mesh.ops, corners.map((v) => mesh.position(v)));
  const center = mesh.vertices.allocate({ position: at, outgoing: null });

  // spokes[i] = [center -> corner i, corner i -> center]
  const spokes: [HalfEdgeHandle, HalfEdgeHandle][] = corners.map((v) => allocateEdgePair(mesh, center, v));
  const n = cycle.length;
  const faces: FaceHandle[] = [];

  for (let i = 0; i < n; i++) {
    const side = cycle[i];
    const inbound = spokes[(i + 1) % n][1];
    const outbound = spokes[i][0];
    const face = i === 0 ? f : mesh.faces.allocate({ halfEdge: side, attributes: null });

    linkNext(mesh, side, inbound);
    linkNext(mesh, inbound, outbound);
    linkNext(mesh, outbound, side);
    he.get(side).face = face;
    he.get(inbound).face = face;
    he.get(outbound).face = face;
    faces.push(face);
  }

  const original = mesh.faces.get(f);
  original.halfEdge = cycle[0];
  original.attributes = null;
  mesh.vertices.get(center).outgoing = spokes[0][0];

  assertLocalInvariants(
    mesh,
    { halfEdges: [...cycle, ...spokes.flat()], vertices: [center, ...corners], faces },
    `pokeFace`
  );
  logDebug(mesh.config.logLevel, `poke`, `face ${f} fanned into ${n} triangles around vertex ${center}`);

  return success({ vertex: center, faces });
}
