/**
 * Attach a point over a region of faces
 *
 * The faces are removed and the new vertex is joined to every vertex of the
 * region's border (its horizon) by a fan of triangles. This is the step a
 * convex hull takes when a point sees several faces at once.
 *
 * The horizon is the set of region half-edges whose twin lies outside the
 * region (another face or the open boundary). It must form one simple loop;
 * vertices and edges strictly inside the loop go with the faces.
 */

import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { faceBoundary } from '../traverse.js';
import { logDebug } from '../log.js';
import { allocateEdgePair, linkNext, assertLocalInvariants } from './shared.js';

type RegionProblem = `empty` | `duplicateFace` | `noHorizon` | `pinchedHorizon` | `disconnectedHorizon`;

interface Region {
  horizon: HalfEdgeHandle[];
  inner: HalfEdgeHandle[];
  innerVertices: VertexHandle[];
}

function rejectRegion<T>(reason: RegionProblem, message: string, details: Record<string, unknown>): MeshResult<T> {
  return fail(`InvalidAttachRegion`, message, `attachPoint`, { ...details, reason });
}

/**
 * Split the region into its horizon loop (in walking order), the half-edges
 * inside it and the vertices it encloses
 */
function analyzeRegion<P>(mesh: HalfEdgeMesh<P>, faces: readonly FaceHandle[]): MeshResult<Region> {
  const he = mesh.halfEdges;
  if (faces.length === 0) {
    return rejectRegion(`empty`, `No faces given`, {});
  }
  const region = new Set(faces);
  if (region.size !== faces.length) {
    return rejectRegion(`duplicateFace`, `A face is listed more than once`, { faces: [...faces] });
  }

  const boundary: HalfEdgeHandle[] = [];
  const inner: HalfEdgeHandle[] = [];
  const corners = new Set<VertexHandle>();
  for (const f of faces) {
    for (const h of faceBoundary(mesh, f)) {
      corners.add(he.get(h).origin);
      const across = he.get(he.get(h).twin).face;
      if (across !== null && region.has(across)) {
        inner.push(h);
      } else {
        boundary.push(h);
      }
    }
  }

  if (boundary.length === 0) {
    return rejectRegion(`noHorizon`, `The faces cover a closed component and have no horizon`, {});
  }

  const byOrigin = new Map<VertexHandle, HalfEdgeHandle>();
  for (const h of boundary) {
    const origin = he.get(h).origin;
    if (byOrigin.has(origin)) {
      return rejectRegion(`pinchedHorizon`, `The horizon passes through vertex ${origin} twice`, { vertex: origin });
    }
    byOrigin.set(origin, h);
  }

  const horizon: HalfEdgeHandle[] = [];
  let h: HalfEdgeHandle | undefined = boundary[0];
  while (h !== undefined && horizon.length < boundary.length) {
    horizon.push(h);
    h = byOrigin.get(mesh.destination(h));
    if (h === boundary[0]) break;
  }
  if (h !== boundary[0] || horizon.length !== boundary.length) {
    return rejectRegion(`disconnectedHorizon`, `The horizon is not a single loop`, {
      loopLength: horizon.length,
      horizonLength: boundary.length,
    });
  }

  const innerVertices = [...corners].filter((v) => !byOrigin.has(v));
  return success({ horizon, inner, innerVertices });
}

/**
 * Replace `faces` with a fan of triangles from a new vertex at `position`
 * to their horizon. Returns the new faces in horizon order.
 */
export function attachPointToFaces<P>(
  mesh: HalfEdgeMesh<P>,
  faces: readonly FaceHandle[],
  position: P
): MeshResult<FaceHandle[]> {
  const analyzed = analyzeRegion(mesh, faces);
  if (!analyzed.ok) {
    logDebug(mesh.config.logLevel, `attachPoint`, `rejected region: ${analyzed.error.message}`);
    return analyzed;
  }
  const { horizon, inner, innerVertices } = analyzed.value;
  const he = mesh.halfEdges;
  const rim = horizon.map((h) => he.get(h).origin);

  for (const h of inner) {
    he.free(h);
  }
  for (const f of faces) {
    mesh.faces.free(f);
  }
  for (const v of innerVertices) {
    mesh.vertices.free(v);
  }

  const apex = mesh.vertices.allocate({ position, outgoing: null });
  const n = horizon.length;
  // spokes[i] = [rim[i + 1] -> apex, apex -> rim[i + 1]]
  const spokes = rim.map((_, i) => allocateEdgePair(mesh, rim[(i + 1) % n], apex));

  const created: FaceHandle[] = [];
  for (let i = 0; i < n; i++) {
    const base = horizon[i];
    const up = spokes[i][0];
    const down = spokes[(i + n - 1) % n][1];
    const face = mesh.faces.allocate({ halfEdge: base, attributes: null });

    linkNext(mesh, base, up);
    linkNext(mesh, up, down);
    linkNext(mesh, down, base);
    he.get(base).face = face;
    he.get(up).face = face;
    he.get(down).face = face;
    mesh.vertices.get(rim[i]).outgoing = base;
    created.push(face);
  }
  mesh.vertices.get(apex).outgoing = spokes[n - 1][1];

  assertLocalInvariants(
    mesh,
    { halfEdges: [...horizon, ...spokes.flat()], vertices: [apex, ...rim], faces: created },
    `attachPointToFaces`
  );
  logDebug(
    mesh.config.logLevel,
    `attachPoint`,
    `${faces.length} faces replaced by ${n} around vertex ${apex}, ${innerVertices.length} vertices removed`
  );

  return success(created);
}
