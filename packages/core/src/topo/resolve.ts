/**
 * Link resolver: polygon soup to half-edge mesh
 *
 * Every half-edge refers to its twin, next, previous and face, so the
 * structure cannot be built in one pass. Records are allocated with
 * self-referential placeholder links and patched in stages:
 *
 * 1. check the soup at index level (nothing is allocated for bad input)
 * 2. one vertex per position
 * 3. one half-edge per face side, linked into face cycles
 * 4. twins paired through an (origin, destination) index
 * 5. a faceless twin for every unpaired side, linked into boundary loops
 * 6. vertex `outgoing` handles, then a fan check per vertex
 */

import type { Vec3 } from '../num/vec3.js';
import { type PointOps, VEC3_OPS } from '../num/pointOps.js';
import { type VertexHandle, type HalfEdgeHandle, INDEX_SPAN } from './handles.js';
import { type MeshConfigInput, createMeshConfig } from './config.js';
import { type MeshResult, success, fail } from './errors.js';
import { HalfEdgeMesh } from './HalfEdgeMesh.js';
import { validateMesh } from './validate.js';
import { logDebug, logWarn } from './log.js';

/** A face side as it appears in the soup */
interface SideEntry {
  halfEdge: HalfEdgeHandle;
  from: number;
  to: number;
}

/**
 * Build a mesh over `[x, y, z]` positions
 *
 * ```ts
 * const result = buildMesh(
 *   [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
 *   [[0, 1, 2]]
 * );
 * const mesh = unwrapResult(result);
 * mesh.faceCount; // 1
 * ```
 */
export function buildMesh(
  positions: readonly Vec3[],
  faces: readonly (readonly number[])[],
  config: MeshConfigInput = {}
): MeshResult<HalfEdgeMesh<Vec3>> {
  return buildMeshWith(VEC3_OPS, positions, faces, config);
}

/**
 * Build a mesh over any point type, given its arithmetic
 */
export function buildMeshWith<P>(
  ops: PointOps<P>,
  positions: readonly P[],
  faces: readonly (readonly number[])[],
  configInput: MeshConfigInput = {}
): MeshResult<HalfEdgeMesh<P>> {
  const config = createMeshConfig(configInput);

  const checked = checkSoup(positions.length, faces);
  if (!checked.ok) {
    logDebug(config.logLevel, `build`, `rejected soup: ${checked.error.message}`);
    return checked;
  }

  const mesh = new HalfEdgeMesh<P>(ops, config);
  const vertices = positions.map((position) => mesh.vertices.allocate({ position, outgoing: null }));

  const sides = linkFaceCycles(mesh, vertices, faces);
  const unpaired = pairTwins(mesh, sides, positions.length);

  const closed = closeBoundaries(mesh, unpaired);
  if (!closed.ok) {
    logDebug(config.logLevel, `build`, `rejected soup: ${closed.error.message}`);
    return closed;
  }

  assignOutgoing(mesh);

  const fans = checkVertexFans(mesh);
  if (!fans.ok) {
    logDebug(config.logLevel, `build`, `rejected soup: ${fans.error.message}`);
    return fans;
  }

  logDebug(
    config.logLevel,
    `build`,
    `${mesh.vertexCount} vertices, ${mesh.edgeCount} edges, ${mesh.faceCount} faces, ${closed.value} boundary half-edges`
  );

  if (config.logLevel !== `silent`) {
    const report = validateMesh(mesh);
    for (const issue of report.issues) {
      logWarn(config.logLevel, `build`, issue.message);
    }
  }

  return success(mesh);
}

// ============================================================================
// Stage 1: index-level checks
// ============================================================================

function checkSoup(vertexCount: number, faces: readonly (readonly number[])[]): MeshResult<void> {
  let sideCount = 0;
  for (let fi = 0; fi < faces.length; fi++) {
    sideCount += faces[fi].length;
  }
  // each side may need a boundary twin
  if (vertexCount > INDEX_SPAN || 2 * sideCount > INDEX_SPAN) {
    return fail(`InvalidSoup`, `Soup with ${vertexCount} vertices and ${sideCount} face sides exceeds ${INDEX_SPAN} handles`, `build`, {
      vertices: vertexCount,
      sides: sideCount,
      reason: `tooLarge`,
    });
  }

  for (let fi = 0; fi < faces.length; fi++) {
    const face = faces[fi];
    for (const index of face) {
      if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
        return fail(`InvalidVertexIndex`, `Face ${fi} references vertex ${index}, but there are ${vertexCount}`, `build`, {
          face: fi,
          index,
        });
      }
    }
    if (face.length < 3) {
      return fail(`DegenerateFace`, `Face ${fi} has ${face.length} vertices; at least 3 are required`, `build`, {
        face: fi,
        reason: `tooFewVertices`,
      });
    }
    if (new Set(face).size !== face.length) {
      return fail(`DegenerateFace`, `Face ${fi} visits a vertex more than once`, `build`, {
        face: fi,
        reason: `repeatedVertex`,
      });
    }
  }

  const directedUses = new Map<number, number[]>();
  const undirectedUses = new Map<number, number[]>();
  for (let fi = 0; fi < faces.length; fi++) {
    const face = faces[fi];
    for (let i = 0; i < face.length; i++) {
      const from = face[i];
      const to = face[(i + 1) % face.length];
      pushTo(directedUses, from * vertexCount + to, fi);
      pushTo(undirectedUses, Math.min(from, to) * vertexCount + Math.max(from, to), fi);
    }
  }

  for (const [key, users] of undirectedUses) {
    if (users.length > 2) {
      const [a, b] = splitKey(key, vertexCount);
      return fail(`NonManifoldEdge`, `Edge ${a}-${b} is shared by ${users.length} faces`, `build`, {
        edge: [a, b],
        faces: users,
        reason: `sharedByMoreThanTwoFaces`,
      });
    }
  }
  for (const [key, users] of directedUses) {
    if (users.length > 1) {
      const [a, b] = splitKey(key, vertexCount);
      return fail(
        `NonManifoldEdge`,
        `Edge ${a}->${b} is used in the same direction by faces ${users.join(', ')}`,
        `build`,
        { edge: [a, b], faces: users, reason: `inconsistentOrientation` }
      );
    }
  }

  return success(undefined);
}

function pushTo(map: Map<number, number[]>, key: number, value: number): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function splitKey(key: number, vertexCount: number): [number, number] {
  return [Math.floor(key / vertexCount), key % vertexCount];
}

// ============================================================================
// Stage 3: face cycles
// ============================================================================

function linkFaceCycles<P>(
  mesh: HalfEdgeMesh<P>,
  vertices: readonly VertexHandle[],
  faces: readonly (readonly number[])[]
): SideEntry[] {
  const he = mesh.halfEdges;
  const sides: SideEntry[] = [];

  for (const corners of faces) {
    const n = corners.length;
    const cycle = corners.map((index) =>
      he.allocateWith((self) => ({ origin: vertices[index], twin: self, next: self, prev: self, face: null }))
    );
    const face = mesh.faces.allocate({ halfEdge: cycle[0], attributes: null });

    for (let i = 0; i < n; i++) {
      const record = he.get(cycle[i]);
      record.next = cycle[(i + 1) % n];
      record.prev = cycle[(i + n - 1) % n];
      record.face = face;
      sides.push({ halfEdge: cycle[i], from: corners[i], to: corners[(i + 1) % n] });
    }
  }

  return sides;
}

// ============================================================================
// Stage 4: twins
// ============================================================================

/**
 * Pair opposite sides; returns the sides left without a twin
 */
function pairTwins<P>(mesh: HalfEdgeMesh<P>, sides: readonly SideEntry[], vertexCount: number): HalfEdgeHandle[] {
  const he = mesh.halfEdges;
  const byKey = new Map<number, HalfEdgeHandle>();
  for (const side of sides) {
    byKey.set(side.from * vertexCount + side.to, side.halfEdge);
  }

  const unpaired: HalfEdgeHandle[] = [];
  for (const side of sides) {
    const record = he.get(side.halfEdge);
    if (record.twin !== side.halfEdge) continue;
    const opposite = byKey.get(side.to * vertexCount + side.from);
    if (opposite === undefined) {
      unpaired.push(side.halfEdge);
    } else {
      record.twin = opposite;
      he.get(opposite).twin = side.halfEdge;
    }
  }
  return unpaired;
}

// ============================================================================
// Stage 5: boundary loops
// ============================================================================

/**
 * Give every unpaired side a faceless twin and link those into loops.
 * Returns the number of boundary half-edges created.
 */
function closeBoundaries<P>(mesh: HalfEdgeMesh<P>, unpaired: readonly HalfEdgeHandle[]): MeshResult<number> {
  const he = mesh.halfEdges;
  const boundary: HalfEdgeHandle[] = [];

  for (const h of unpaired) {
    const record = he.get(h);
    const origin = he.get(record.next).origin;
    const b = he.allocateWith((self) => ({ origin, twin: h, next: self, prev: self, face: null }));
    record.twin = b;
    boundary.push(b);
  }

  // The boundary half-edge after b leaves the vertex b ends at. Rotate through
  // the fan there (g -> twin(prev(g))) until a faceless half-edge turns up.
  const bound = mesh.config.maxVertexValence;
  const claimed = new Set<HalfEdgeHandle>();
  for (const b of boundary) {
    let g = he.get(b).twin;
    let next: HalfEdgeHandle | null = null;
    for (let steps = 0; steps < bound; steps++) {
      const candidate = he.get(he.get(g).prev).twin;
      if (he.get(candidate).face === null) {
        next = candidate;
        break;
      }
      g = candidate;
    }

    if (next === null) {
      return fail(`UnresolvedBoundary`, `Boundary loop through half-edge ${b} does not close`, `build`, {
        halfEdge: b,
        vertex: he.get(he.get(b).twin).origin,
      });
    }
    if (claimed.has(next)) {
      return fail(`UnresolvedBoundary`, `Boundary half-edge ${next} is reached from two loops`, `build`, {
        halfEdge: next,
      });
    }
    claimed.add(next);
    he.get(b).next = next;
    he.get(next).prev = b;
  }

  return success(boundary.length);
}

// ============================================================================
// Stage 6: vertices
// ============================================================================

function assignOutgoing<P>(mesh: HalfEdgeMesh<P>): void {
  for (const h of mesh.halfEdges.handles()) {
    const vertex = mesh.vertices.get(mesh.halfEdges.get(h).origin);
    if (vertex.outgoing === null) {
      vertex.outgoing = h;
    }
  }
}

/**
 * Every half-edge leaving a vertex must be reachable by rotating around it;
 * otherwise the vertex joins separate fans (a bow-tie)
 */
function checkVertexFans<P>(mesh: HalfEdgeMesh<P>): MeshResult<void> {
  const he = mesh.halfEdges;
  const leaving = new Map<VertexHandle, number>();
  for (const h of he.handles()) {
    const origin = he.get(h).origin;
    leaving.set(origin, (leaving.get(origin) ?? 0) + 1);
  }

  for (const [v, total] of leaving) {
    const start = mesh.vertices.get(v).outgoing;
    if (start === null) continue;
    let reached = 0;
    let h = start;
    do {
      reached++;
      h = he.get(he.get(h).twin).next;
    } while (h !== start && reached <= total);

    if (reached !== total) {
      return fail(`NonManifoldVertex`, `Vertex ${v} joins more than one fan of faces`, `build`, {
        vertex: v,
        reached,
        total,
      });
    }
  }
  return success(undefined);
}
