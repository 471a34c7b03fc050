/**
 * Primitive meshes
 *
 * Closed solids (tetrahedron, octahedron, cube) and open planar grids, built
 * from polygon soup through `buildMesh`. Faces are wound counter-clockwise
 * seen from outside, so face normals point outward. These are useful for
 * testing and as starting points for subdivision or remeshing.
 */

import type { Vec3 } from '../num/vec3.js';
import { vec3 } from '../num/vec3.js';
import type { MeshConfigInput } from '../topo/config.js';
import type { HalfEdgeMesh } from '../topo/HalfEdgeMesh.js';
import { unwrapResult } from '../topo/errors.js';
import { buildMesh } from '../topo/resolve.js';

/**
 * Solid creation options
 */
export interface PrimitiveOptions {
  /** Scale applied to the unit shape - default 1 */
  size?: number;
  /** Center position - default [0, 0, 0] */
  center?: Vec3;
  config?: MeshConfigInput;
}

function place(unit: readonly Vec3[], options: PrimitiveOptions): Vec3[] {
  const size = options.size ?? 1;
  const center = options.center ?? vec3(0, 0, 0);
  return unit.map(([x, y, z]) => vec3(center[0] + x * size, center[1] + y * size, center[2] + z * size));
}

/**
 * Regular tetrahedron inscribed in the cube [-1, 1]^3: 4 vertices, 6 edges,
 * 4 triangles
 */
export function createTetrahedron(options: PrimitiveOptions = {}): HalfEdgeMesh<Vec3> {
  const unit: Vec3[] = [
    [1, 1, 1],
    [1, -1, -1],
    [-1, 1, -1],
    [-1, -1, 1],
  ];
  const faces = [
    [0, 1, 2],
    [0, 3, 1],
    [0, 2, 3],
    [1, 3, 2],
  ];
  return unwrapResult(buildMesh(place(unit, options), faces, options.config));
}

/**
 * Octahedron with vertices on the axes: 6 vertices, 12 edges, 8 triangles
 *
 * Vertex order: +x, -x, +y, -y, +z, -z
 */
export function createOctahedron(options: PrimitiveOptions = {}): HalfEdgeMesh<Vec3> {
  const unit: Vec3[] = [
    [1, 0, 0],
    [-1, 0, 0],
    [0, 1, 0],
    [0, -1, 0],
    [0, 0, 1],
    [0, 0, -1],
  ];
  const faces = [
    [0, 2, 4],
    [2, 1, 4],
    [1, 3, 4],
    [3, 0, 4],
    [2, 0, 5],
    [1, 2, 5],
    [3, 1, 5],
    [0, 3, 5],
  ];
  return unwrapResult(buildMesh(place(unit, options), faces, options.config));
}

/**
 * Axis-aligned cube of edge length `size`: 8 vertices, 12 edges, 6 quads
 *
 * Vertex layout (when viewed from above, looking down -Z):
 * ```
 *   3----2    (bottom)      7----6    (top)
 *   |    |                  |    |
 *   0----1                  4----5
 * ```
 */
export function createCube(options: PrimitiveOptions = {}): HalfEdgeMesh<Vec3> {
  const h = 0.5;
  const unit: Vec3[] = [
    [-h, -h, -h],
    [h, -h, -h],
    [h, h, -h],
    [-h, h, -h],
    [-h, -h, h],
    [h, -h, h],
    [h, h, h],
    [-h, h, h],
  ];
  const faces = [
    [0, 3, 2, 1], // bottom
    [4, 5, 6, 7], // top
    [0, 1, 5, 4], // front
    [2, 3, 7, 6], // back
    [0, 4, 7, 3], // left
    [1, 2, 6, 5], // right
  ];
  return unwrapResult(buildMesh(place(unit, options), faces, options.config));
}

export interface GridOptions {
  /** Cell edge length - default 1 */
  spacing?: number;
  /** Split each cell into two triangles along its (0,0)-(1,1) diagonal */
  triangulate?: boolean;
  config?: MeshConfigInput;
}

/**
 * Open rectangular patch in the XY plane with its corner at the origin,
 * normals along +Z. Vertex `(col, row)` has index `row * (cols + 1) + col`.
 */
export function createGrid(cols: number, rows: number, options: GridOptions = {}): HalfEdgeMesh<Vec3> {
  if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols < 1 || rows < 1) {
    throw new RangeError(`Grid needs at least one cell in each direction (got ${cols} x ${rows})`);
  }
  const spacing = options.spacing ?? 1;
  const stride = cols + 1;

  const positions: Vec3[] = [];
  for (let row = 0; row <= rows; row++) {
    for (let col = 0; col <= cols; col++) {
      positions.push(vec3(col * spacing, row * spacing, 0));
    }
  }

  const faces: number[][] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const i = row * stride + col;
      if (options.triangulate) {
        faces.push([i, i + 1, i + stride + 1], [i, i + stride + 1, i + stride]);
      } else {
        faces.push([i, i + 1, i + stride + 1, i + stride]);
      }
    }
  }

  return unwrapResult(buildMesh(positions, faces, options.config));
}
