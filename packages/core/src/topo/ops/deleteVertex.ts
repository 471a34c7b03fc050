import type { HalfEdgeMesh } from '../HalfEdgeMesh.js';
import type { VertexHandle } from '../handles.js';
import { type MeshResult, success, fail } from '../errors.js';
import { logDebug } from '../log.js';

/**
 * Delete an isolated vertex. A vertex that still has edges is left alone.
 */
export function deleteVertex<P>(mesh: HalfEdgeMesh<P>, v: VertexHandle): MeshResult<void> {
  const outgoing = mesh.vertices.get(v).outgoing;
  if (outgoing !== null) {
    logDebug(mesh.config.logLevel, `deleteVertex`, `vertex ${v} still has edges`);
    return fail(`VertexStillReferenced`, `Vertex ${v} still has incident edges`, `deleteVertex`, {
      vertex: v,
      outgoing,
    });
  }
  mesh.vertices.free(v);
  return success(undefined);
}
