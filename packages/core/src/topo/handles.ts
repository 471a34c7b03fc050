/**
 * Branded handle types for half-edge mesh entities
 *
 * A handle is a number with a phantom brand, so vertex, half-edge and face
 * handles cannot be mixed up. The number packs a slot index and a generation
 * tag: `index + generation * INDEX_SPAN`. When a slot is freed and reused its
 * generation is bumped, so a handle captured before the free no longer
 * resolves. Index and generation together stay below 2^53.
 */

/**
 * Handle to a vertex in the mesh
 */
export type VertexHandle = number & { __brand: `VertexHandle` };

/**
 * Handle to a half-edge in the mesh
 * A half-edge is one oriented side of an undirected edge.
 */
export type HalfEdgeHandle = number & { __brand: `HalfEdgeHandle` };

/**
 * Handle to a face in the mesh
 */
export type FaceHandle = number & { __brand: `FaceHandle` };

export type EntityKind = `vertex` | `halfEdge` | `face`;

/** Number of slots addressable per store (2^32) */
export const INDEX_SPAN = 0x100000000;

/**
 * Highest generation a slot may reach while its handles stay safe integers.
 * A slot freed at this generation is retired instead of reused.
 */
export const MAX_GENERATION = 0x1fffff;

export function packHandle(index: number, generation: number): number {
  return index + generation * INDEX_SPAN;
}

export function handleIndex(handle: number): number {
  return handle % INDEX_SPAN;
}

export function handleGeneration(handle: number): number {
  return Math.floor(handle / INDEX_SPAN);
}

/**
 * Cast a number to a VertexHandle
 * @internal Only for numbers produced by a vertex store
 */
export function asVertexHandle(raw: number): VertexHandle {
  return raw as VertexHandle;
}

/**
 * Cast a number to a HalfEdgeHandle
 * @internal Only for numbers produced by a half-edge store
 */
export function asHalfEdgeHandle(raw: number): HalfEdgeHandle {
  return raw as HalfEdgeHandle;
}

/**
 * Cast a number to a FaceHandle
 * @internal Only for numbers produced by a face store
 */
export function asFaceHandle(raw: number): FaceHandle {
  return raw as FaceHandle;
}
