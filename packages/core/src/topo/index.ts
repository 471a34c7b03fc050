/**
 * Half-edge topology module
 *
 * - handles.ts: Branded handle types for type-safe references
 * - EntityStore.ts: Generational arenas backing the mesh
 * - resolve.ts: Polygon soup to linked mesh
 * - traverse.ts: Lazy face, vertex, edge and boundary walks
 * - ops/: Mutation operators (split, collapse, flip, delete, poke, attach)
 * - validate.ts: Whole-mesh validation report
 */

export * from './handles.js';
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export { EntityStore } from './EntityStore.js';
export { HalfEdgeMesh } from './HalfEdgeMesh.js';
export { buildMesh, buildMeshWith } from './resolve.js';
export * from './traverse.js';
export * from './ops/index.js';
export * from './validate.js';
