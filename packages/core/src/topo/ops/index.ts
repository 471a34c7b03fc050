/**
 * Mutation operators
 */

export { splitEdge, type SplitEdgeOptions, type SplitEdgeResult } from './splitEdge.js';
export { collapseEdge, type CollapseEdgeResult } from './collapseEdge.js';
export { flipEdge } from './flipEdge.js';
export { deleteFace, type DeleteFaceResult } from './deleteFace.js';
export { deleteVertex } from './deleteVertex.js';
export { pokeFace, type PokeFaceResult } from './pokeFace.js';
export { splitFace, type SplitFaceResult } from './splitFace.js';
export { attachPointToFaces } from './attachPoint.js';
