import { describe, it, expect } from 'vitest';
import { asVertexHandle, asFaceHandle, asHalfEdgeHandle } from '../handles.js';
import { unwrapResult } from '../errors.js';
import { TRIANGLE, SQUARE_PAIR, meshFrom, linksAreSymmetric } from '../../../tests/fixtures/meshes.js';

describe('splitEdge', () => {
  const v = asVertexHandle;

  it('should insert a vertex at the midpoint by default', () => {
    const mesh = meshFrom(TRIANGLE);
    const result = unwrapResult(mesh.splitEdge(asHalfEdgeHandle(0)));

    expect(result).toEqual({ vertex: 3, halfEdge: 6, faces: [] });
    expect(mesh.position(result.vertex)).toEqual([0.5, 0, 0]);
    expect(mesh.stats()).toEqual({ vertices: 4, halfEdges: 8, edges: 4, faces: 1, boundaryLoops: 1 });
    expect([...mesh.faceVertices(asFaceHandle(0))]).toEqual([0, 3, 1, 2]);
    expect([...mesh.boundaryLoop(asHalfEdgeHandle(3))]).toHaveLength(4);
  });

  it('should keep the split half-edges consistent', () => {
    const mesh = meshFrom(TRIANGLE);
    const { vertex, halfEdge } = unwrapResult(mesh.splitEdge(asHalfEdgeHandle(0)));

    expect(mesh.destination(asHalfEdgeHandle(0))).toBe(vertex);
    expect(mesh.origin(halfEdge)).toBe(vertex);
    expect(mesh.destination(halfEdge)).toBe(1);
    expect(mesh.findHalfEdge(v(1), vertex)).toBe(3);
    expect(mesh.vertexValence(vertex)).toBe(2);
    expect(linksAreSymmetric(mesh)).toBe(true);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should use an explicit position', () => {
    const mesh = meshFrom(TRIANGLE);
    const { vertex } = unwrapResult(mesh.splitEdge(asHalfEdgeHandle(0), [0.25, 0, 0]));
    expect(mesh.position(vertex)).toEqual([0.25, 0, 0]);
  });

  it('should split an interior edge into four triangles', () => {
    const mesh = meshFrom(SQUARE_PAIR);
    const diagonal = mesh.findHalfEdge(v(0), v(2));
    expect(diagonal).not.toBeNull();
    if (diagonal === null) return;

    const result = unwrapResult(mesh.splitEdge(diagonal, undefined, { triangulate: true }));

    expect(result.faces).toHaveLength(2);
    expect(mesh.position(result.vertex)).toEqual([0.5, 0.5, 0]);
    expect(mesh.stats()).toEqual({ vertices: 5, halfEdges: 16, edges: 8, faces: 4, boundaryLoops: 1 });
    expect(mesh.vertexValence(result.vertex)).toBe(4);
    for (const face of mesh.faceHandles()) {
      expect(mesh.faceDegree(face)).toBe(3);
    }
    expect(mesh.eulerCharacteristic()).toBe(1);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should triangulate only the face side of a boundary edge', () => {
    const mesh = meshFrom(TRIANGLE);
    const result = unwrapResult(mesh.splitEdge(asHalfEdgeHandle(0), undefined, { triangulate: true }));

    expect(result.faces).toEqual([1]);
    expect(mesh.faceCount).toBe(2);
    expect(mesh.edgeCount).toBe(5);
    expect([...mesh.faceVertices(asFaceHandle(0))]).toEqual([3, 1, 2]);
    expect([...mesh.faceVertices(asFaceHandle(1))]).toEqual([3, 2, 0]);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should refuse boundary edges when boundary splits are disabled', () => {
    const mesh = meshFrom(TRIANGLE, { allowBoundarySplit: false });
    const result = mesh.splitEdge(asHalfEdgeHandle(0));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('BoundaryEdgeUnsupported');
      expect(result.error.category).toBe('topology');
      expect(result.error.operation).toBe('splitEdge');
    }
    expect(mesh.vertexCount).toBe(3);
    expect(mesh.halfEdgeCount).toBe(6);
  });

  it('should still split interior edges when boundary splits are disabled', () => {
    const mesh = meshFrom(SQUARE_PAIR, { allowBoundarySplit: false });
    const diagonal = mesh.findHalfEdge(v(0), v(2));
    expect(diagonal).not.toBeNull();
    if (diagonal === null) return;

    expect(mesh.splitEdge(diagonal).ok).toBe(true);
    expect(mesh.vertexCount).toBe(5);
  });
});
