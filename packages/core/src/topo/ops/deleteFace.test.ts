import { describe, it, expect } from 'vitest';
import { asVertexHandle, asFaceHandle, asHalfEdgeHandle } from '../handles.js';
import { unwrapResult } from '../errors.js';
import { buildMesh } from '../resolve.js';
import { TRIANGLE, CENTER_FAN, HEX_FAN, PYRAMID, meshFrom, linksAreSymmetric } from '../../../tests/fixtures/meshes.js';

describe('deleteFace', () => {
  const f = asFaceHandle;

  it('should open a hole in a closed mesh without removing edges', () => {
    const mesh = meshFrom(PYRAMID);
    const result = unwrapResult(mesh.deleteFace(f(4)));

    expect(result).toEqual({ removedEdges: 0, removedVertices: [] });
    expect(mesh.stats()).toEqual({ vertices: 5, halfEdges: 18, edges: 9, faces: 5, boundaryLoops: 1 });
    expect(mesh.isClosed()).toBe(false);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should drop edges that end up with no face on either side', () => {
    const mesh = meshFrom(CENTER_FAN);
    const result = unwrapResult(mesh.deleteFace(f(0)));

    expect(result).toEqual({ removedEdges: 1, removedVertices: [] });
    expect(mesh.vertexCount).toBe(5);
    expect(mesh.edgeCount).toBe(7);
    expect(mesh.faceCount).toBe(3);
    expect(mesh.findHalfEdge(asVertexHandle(1), asVertexHandle(2))).toBeNull();
    expect([...mesh.boundaryLoop(asHalfEdgeHandle(0))]).toEqual([0, 15, 14, 13, 2]);
    expect(linksAreSymmetric(mesh)).toBe(true);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should remove a vertex left without edges', () => {
    const mesh = meshFrom(CENTER_FAN);
    unwrapResult(mesh.deleteFace(f(0)));
    const result = unwrapResult(mesh.deleteFace(f(3)));

    expect(result).toEqual({ removedEdges: 2, removedVertices: [1] });
    expect(mesh.vertices.has(asVertexHandle(1))).toBe(false);
    expect(mesh.vertexCount).toBe(4);
    expect(mesh.edgeCount).toBe(5);
    expect(mesh.faceCount).toBe(2);
    expect([...mesh.boundaryLoop(asHalfEdgeHandle(9))]).toEqual([9, 14, 13, 2]);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should refuse to split the faces around a vertex into two fans', () => {
    const mesh = meshFrom(HEX_FAN);
    unwrapResult(mesh.deleteFace(f(0)));
    const before = mesh.toPolygonSoup();
    const result = mesh.deleteFace(f(3));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('DeleteWouldCreateNonManifold');
      expect(result.error.category).toBe('topology');
      expect(result.error.message).toBe('Deleting face 3 would leave vertex 0 joining two separate fans');
      expect(result.error.details).toEqual({ face: 3, vertex: 0 });
    }
    expect(mesh.faces.has(f(3))).toBe(true);
    expect(mesh.toPolygonSoup()).toEqual(before);
    expect(buildMesh(before.positions, before.faces).ok).toBe(true);
  });

  it('should widen an existing gap at a boundary vertex', () => {
    const mesh = meshFrom(HEX_FAN);
    unwrapResult(mesh.deleteFace(f(0)));
    unwrapResult(mesh.deleteFace(f(1)));

    expect(mesh.faceCount).toBe(4);
    expect(mesh.vertices.has(asVertexHandle(2))).toBe(false);
    const soup = mesh.toPolygonSoup();
    expect(buildMesh(soup.positions, soup.faces).ok).toBe(true);
  });

  it('should empty a mesh made of one face', () => {
    const mesh = meshFrom(TRIANGLE);
    const result = unwrapResult(mesh.deleteFace(f(0)));

    expect(result).toEqual({ removedEdges: 3, removedVertices: [1, 2, 0] });
    expect(mesh.stats()).toEqual({ vertices: 0, halfEdges: 0, edges: 0, faces: 0, boundaryLoops: 0 });
  });
});
