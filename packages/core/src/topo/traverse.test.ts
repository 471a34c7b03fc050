/**
 * Tests for the traversal layer
 *
 * CENTER_FAN half-edges, in allocation order:
 *   face 0: 0->1 (0), 1->2 (1), 2->0 (2)
 *   face 1: 0->2 (3), 2->3 (4), 3->0 (5)
 *   face 2: 0->3 (6), 3->4 (7), 4->0 (8)
 *   face 3: 0->4 (9), 4->1 (10), 1->0 (11)
 *   boundary: 2->1 (12), 3->2 (13), 4->3 (14), 1->4 (15)
 */

import { describe, it, expect } from 'vitest';
import { asVertexHandle, asFaceHandle, asHalfEdgeHandle } from './handles.js';
import { isMeshInvariantError } from './errors.js';
import { countOf } from './traverse.js';
import { CENTER_FAN, TRIANGLE, meshFrom } from '../../tests/fixtures/meshes.js';

describe('traversal', () => {
  const v = asVertexHandle;
  const f = asFaceHandle;
  const h = asHalfEdgeHandle;

  describe('face walks', () => {
    it('should walk a face boundary from its half-edge', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.faceBoundary(f(1))]).toEqual([3, 4, 5]);
      expect([...mesh.faceVertices(f(1))]).toEqual([0, 2, 3]);
      expect(mesh.faceDegree(f(1))).toBe(3);
    });

    it('should list edge-sharing neighbours once each', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.faceNeighbors(f(0))]).toEqual([3, 1]);
      expect(mesh.areFacesAdjacent(f(0), f(1))).toBe(true);
      expect(mesh.areFacesAdjacent(f(0), f(2))).toBe(false);
    });

    it('should restart from the beginning on each iteration', () => {
      const mesh = meshFrom(CENTER_FAN);
      const walk = mesh.faceBoundary(f(2));
      expect([...walk]).toEqual([6, 7, 8]);
      expect([...walk]).toEqual([6, 7, 8]);
    });
  });

  describe('vertex walks', () => {
    it('should rotate around an interior vertex', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.vertexOutgoingEdges(v(0))]).toEqual([0, 9, 6, 3]);
      expect([...mesh.vertexNeighbors(v(0))]).toEqual([1, 4, 3, 2]);
      expect([...mesh.vertexIncidentFaces(v(0))]).toEqual([0, 3, 2, 1]);
      expect(mesh.vertexValence(v(0))).toBe(4);
      expect(mesh.isBoundaryVertex(v(0))).toBe(false);
    });

    it('should cross the boundary gap around a boundary vertex', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.vertexOutgoingEdges(v(1))]).toEqual([1, 15, 11]);
      expect([...mesh.vertexNeighbors(v(1))]).toEqual([2, 4, 0]);
      expect([...mesh.vertexIncidentFaces(v(1))]).toEqual([0, 3]);
      expect(mesh.isBoundaryVertex(v(1))).toBe(true);
    });

    it('should yield nothing for an isolated vertex', () => {
      const mesh = meshFrom(TRIANGLE);
      const lonely = mesh.addVertex([4, 4, 4]);
      expect([...mesh.vertexOutgoingEdges(lonely)]).toEqual([]);
      expect(mesh.vertexValence(lonely)).toBe(0);
    });
  });

  describe('edge walks', () => {
    it('should list the ends of an edge origin first', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.edgeVertices(h(3))]).toEqual([0, 2]);
      expect([...mesh.edgeVertices(h(12))]).toEqual([2, 1]);
    });

    it('should list the faces on both sides, skipping open ones', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.edgeFaces(h(3))]).toEqual([1, 0]);
      expect([...mesh.edgeFaces(h(1))]).toEqual([0]);
      expect([...mesh.edgeFaces(h(12))]).toEqual([0]);
    });

    it('should rotate around the origin, then around the destination', () => {
      const mesh = meshFrom(CENTER_FAN);
      const around = mesh.edgeAdjacentEdges(h(0));

      expect([...around]).toEqual([0, 9, 6, 3, 11, 1, 15]);
      expect(countOf(around)).toBe(7);
    });
  });

  describe('whole-mesh walks', () => {
    it('should report one half-edge per undirected edge', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.undirectedEdges()]).toEqual([0, 1, 2, 4, 5, 7, 8, 10]);
    });

    it('should find each boundary loop once', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect([...mesh.boundaryLoops()]).toEqual([12]);
      expect([...mesh.boundaryLoop(h(12))]).toEqual([12, 15, 14, 13]);
    });

    it('should find half-edges between vertices', () => {
      const mesh = meshFrom(CENTER_FAN);
      expect(mesh.findHalfEdge(v(0), v(2))).toBe(3);
      expect(mesh.findHalfEdge(v(2), v(0))).toBe(2);
      expect(mesh.findHalfEdge(v(1), v(3))).toBeNull();
    });
  });

  describe('failure modes', () => {
    it('should throw CorruptTopology when a cycle never closes', () => {
      const mesh = meshFrom(TRIANGLE, { maxFaceDegree: 8 });
      mesh.halfEdges.get(h(2)).next = h(1);

      expect(() => [...mesh.faceBoundary(f(0))]).toThrow('CorruptTopology: face 0 did not close within 8 half-edges');
    });

    it('should throw DanglingHandle for a deleted face', () => {
      const mesh = meshFrom(CENTER_FAN);
      mesh.deleteFace(f(0));

      try {
        mesh.faceBoundary(f(0));
        expect.unreachable('deleted face resolved');
      } catch (err) {
        expect(isMeshInvariantError(err) && err.kind).toBe('DanglingHandle');
      }
    });
  });

  it('countOf should count any iterable', () => {
    expect(countOf([1, 2, 3])).toBe(3);
    expect(countOf(new Set<number>())).toBe(0);
  });
});
