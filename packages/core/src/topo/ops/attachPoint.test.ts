import { describe, it, expect } from 'vitest';
import type { Vec3 } from '../../num/vec3.js';
import { asVertexHandle, asFaceHandle } from '../handles.js';
import { unwrapResult } from '../errors.js';
import { buildMesh } from '../resolve.js';
import { createCube, createTetrahedron } from '../../model/primitives.js';
import { HEX_FAN, PYRAMID, meshFrom, faceKeys, linksAreSymmetric } from '../../../tests/fixtures/meshes.js';

describe('attachPointToFaces', () => {
  const f = asFaceHandle;
  const below: Vec3 = [0, 0, -1];

  describe('fanning over the horizon', () => {
    it('should replace the base of a pyramid with a fan to the new point', () => {
      const mesh = meshFrom(PYRAMID);
      const created = unwrapResult(mesh.attachPointToFaces([f(4), f(5)], below));

      expect(created.map((face) => [...mesh.faceVertices(face)])).toEqual([
        [3, 2, 5],
        [2, 1, 5],
        [1, 4, 5],
        [4, 3, 5],
      ]);
      expect(mesh.position(asVertexHandle(5))).toEqual(below);
      expect(mesh.stats()).toEqual({ vertices: 6, halfEdges: 24, edges: 12, faces: 8, boundaryLoops: 0 });
      expect(faceKeys(mesh)).toEqual(['0,1,2', '0,1,4', '0,2,3', '0,3,4', '1,2,5', '1,4,5', '2,3,5', '3,4,5']);
      expect(mesh.eulerCharacteristic()).toBe(2);
      expect(linksAreSymmetric(mesh)).toBe(true);
      expect(mesh.validate().isValid).toBe(true);
    });

    it('should remove vertices enclosed by the region', () => {
      const mesh = meshFrom(PYRAMID);
      const created = unwrapResult(mesh.attachPointToFaces([f(0), f(1), f(2), f(3)], [0, 0, 2]));
      const apex = 2 ** 32;

      expect(mesh.vertices.has(asVertexHandle(0))).toBe(false);
      expect(created.map((face) => [...mesh.faceVertices(face)])).toEqual([
        [1, 2, apex],
        [2, 3, apex],
        [3, 4, apex],
        [4, 1, apex],
      ]);
      expect(mesh.stats()).toEqual({ vertices: 5, halfEdges: 18, edges: 9, faces: 6, boundaryLoops: 0 });
      expect(mesh.isClosed()).toBe(true);
      expect(mesh.validate().isValid).toBe(true);
    });

    it('should keep the open boundary next to the region', () => {
      const mesh = meshFrom(HEX_FAN);
      const created = unwrapResult(mesh.attachPointToFaces([f(0), f(1), f(2)], [0, 1, 1]));

      expect(created).toHaveLength(5);
      expect(mesh.stats()).toEqual({ vertices: 8, halfEdges: 30, edges: 15, faces: 8, boundaryLoops: 1 });
      expect(mesh.eulerCharacteristic()).toBe(1);
      expect(linksAreSymmetric(mesh)).toBe(true);

      const soup = mesh.toPolygonSoup();
      const rebuilt = unwrapResult(buildMesh(soup.positions, soup.faces));
      expect(rebuilt.stats()).toEqual(mesh.stats());
    });
  });

  describe('rejected regions', () => {
    it('should reject an empty list', () => {
      const mesh = meshFrom(PYRAMID);
      const result = mesh.attachPointToFaces([], below);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidAttachRegion');
        expect(result.error.category).toBe('topology');
        expect(result.error.operation).toBe('attachPoint');
        expect(result.error.message).toBe('No faces given');
        expect(result.error.details).toEqual({ reason: 'empty' });
      }
    });

    it('should reject a face listed twice', () => {
      const mesh = meshFrom(PYRAMID);
      const result = mesh.attachPointToFaces([f(0), f(0)], below);
      expect(result.ok ? null : result.error.details).toEqual({ faces: [0, 0], reason: 'duplicateFace' });
    });

    it('should reject a closed component, which has no horizon', () => {
      const mesh = createTetrahedron();
      const result = mesh.attachPointToFaces([...mesh.faceHandles()], below);
      expect(result.ok ? null : result.error.details).toEqual({ reason: 'noHorizon' });
      expect(mesh.faceCount).toBe(4);
    });

    it('should reject faces that touch only at a vertex', () => {
      const mesh = meshFrom(PYRAMID);
      const before = mesh.toPolygonSoup();
      const result = mesh.attachPointToFaces([f(0), f(2)], below);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('The horizon passes through vertex 0 twice');
        expect(result.error.details).toEqual({ vertex: 0, reason: 'pinchedHorizon' });
      }
      expect(mesh.toPolygonSoup()).toEqual(before);
    });

    it('should reject faces whose horizon splits into separate loops', () => {
      const mesh = createCube();
      const before = mesh.toPolygonSoup();
      const result = mesh.attachPointToFaces([f(0), f(1)], [0, 0, 0]);

      expect(result.ok ? null : result.error.details).toEqual({
        loopLength: 4,
        horizonLength: 8,
        reason: 'disconnectedHorizon',
      });
      expect(mesh.toPolygonSoup()).toEqual(before);
    });
  });
});
