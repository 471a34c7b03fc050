import { describe, it, expect } from 'vitest';
import { asFaceHandle } from '../handles.js';
import { unwrapResult } from '../errors.js';
import { createCube } from '../../model/primitives.js';
import { TRIANGLE, meshFrom, faceKeys } from '../../../tests/fixtures/meshes.js';

describe('pokeFace', () => {
  it('should fan a triangle around its centroid', () => {
    const mesh = meshFrom(TRIANGLE);
    const result = unwrapResult(mesh.pokeFace(asFaceHandle(0)));

    expect(result.vertex).toBe(3);
    expect(result.faces).toEqual([0, 1, 2]);
    const [x, y, z] = mesh.position(result.vertex);
    expect(x).toBeCloseTo(1 / 3);
    expect(y).toBeCloseTo(1 / 3);
    expect(z).toBe(0);

    expect(mesh.vertexCount).toBe(4);
    expect(mesh.edgeCount).toBe(6);
    expect(mesh.faceCount).toBe(3);
    expect(mesh.vertexValence(result.vertex)).toBe(3);
    expect(mesh.isBoundaryVertex(result.vertex)).toBe(false);
    expect(faceKeys(mesh)).toEqual(['0,1,3', '0,2,3', '1,2,3']);
    expect(mesh.validate().isValid).toBe(true);
  });

  it('should put each side of the poked face in its own triangle', () => {
    const mesh = meshFrom(TRIANGLE);
    const { faces } = unwrapResult(mesh.pokeFace(asFaceHandle(0)));

    expect(faces.map((f) => [...mesh.faceVertices(f)])).toEqual([
      [0, 1, 3],
      [1, 2, 3],
      [2, 0, 3],
    ]);
  });

  it('should use an explicit position', () => {
    const mesh = meshFrom(TRIANGLE);
    const { vertex } = unwrapResult(mesh.pokeFace(asFaceHandle(0), [0.1, 0.2, 0.5]));
    expect(mesh.position(vertex)).toEqual([0.1, 0.2, 0.5]);
  });

  it('should keep a closed mesh closed', () => {
    const cube = createCube();
    const { faces } = unwrapResult(cube.pokeFace(asFaceHandle(0)));

    expect(faces).toHaveLength(4);
    expect(cube.vertexCount).toBe(9);
    expect(cube.edgeCount).toBe(16);
    expect(cube.faceCount).toBe(9);
    expect(cube.eulerCharacteristic()).toBe(2);
    expect(cube.isClosed()).toBe(true);
    expect(cube.validate().isValid).toBe(true);
  });
});
