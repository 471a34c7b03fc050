import { describe, it, expect } from 'vitest';
import { vec3, ZERO3, add3, sub3, mul3, dot3, cross3, length3, normalize3, lerp3, dist3 } from './vec3.js';

describe('vec3', () => {
  describe('basic operations', () => {
    it('should create vectors', () => {
      expect(vec3(1, 2, 3)).toEqual([1, 2, 3]);
      expect(ZERO3).toEqual([0, 0, 0]);
    });

    it('should add and subtract vectors', () => {
      expect(add3(vec3(1, 2, 3), vec3(4, 5, 6))).toEqual([5, 7, 9]);
      expect(sub3(vec3(5, 6, 7), vec3(2, 3, 4))).toEqual([3, 3, 3]);
    });

    it('should multiply by scalar', () => {
      expect(mul3(vec3(2, 3, 4), 2)).toEqual([4, 6, 8]);
    });

    it('should compute dot product', () => {
      expect(dot3(vec3(1, 2, 3), vec3(4, 5, 6))).toBe(32); // 4 + 10 + 18
    });

    it('should compute right-handed cross product', () => {
      expect(cross3(vec3(1, 0, 0), vec3(0, 1, 0))).toEqual([0, 0, 1]);
      expect(cross3(vec3(0, 1, 0), vec3(1, 0, 0))).toEqual([0, 0, -1]);
    });
  });

  describe('length and normalization', () => {
    it('should compute length and distance', () => {
      expect(length3(vec3(3, 4, 0))).toBe(5);
      expect(dist3(vec3(1, 1, 1), vec3(1, 4, 5))).toBe(5);
    });

    it('should normalize to unit length', () => {
      expect(normalize3(vec3(0, 0, 7))).toEqual([0, 0, 1]);
    });

    it('should leave the zero vector at zero', () => {
      expect(normalize3(vec3(0, 0, 0))).toEqual([0, 0, 0]);
    });
  });

  it('should interpolate between points', () => {
    expect(lerp3(vec3(0, 0, 0), vec3(2, 4, 6), 0.5)).toEqual([1, 2, 3]);
    expect(lerp3(vec3(1, 1, 1), vec3(3, 3, 3), 0)).toEqual([1, 1, 1]);
  });
});
