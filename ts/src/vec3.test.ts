import { describe, it, expect } from 'vitest';
import {
  ZERO, add, cross, distance, dot, isFiniteVec3, normalize, scale, segmentPointDistance, sub,
} from './vec3';

describe('vec3', () => {
  it('adds, subtracts and scales componentwise', () => {
    expect(add([1, 2, 3], [4, 5, 6])).toEqual([5, 7, 9]);
    expect(sub([4, 5, 6], [1, 2, 3])).toEqual([3, 3, 3]);
    expect(scale([1, 2, 3], 2)).toEqual([2, 4, 6]);
  });

  it('computes dot and cross products', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(cross([1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1]);
  });

  it('measures distance', () => {
    expect(distance([1, 2, 3], [4, 6, 3])).toBe(5);
  });

  it('normalizes to unit length', () => {
    const n = normalize([3, 0, 4]);
    expect(n[0]).toBeCloseTo(0.6, 12);
    expect(n[1]).toBe(0);
    expect(n[2]).toBeCloseTo(0.8, 12);
  });

  it('leaves the zero vector at zero', () => {
    expect(normalize(ZERO)).toBe(ZERO);
  });

  it('rejects NaN and infinite components', () => {
    expect(isFiniteVec3([1, 2, 3])).toBe(true);
    expect(isFiniteVec3([0, NaN, 0])).toBe(false);
    expect(isFiniteVec3([Infinity, 0, 0])).toBe(false);
  });

  describe('segmentPointDistance', () => {
    it('measures to the interior of the segment', () => {
      expect(segmentPointDistance([-1, 1, 0], [1, 1, 0], [0, 0, 0])).toBe(1);
    });

    it('clamps to the nearest endpoint', () => {
      expect(segmentPointDistance([1, 0, 0], [2, 0, 0], [0, 0, 0])).toBe(1);
    });

    it('treats a zero-length segment as a point', () => {
      expect(segmentPointDistance([0, 3, 4], [0, 3, 4], [0, 0, 0])).toBe(5);
    });
  });
});
