// ============================================
// Math Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { aabbFromCenter, aabbIntersects, clamp, normalize2 } from '../math';

describe('math utilities', () => {
  describe('clamp', () => {
    it('bounds values on both sides', () => {
      expect(clamp(5, 0, 10)).toBe(5);
      expect(clamp(-5, 0, 10)).toBe(0);
      expect(clamp(15, 0, 10)).toBe(10);
    });
  });

  describe('normalize2', () => {
    it('scales to unit length', () => {
      expect(normalize2({ x: 3, y: 4 })).toEqual({ x: 0.6, y: 0.8 });
    });

    it('leaves the zero vector at zero', () => {
      expect(normalize2({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    });
  });

  describe('aabb', () => {
    const box = aabbFromCenter({ x: 0, y: 0 }, { x: 10, y: 5 });

    it('builds from center and half extents', () => {
      expect(box).toEqual({ min: { x: -10, y: -5 }, max: { x: 10, y: 5 } });
    });

    it('detects overlap', () => {
      expect(aabbIntersects(box, aabbFromCenter({ x: 15, y: 0 }, { x: 10, y: 5 }))).toBe(true);
    });

    it('counts touching edges as overlap', () => {
      expect(aabbIntersects(box, aabbFromCenter({ x: 20, y: 0 }, { x: 10, y: 5 }))).toBe(true);
      expect(aabbIntersects(box, aabbFromCenter({ x: 0, y: -10 }, { x: 10, y: 5 }))).toBe(true);
    });

    it('rejects separated boxes on either axis', () => {
      expect(aabbIntersects(box, aabbFromCenter({ x: 20.5, y: 0 }, { x: 10, y: 5 }))).toBe(false);
      expect(aabbIntersects(box, aabbFromCenter({ x: 0, y: 10.5 }, { x: 10, y: 5 }))).toBe(false);
    });
  });
});
