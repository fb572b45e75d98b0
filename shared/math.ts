// ============================================
// Shared Math Helpers
// Pure math functions for 2D geometry and collision
// ============================================

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Normalize a 2D vector to unit length
 * Returns the zero vector unchanged
 */
export function normalize2(v: Vec2): Vec2 {
  const mag = Math.sqrt(v.x * v.x + v.y * v.y);
  if (mag === 0) {
    return { x: 0, y: 0 };
  }
  return { x: v.x / mag, y: v.y / mag };
}

// ============================================
// Axis-Aligned Bounding Boxes
// ============================================

export interface Aabb {
  min: Vec2;
  max: Vec2;
}

/**
 * Build an AABB from its center and half extents
 */
export function aabbFromCenter(center: Vec2, halfSize: Vec2): Aabb {
  return {
    min: { x: center.x - halfSize.x, y: center.y - halfSize.y },
    max: { x: center.x + halfSize.x, y: center.y + halfSize.y },
  };
}

/**
 * Overlap test. Touching edges count as intersecting.
 */
export function aabbIntersects(a: Aabb, b: Aabb): boolean {
  return a.min.x <= b.max.x && a.max.x >= b.min.x && a.min.y <= b.max.y && a.max.y >= b.min.y;
}
