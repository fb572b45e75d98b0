// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { Vec2 } from '../math';
import type { RepeatingTimer } from '../timers';

// ============================================
// Core Components
// ============================================

/**
 * Transform - world translation, draw depth and uniform scale.
 * Origin is the playfield center, +y is up.
 * Mutated by exactly one integrator per entity.
 */
export interface TransformComponent {
  x: number;
  y: number;
  z: number;     // Draw order only
  scale: number;
}

/**
 * Velocity - unit-ish direction, scaled by BASE_SPEED when integrated.
 */
export interface VelocityComponent {
  x: number;
  y: number;
}

/**
 * BoundingSize - unscaled sprite extent used for AABB collision.
 */
export interface BoundingSizeComponent {
  width: number;
  height: number;
}

/**
 * Movable - marks entities driven by linear motion.
 */
export interface MovableComponent {
  autoDespawn: boolean; // Destroy once outside the playfield margin
}

// ============================================
// Enemy Components
// ============================================

/**
 * Formation - elliptical flight path with slowly drifting parameters.
 * radius.x in [50, 200], radius.y in [50, 150], speed in [0.5, 1.5] * BASE_SPEED.
 */
export interface FormationComponent {
  start: Vec2;         // Spawn point (its x sign fixes the travel direction)
  pivot: Vec2;         // Ellipse center
  radius: Vec2;        // Semi-axes
  speed: number;
  angle: number;       // Last locked-in angle on the ellipse
  changeTimer: number; // Seconds since deltas were last re-rolled
  pivotDelta: Vec2;    // Per-second drift
  radiusDelta: Vec2;
  speedDelta: number;
}

// ============================================
// Player Components
// ============================================

/**
 * Invincible - post-respawn shield against enemy fire.
 */
export interface InvincibleComponent {
  remaining: number; // Seconds left
}

// ============================================
// Explosion Components
// ============================================

/**
 * PendingExplosion - "something died here", materialized next explosion pass.
 */
export interface PendingExplosionComponent {
  x: number;
  y: number;
  z: number;
}

/**
 * ExplosionAnimation - sprite-sheet frame index advanced on a repeating timer.
 */
export interface ExplosionAnimationComponent {
  frame: number;
  timer: RepeatingTimer;
}

// ============================================
// Component Map
// ============================================

/**
 * Component type -> data shape. Drives the typed World API.
 */
export interface ComponentMap {
  Transform: TransformComponent;
  Velocity: VelocityComponent;
  BoundingSize: BoundingSizeComponent;
  Movable: MovableComponent;
  Formation: FormationComponent;
  Invincible: InvincibleComponent;
  PendingExplosion: PendingExplosionComponent;
  ExplosionAnimation: ExplosionAnimationComponent;
}
