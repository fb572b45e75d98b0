// ============================================
// ECS Core Types
// ============================================

import type { ComponentMap } from './components';

/**
 * Entity ID - arena slot index plus a generation counter, packed in one number.
 * id = index + generation * INDEX_SPACE
 */
export type EntityId = number;

export const INDEX_SPACE = 2 ** 20;

export function entityIndex(id: EntityId): number {
  return id % INDEX_SPACE;
}

export function entityGeneration(id: EntityId): number {
  return Math.floor(id / INDEX_SPACE);
}

export function makeEntityId(index: number, generation: number): EntityId {
  return index + generation * INDEX_SPACE;
}

/**
 * Standard component types used throughout the simulation.
 */
export const Components = {
  Transform: 'Transform',
  Velocity: 'Velocity',
  BoundingSize: 'BoundingSize',
  Movable: 'Movable',

  // Enemy flight path
  Formation: 'Formation',

  // Post-respawn shield
  Invincible: 'Invincible',

  // Explosion pipeline
  PendingExplosion: 'PendingExplosion',
  ExplosionAnimation: 'ExplosionAnimation',
} as const satisfies { readonly [K in keyof ComponentMap]: K };

export type ComponentType = (typeof Components)[keyof typeof Components];

/**
 * Entity tags - marker types with no data.
 */
export const Tags = {
  Player: 'player',
  Enemy: 'enemy',
  Laser: 'laser',
  FromPlayer: 'from_player',
  FromEnemy: 'from_enemy',
  Explosion: 'explosion',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];
