// ============================================
// Simulation Output Events
// Simulation -> renderer / audio collaborators
// ============================================

import type { EntityId } from './ecs';
import type { Vec2, Vec3 } from './math';
import type { EntityKind, SoundCue } from './types';

export interface EntitySpawnedEvent {
  type: 'entitySpawned';
  entity: EntityId;
  kind: EntityKind;
  position: Vec3;
  size: Vec2 | null; // Unscaled bounding size, null for explosions
  scale: number;
}

export interface EntityDestroyedEvent {
  type: 'entityDestroyed';
  entity: EntityId;
  kind: EntityKind;
}

export interface ExplosionFrameEvent {
  type: 'explosionFrame';
  entity: EntityId;
  frame: number;
}

export interface PlayerDiedEvent {
  type: 'playerDied';
  position: Vec3;
  time: number;
}

export interface PlayerRespawnedEvent {
  type: 'playerRespawned';
  entity: EntityId;
  time: number;
}

export interface PlaySoundEvent {
  type: 'playSound';
  sound: SoundCue;
}

export type SimEvent =
  | EntitySpawnedEvent
  | EntityDestroyedEvent
  | ExplosionFrameEvent
  | PlayerDiedEvent
  | PlayerRespawnedEvent
  | PlaySoundEvent;

/**
 * Internal kill notice, queued by collision and drained once per frame.
 */
export interface EnemyKilledEvent {
  entity: EntityId;
  position: Vec3;
}
