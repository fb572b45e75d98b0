// ============================================
// ECS System Types
// ============================================

import type { SystemContext } from './GameContext';

/**
 * Base System interface
 * All simulation systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called once per simulated frame
   */
  update(ctx: SystemContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Player respawn check
 * 2. Enemy spawn (fixed cadence)
 * 3. Input translation
 * 4. Enemy fire
 * 5. Linear motion (player, lasers)
 * 6. Formation flight (enemies)
 * 7. Collisions
 * 8. Explosions, invincibility countdown
 * 9. Audio cues
 */
export const SystemPriority = {
  // Lifecycle - runs first
  PLAYER_SPAWN: 50,
  ENEMY_SPAWN: 60,

  // Intent
  INPUT: 100,
  ENEMY_FIRE: 150,

  // Integrators (mutually exclusive per entity)
  LINEAR_MOTION: 200,
  FORMATION: 300,

  // Collisions, after everything has moved
  COLLISION: 400,

  // Lifecycle ticks
  EXPLOSION: 500,
  INVINCIBILITY: 510,

  // Output - runs last
  AUDIO: 900,
} as const;
