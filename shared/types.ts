// ============================================
// Shared Type Definitions
// ============================================

/**
 * Playfield extent, resolved once at startup.
 * Coordinates run from -width/2..width/2 and -height/2..height/2.
 */
export interface Playfield {
  width: number;
  height: number;
}

/**
 * Discrete key state for one frame.
 * Directions are held states; `fire` is the just-pressed edge.
 */
export interface KeyState {
  left: boolean;
  right: boolean;
  up: boolean;
  down: boolean;
  fire: boolean;
}

export function emptyKeyState(): KeyState {
  return { left: false, right: false, up: false, down: false, fire: false };
}

export type EntityKind = 'player' | 'enemy' | 'playerLaser' | 'enemyLaser' | 'explosion' | 'other';

export type SoundCue = 'enemy_explosion';
