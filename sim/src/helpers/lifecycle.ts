// ============================================
// Lifecycle State
// Player alive/dead tracking and enemy population accounting
// ============================================

import { GAME_CONFIG, hasDeadlinePassed } from '#shared';
import { logger } from '../logger';

// ============================================
// Player
// ============================================

export interface PlayerLifecycleState {
  alive: boolean;
  lastDeathTime: number | null; // null until the first death
}

export function createPlayerLifecycle(): PlayerLifecycleState {
  return { alive: false, lastDeathTime: null };
}

export function markPlayerDead(state: PlayerLifecycleState, time: number): void {
  state.alive = false;
  state.lastDeathTime = time;
}

export function markPlayerSpawned(state: PlayerLifecycleState): void {
  state.alive = true;
  state.lastDeathTime = null;
}

/**
 * Dead player becomes eligible once strictly past the respawn delay.
 * A player that never died spawns at the first check.
 */
export function isRespawnDue(
  state: PlayerLifecycleState,
  now: number,
  delay: number = GAME_CONFIG.PLAYER_RESPAWN_DELAY
): boolean {
  if (state.alive) return false;
  if (state.lastDeathTime === null) return true;
  return hasDeadlinePassed(state.lastDeathTime, delay, now);
}

// ============================================
// Enemy Population
// ============================================

export interface EnemyPopulation {
  count: number;
  max: number;
}

export function createEnemyPopulation(max: number = GAME_CONFIG.ENEMY_MAX): EnemyPopulation {
  return { count: 0, max };
}

export function hasEnemyCapacity(population: EnemyPopulation): boolean {
  return population.count < population.max;
}

export function admitEnemy(population: EnemyPopulation): void {
  population.count++;
}

/**
 * True for invariant errors that must stop the simulation outside production.
 */
export function isFatalInvariantError(error: unknown): error is Error {
  return error instanceof Error && error.name.endsWith('Underflow') && process.env.NODE_ENV !== 'production';
}

/**
 * Decrement on a confirmed kill. Going below zero means a kill was
 * counted twice: fatal outside production, clamped (and logged) in it.
 */
export function releaseEnemy(population: EnemyPopulation): void {
  if (population.count > 0) {
    population.count--;
    return;
  }

  if (process.env.NODE_ENV !== 'production') {
    const error = new Error('EnemyPopulationUnderflow: released an enemy while the count was 0');
    error.name = 'EnemyPopulationUnderflow';
    throw error;
  }
  logger.error({ event: 'enemy_population_underflow' }, 'Enemy population underflow, clamped to 0');
  population.count = 0;
}
