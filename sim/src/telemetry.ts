// ============================================
// Telemetry Module
// Aggregate simulation statistics for periodic logging
// ============================================

import { Components, Tags } from '#shared';
import { getPlayerEntity, type GameWorld, type SimResources } from './ecs';

/**
 * Aggregate statistics about the simulation state
 */
export interface AggregateStats {
  elapsed: number;
  entities: number;
  enemies: number;
  enemyPopulation: number;
  playerLasers: number;
  enemyLasers: number;
  explosions: number;
  playerAlive: boolean;
  playerInvincible: boolean;
}

export function calculateAggregateStats(world: GameWorld, resources: SimResources): AggregateStats {
  let playerLasers = 0;
  let enemyLasers = 0;
  world.forEachWithTag(Tags.Laser, (laser) => {
    if (world.hasTag(laser, Tags.FromPlayer)) playerLasers++;
    else enemyLasers++;
  });

  const player = getPlayerEntity(world);

  return {
    elapsed: resources.time.elapsed,
    entities: world.entityCount,
    enemies: world.getEntitiesWithTag(Tags.Enemy).length,
    enemyPopulation: resources.enemies.count,
    playerLasers,
    enemyLasers,
    explosions: world.getEntitiesWithTag(Tags.Explosion).length,
    playerAlive: player !== undefined,
    playerInvincible: player !== undefined && world.hasComponent(player, Components.Invincible),
  };
}
