// ============================================
// Enemy Fire System
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { GAME_CONFIG, Tags, randomChance } from '#shared';
import { createLaser, describeSpawn, requireTransform } from '../factories';

/**
 * EnemyFireSystem - on a random frame (about once a second), every
 * enemy fires one laser straight down.
 *
 * Priority: 150
 */
export class EnemyFireSystem implements System {
  readonly name = 'EnemyFireSystem';

  update({ world, resources, bus }: SystemContext): void {
    if (!randomChance(resources.rng, GAME_CONFIG.ENEMY_FIRE_CHANCE)) return;

    world.forEachWithTag(Tags.Enemy, (enemy) => {
      if (world.isPendingDestroy(enemy)) return;
      const { x, y } = requireTransform(world, enemy);
      const laser = createLaser(world, 'enemy', { x, y: y - GAME_CONFIG.ENEMY_LASER_OFFSET_Y });
      bus.emit(describeSpawn(world, laser));
    });
  }
}
