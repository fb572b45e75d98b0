// ============================================
// Enemy Spawn System
// Adds enemies on a fixed cadence up to the population cap
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { tickRepeatingTimer } from '#shared';
import { createEnemy, describeSpawn } from '../factories';
import { admitEnemy, hasEnemyCapacity } from '../../helpers/lifecycle';
import { logEnemySpawned } from '../../logger';

/**
 * EnemySpawnSystem - one spawn attempt per ENEMY_SPAWN_INTERVAL
 *
 * Each enemy takes its flight path from the FormationMaker, so
 * consecutive spawns share a template until the batch is full.
 *
 * Priority: 60
 */
export class EnemySpawnSystem implements System {
  readonly name = 'EnemySpawnSystem';

  update({ world, deltaTime, resources, bus }: SystemContext): void {
    if (tickRepeatingTimer(resources.enemySpawnTimer, deltaTime) === 0) return;
    if (!hasEnemyCapacity(resources.enemies)) return;

    const formation = resources.formations.make(resources.playfield, resources.rng);
    const entity = createEnemy(world, formation);
    admitEnemy(resources.enemies);

    bus.emit(describeSpawn(world, entity));
    logEnemySpawned(entity, resources.enemies.count);
  }
}
