// ============================================
// Player Spawn System
// Brings the player back once the respawn delay has passed
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { tickRepeatingTimer } from '#shared';
import { createPlayer, describeSpawn } from '../factories';
import { isRespawnDue, markPlayerSpawned } from '../../helpers/lifecycle';
import { logPlayerRespawn } from '../../logger';

/**
 * PlayerSpawnSystem - fixed-cadence respawn check
 *
 * Checks every PLAYER_SPAWN_CHECK_INTERVAL of simulated time. A new
 * player appears at bottom center with zero velocity and a temporary
 * Invincible shield.
 *
 * Priority: 50 (runs first)
 */
export class PlayerSpawnSystem implements System {
  readonly name = 'PlayerSpawnSystem';

  update({ world, deltaTime, resources, bus }: SystemContext): void {
    if (tickRepeatingTimer(resources.playerSpawnTimer, deltaTime) === 0) return;

    const now = resources.time.elapsed;
    if (!isRespawnDue(resources.player, now)) return;

    const entity = createPlayer(world, resources.playfield);
    markPlayerSpawned(resources.player);

    bus.emit(describeSpawn(world, entity));
    bus.emit({ type: 'playerRespawned', entity, time: now });
    logPlayerRespawn(entity, now);
  }
}
