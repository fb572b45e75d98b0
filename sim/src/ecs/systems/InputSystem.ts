// ============================================
// Input System
// Translates key state into player velocity and laser fire
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { GAME_CONFIG, Components, normalize2 } from '#shared';
import { createLaser, describeSpawn, getPlayerEntity, requireTransform } from '../factories';

/**
 * InputSystem - arrow keys steer, fire launches a pair of lasers
 *
 * Diagonals are normalized so every direction moves at PLAYER_SPEED.
 * The fire edge is consumed here whether or not a player is alive.
 *
 * Priority: 100
 */
export class InputSystem implements System {
  readonly name = 'InputSystem';

  update({ world, resources, bus }: SystemContext): void {
    const keys = resources.keys;
    const firePressed = keys.fire;
    keys.fire = false;

    const player = getPlayerEntity(world);
    if (player === undefined) return;

    const velocity = world.getComponent(player, Components.Velocity);
    if (velocity) {
      const direction = normalize2({
        x: (keys.right ? 1 : 0) - (keys.left ? 1 : 0),
        y: (keys.up ? 1 : 0) - (keys.down ? 1 : 0),
      });
      velocity.x = direction.x * GAME_CONFIG.PLAYER_SPEED;
      velocity.y = direction.y * GAME_CONFIG.PLAYER_SPEED;
    }

    if (!firePressed) return;

    const { x, y } = requireTransform(world, player);
    const offsetX = (GAME_CONFIG.PLAYER_WIDTH / 2) * GAME_CONFIG.SPRITE_SCALE - GAME_CONFIG.PLAYER_LASER_EDGE_INSET;
    for (const side of [offsetX, -offsetX]) {
      const laser = createLaser(world, 'player', { x: x + side, y: y + GAME_CONFIG.PLAYER_LASER_OFFSET_Y });
      bus.emit(describeSpawn(world, laser));
    }
  }
}
