// ============================================
// Invincibility System
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { Components } from '#shared';

/**
 * InvincibilitySystem - counts down the spawn shield and removes it
 * once it runs out.
 *
 * Priority: 510
 */
export class InvincibilitySystem implements System {
  readonly name = 'InvincibilitySystem';

  update({ world, deltaTime }: SystemContext): void {
    for (const entity of world.query(Components.Invincible)) {
      const shield = world.getComponent(entity, Components.Invincible);
      if (!shield) continue;

      shield.remaining -= deltaTime;
      if (shield.remaining <= 0) {
        world.removeComponent(entity, Components.Invincible);
      }
    }
  }
}
