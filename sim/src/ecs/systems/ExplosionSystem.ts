// ============================================
// Explosion System
// Materializes pending explosions and plays them through once
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { GAME_CONFIG, Components, tickRepeatingTimer } from '#shared';
import { createExplosion, describeSpawn } from '../factories';

/**
 * ExplosionSystem - PendingExplosion markers become animated explosions
 *
 * Existing explosions advance one sheet frame per timer period and are
 * destroyed once the frame index reaches EXPLOSION_FRAME_COUNT. Markers
 * are materialized after the animation pass, so a fresh explosion shows
 * frame 0 for its whole first period.
 *
 * Priority: 500
 */
export class ExplosionSystem implements System {
  readonly name = 'ExplosionSystem';

  update(ctx: SystemContext): void {
    this.animate(ctx);
    this.materialize(ctx);
  }

  private animate({ world, deltaTime, bus }: SystemContext): void {
    for (const entity of world.query(Components.ExplosionAnimation)) {
      if (world.isPendingDestroy(entity)) continue;
      const animation = world.getComponent(entity, Components.ExplosionAnimation);
      if (!animation) continue;

      const periods = tickRepeatingTimer(animation.timer, deltaTime);
      for (let i = 0; i < periods; i++) {
        animation.frame++;
        if (animation.frame >= GAME_CONFIG.EXPLOSION_FRAME_COUNT) {
          world.requestDestroy(entity);
          break;
        }
        bus.emit({ type: 'explosionFrame', entity, frame: animation.frame });
      }
    }
  }

  private materialize({ world, bus }: SystemContext): void {
    for (const marker of world.query(Components.PendingExplosion)) {
      if (world.isPendingDestroy(marker)) continue;
      const position = world.getComponent(marker, Components.PendingExplosion);
      if (!position) continue;

      const explosion = createExplosion(world, { x: position.x, y: position.y, z: position.z });
      world.requestDestroy(marker);
      bus.emit(describeSpawn(world, explosion));
    }
  }
}
