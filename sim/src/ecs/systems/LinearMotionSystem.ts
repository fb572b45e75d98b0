// ============================================
// Linear Motion System
// Straight-line integration for the player and lasers
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { GAME_CONFIG, Components, Tags, clamp } from '#shared';
import type { Playfield, TransformComponent } from '#shared';

/**
 * True once a point is further than `margin` outside the playfield.
 */
export function isOutsidePlayfield(x: number, y: number, playfield: Playfield, margin: number): boolean {
  const halfW = playfield.width / 2 + margin;
  const halfH = playfield.height / 2 + margin;
  return y > halfH || y < -halfH || x > halfW || x < -halfW;
}

/**
 * LinearMotionSystem - position += velocity * dt * BASE_SPEED
 *
 * Runs on Velocity + Movable entities. Enemies carry a Formation and are
 * excluded, so each entity has exactly one integrator. Auto-despawn
 * entities leaving the playfield (plus DESPAWN_MARGIN) are queued for
 * destruction; the player is kept fully on screen.
 *
 * Priority: 200
 */
export class LinearMotionSystem implements System {
  readonly name = 'LinearMotionSystem';

  update({ world, deltaTime, resources }: SystemContext): void {
    const { playfield } = resources;
    const movers = world.queryWithout(
      [Components.Transform, Components.Velocity, Components.Movable],
      [Components.Formation]
    );

    for (const entity of movers) {
      if (world.isPendingDestroy(entity)) continue;
      const transform = world.getComponent(entity, Components.Transform);
      const velocity = world.getComponent(entity, Components.Velocity);
      const movable = world.getComponent(entity, Components.Movable);
      if (!transform || !velocity || !movable) continue;

      transform.x += velocity.x * deltaTime * GAME_CONFIG.BASE_SPEED;
      transform.y += velocity.y * deltaTime * GAME_CONFIG.BASE_SPEED;

      if (world.hasTag(entity, Tags.Player)) {
        const size = world.getComponent(entity, Components.BoundingSize);
        if (size) keepOnScreen(transform, size.width, size.height, playfield);
      }

      if (movable.autoDespawn && isOutsidePlayfield(transform.x, transform.y, playfield, GAME_CONFIG.DESPAWN_MARGIN)) {
        world.requestDestroy(entity);
      }
    }
  }
}

function keepOnScreen(transform: TransformComponent, width: number, height: number, playfield: Playfield): void {
  const halfW = (width * transform.scale) / 2;
  const halfH = (height * transform.scale) / 2;
  transform.x = clamp(transform.x, -playfield.width / 2 + halfW, playfield.width / 2 - halfW);
  transform.y = clamp(transform.y, -playfield.height / 2 + halfH, playfield.height / 2 - halfH);
}
