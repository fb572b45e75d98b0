// ============================================
// Collision System
// Laser vs ship overlap tests (AABB)
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { Components, Tags, aabbIntersects } from '#shared';
import type { Aabb, EntityId, Vec3 } from '#shared';
import type { GameWorld } from '../factories';
import { boundingBox, createPendingExplosion, getPlayerEntity } from '../factories';
import { markPlayerDead, releaseEnemy } from '../../helpers/lifecycle';
import { logEnemyKilled, logPlayerDeath } from '../../logger';

interface Collider {
  entity: EntityId;
  box: Aabb;
  position: Vec3;
}

/**
 * Live colliders carrying every listed tag, skipping anything already
 * queued for destruction this frame.
 */
function collidersWithTags(world: GameWorld, tags: string[]): Collider[] {
  const [first, ...rest] = tags;
  if (first === undefined) return [];

  const colliders: Collider[] = [];
  for (const entity of world.getEntitiesWithTag(first)) {
    if (world.isPendingDestroy(entity)) continue;
    if (!rest.every((tag) => world.hasTag(entity, tag))) continue;
    const collider = toCollider(world, entity);
    if (collider) colliders.push(collider);
  }
  return colliders;
}

function toCollider(world: GameWorld, entity: EntityId): Collider | null {
  const transform = world.getComponent(entity, Components.Transform);
  const size = world.getComponent(entity, Components.BoundingSize);
  if (!transform || !size) return null;
  return {
    entity,
    box: boundingBox(transform, size),
    position: { x: transform.x, y: transform.y, z: transform.z },
  };
}

/**
 * CollisionSystem - two independent passes per frame
 *
 * 1. Player lasers vs enemies: both destroyed, population decremented,
 *    explosion queued, kill event queued for the audio pass. Each entity
 *    is destroyed at most once even when it overlaps several others.
 * 2. Enemy lasers vs the player: first hit kills the player and ends
 *    the pass. An Invincible player is immune and lasers pass through.
 *
 * Priority: 400
 */
export class CollisionSystem implements System {
  readonly name = 'CollisionSystem';

  update(ctx: SystemContext): void {
    this.resolvePlayerLasers(ctx);
    this.resolveEnemyLasers(ctx);
  }

  private resolvePlayerLasers({ world, resources }: SystemContext): void {
    const lasers = collidersWithTags(world, [Tags.Laser, Tags.FromPlayer]);
    if (lasers.length === 0) return;
    const enemies = collidersWithTags(world, [Tags.Enemy]);

    const destroyed = new Set<EntityId>();

    for (const laser of lasers) {
      for (const enemy of enemies) {
        if (destroyed.has(laser.entity)) break;
        if (destroyed.has(enemy.entity)) continue;
        if (!aabbIntersects(laser.box, enemy.box)) continue;

        // Accounting first: an underflow must leave both entities untouched
        releaseEnemy(resources.enemies);

        world.requestDestroy(enemy.entity);
        world.requestDestroy(laser.entity);
        destroyed.add(enemy.entity);
        destroyed.add(laser.entity);

        createPendingExplosion(world, enemy.position);
        resources.killEvents.push({ entity: enemy.entity, position: enemy.position });
        logEnemyKilled(enemy.entity, resources.enemies.count);
      }
    }
  }

  private resolveEnemyLasers({ world, resources, bus }: SystemContext): void {
    const player = getPlayerEntity(world);
    if (player === undefined) return;
    if (world.hasComponent(player, Components.Invincible)) return;

    const target = toCollider(world, player);
    if (!target) return;

    for (const laser of collidersWithTags(world, [Tags.Laser, Tags.FromEnemy])) {
      if (!aabbIntersects(laser.box, target.box)) continue;

      const now = resources.time.elapsed;
      world.requestDestroy(player);
      world.requestDestroy(laser.entity);
      markPlayerDead(resources.player, now);
      createPendingExplosion(world, target.position);

      bus.emit({ type: 'playerDied', position: target.position, time: now });
      logPlayerDeath(target.position, now);
      // The player can only die once per frame
      break;
    }
  }
}
