// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import {
  GAME_CONFIG,
  World,
  ComponentStore,
  Components,
  Tags,
  aabbFromCenter,
  createRepeatingTimer,
} from '#shared';
import type {
  Aabb,
  ComponentMap,
  EntityId,
  EntityKind,
  EntitySpawnedEvent,
  FormationComponent,
  Playfield,
  TransformComponent,
  BoundingSizeComponent,
  VelocityComponent,
  MovableComponent,
  InvincibleComponent,
  PendingExplosionComponent,
  ExplosionAnimationComponent,
  Vec2,
  Vec3,
} from '#shared';

export type GameWorld = World<ComponentMap>;

// ============================================
// World Setup
// ============================================

/**
 * Create and configure an ECS World with all component stores registered.
 */
export function createWorld(): GameWorld {
  const world = new World<ComponentMap>();

  world.registerStore(Components.Transform, new ComponentStore<TransformComponent>());
  world.registerStore(Components.Velocity, new ComponentStore<VelocityComponent>());
  world.registerStore(Components.BoundingSize, new ComponentStore<BoundingSizeComponent>());
  world.registerStore(Components.Movable, new ComponentStore<MovableComponent>());
  world.registerStore(Components.Formation, new ComponentStore<FormationComponent>());
  world.registerStore(Components.Invincible, new ComponentStore<InvincibleComponent>());
  world.registerStore(Components.PendingExplosion, new ComponentStore<PendingExplosionComponent>());
  world.registerStore(Components.ExplosionAnimation, new ComponentStore<ExplosionAnimationComponent>());

  return world;
}

// ============================================
// Player
// ============================================

/**
 * Where a (re)spawned player appears: bottom center, just above the edge.
 */
export function playerSpawnPosition(playfield: Playfield): Vec3 {
  const bottom = -playfield.height / 2;
  return {
    x: 0,
    y: bottom + (GAME_CONFIG.PLAYER_HEIGHT / 2) * GAME_CONFIG.SPRITE_SCALE + GAME_CONFIG.PLAYER_SPAWN_GAP,
    z: GAME_CONFIG.SPRITE_DEPTH,
  };
}

/**
 * Create the player ship, standing still and shielded.
 */
export function createPlayer(world: GameWorld, playfield: Playfield): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Transform, {
    ...playerSpawnPosition(playfield),
    scale: GAME_CONFIG.SPRITE_SCALE,
  });
  world.addComponent(entity, Components.BoundingSize, {
    width: GAME_CONFIG.PLAYER_WIDTH,
    height: GAME_CONFIG.PLAYER_HEIGHT,
  });
  world.addComponent(entity, Components.Velocity, { x: 0, y: 0 });
  world.addComponent(entity, Components.Movable, { autoDespawn: false });
  world.addComponent(entity, Components.Invincible, {
    remaining: GAME_CONFIG.PLAYER_INVINCIBLE_DURATION,
  });

  world.addTag(entity, Tags.Player);
  return entity;
}

/**
 * The live player, if any. Zero players is normal (dead or not yet spawned).
 */
export function getPlayerEntity(world: GameWorld): EntityId | undefined {
  return world.getEntitiesWithTag(Tags.Player).find((entity) => !world.isPendingDestroy(entity));
}

// ============================================
// Enemies
// ============================================

/**
 * Create an enemy at its formation's start point.
 */
export function createEnemy(world: GameWorld, formation: FormationComponent): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Transform, {
    x: formation.start.x,
    y: formation.start.y,
    z: GAME_CONFIG.SPRITE_DEPTH,
    scale: GAME_CONFIG.SPRITE_SCALE,
  });
  world.addComponent(entity, Components.BoundingSize, {
    width: GAME_CONFIG.ENEMY_WIDTH,
    height: GAME_CONFIG.ENEMY_HEIGHT,
  });
  world.addComponent(entity, Components.Formation, formation);

  world.addTag(entity, Tags.Enemy);
  return entity;
}

// ============================================
// Lasers
// ============================================

export type LaserOwner = 'player' | 'enemy';

/**
 * Create a laser travelling straight up (player) or down (enemy).
 */
export function createLaser(world: GameWorld, owner: LaserOwner, position: Vec2): EntityId {
  const entity = world.createEntity();
  const fromPlayer = owner === 'player';

  world.addComponent(entity, Components.Transform, {
    x: position.x,
    y: position.y,
    z: 0,
    scale: GAME_CONFIG.SPRITE_SCALE,
  });
  world.addComponent(entity, Components.BoundingSize, {
    width: fromPlayer ? GAME_CONFIG.PLAYER_LASER_WIDTH : GAME_CONFIG.ENEMY_LASER_WIDTH,
    height: fromPlayer ? GAME_CONFIG.PLAYER_LASER_HEIGHT : GAME_CONFIG.ENEMY_LASER_HEIGHT,
  });
  world.addComponent(entity, Components.Velocity, { x: 0, y: fromPlayer ? 1 : -1 });
  world.addComponent(entity, Components.Movable, { autoDespawn: true });

  world.addTag(entity, Tags.Laser);
  world.addTag(entity, fromPlayer ? Tags.FromPlayer : Tags.FromEnemy);
  return entity;
}

// ============================================
// Explosions
// ============================================

/**
 * Marker entity: an explosion should appear here on the next explosion pass.
 */
export function createPendingExplosion(world: GameWorld, position: Vec3): EntityId {
  const entity = world.createEntity();
  world.addComponent(entity, Components.PendingExplosion, { ...position });
  return entity;
}

/**
 * Animated explosion, starting on frame 0.
 */
export function createExplosion(world: GameWorld, position: Vec3): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Transform, { ...position, scale: 1 });
  world.addComponent(entity, Components.ExplosionAnimation, {
    frame: 0,
    timer: createRepeatingTimer(GAME_CONFIG.EXPLOSION_FRAME_INTERVAL),
  });

  world.addTag(entity, Tags.Explosion);
  return entity;
}

// ============================================
// Queries
// ============================================

export function getEntityKind(world: GameWorld, entity: EntityId): EntityKind {
  if (world.hasTag(entity, Tags.Player)) return 'player';
  if (world.hasTag(entity, Tags.Enemy)) return 'enemy';
  if (world.hasTag(entity, Tags.Laser)) {
    return world.hasTag(entity, Tags.FromPlayer) ? 'playerLaser' : 'enemyLaser';
  }
  if (world.hasTag(entity, Tags.Explosion)) return 'explosion';
  return 'other';
}

/**
 * Build the creation notice a renderer needs for a freshly spawned entity.
 */
export function describeSpawn(world: GameWorld, entity: EntityId): EntitySpawnedEvent {
  const transform = requireTransform(world, entity);
  const size = world.getComponent(entity, Components.BoundingSize);
  return {
    type: 'entitySpawned',
    entity,
    kind: getEntityKind(world, entity),
    position: { x: transform.x, y: transform.y, z: transform.z },
    size: size ? { x: size.width, y: size.height } : null,
    scale: transform.scale,
  };
}

/**
 * Collision box: centered on the transform, half of the scaled size.
 */
export function boundingBox(transform: TransformComponent, size: BoundingSizeComponent): Aabb {
  return aabbFromCenter(
    { x: transform.x, y: transform.y },
    { x: (size.width * transform.scale) / 2, y: (size.height * transform.scale) / 2 }
  );
}

// ============================================
// Required Component Access
// Throws if component is missing (invariant violation).
// ============================================

export function requireTransform(world: GameWorld, entity: EntityId): TransformComponent {
  const comp = world.getComponent(entity, Components.Transform);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Transform missing on entity ${entity}`);
  }
  return comp;
}

export function requireFormation(world: GameWorld, entity: EntityId): FormationComponent {
  const comp = world.getComponent(entity, Components.Formation);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Formation missing on entity ${entity}`);
  }
  return comp;
}
