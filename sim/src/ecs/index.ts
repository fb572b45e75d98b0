// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, ComponentStore, Components, Tags } from '#shared';
export type {
  EntityId,
  ComponentType,
  ComponentMap,
  // Component interfaces
  TransformComponent,
  VelocityComponent,
  BoundingSizeComponent,
  MovableComponent,
  FormationComponent,
  InvincibleComponent,
  PendingExplosionComponent,
  ExplosionAnimationComponent,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  createPlayer,
  createEnemy,
  createLaser,
  createPendingExplosion,
  createExplosion,
  playerSpawnPosition,
  getPlayerEntity,
  getEntityKind,
  describeSpawn,
  boundingBox,
  requireTransform,
  requireFormation,
} from './factories';
export type { GameWorld, LaserOwner } from './factories';

// Systems
export * from './systems';
