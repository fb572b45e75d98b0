// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags, entityIndex, entityGeneration, makeEntityId, INDEX_SPACE } from './types';
export type { EntityId, ComponentType, Tag } from './types';

// Component interfaces
export type {
  ComponentMap,
  TransformComponent,
  VelocityComponent,
  BoundingSizeComponent,
  MovableComponent,
  FormationComponent,
  InvincibleComponent,
  PendingExplosionComponent,
  ExplosionAnimationComponent,
} from './components';
