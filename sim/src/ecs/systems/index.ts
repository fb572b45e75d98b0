// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';
export type { SystemContext, SimResources, TimeResource, ResourceOptions } from './GameContext';
export { createResources } from './GameContext';

// Runner
export { SystemRunner } from './SystemRunner';

// Lifecycle Systems
export { PlayerSpawnSystem } from './PlayerSpawnSystem';
export { EnemySpawnSystem } from './EnemySpawnSystem';
export { InvincibilitySystem } from './InvincibilitySystem';
export { ExplosionSystem } from './ExplosionSystem';

// Intent Systems
export { InputSystem } from './InputSystem';
export { EnemyFireSystem } from './EnemyFireSystem';

// Motion Systems
export { LinearMotionSystem, isOutsidePlayfield } from './LinearMotionSystem';
export { FormationSystem, driftFormation, trackEllipse } from './FormationSystem';
export type { TrackingStep } from './FormationSystem';

// Collision Systems
export { CollisionSystem } from './CollisionSystem';

// Output Systems
export { ExplosionAudioSystem } from './ExplosionAudioSystem';
