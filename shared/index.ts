// ============================================
// Shared Types & Constants
// Used by the simulation and its collaborators
// ============================================

// ECS Module - entity store, components, tags
export * from './ecs';

// Math utilities - vectors, clamping, AABB overlap
export * from './math';

// Fixed-step timers
export * from './timers';

// Injectable random sources
export * from './random';

// Game constants (GAME_CONFIG)
export * from './constants';

// Type definitions (Playfield, KeyState, ...)
export * from './types';

// Output event types (simulation -> renderer/audio)
export * from './events';
