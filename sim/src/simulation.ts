// ============================================
// Simulation
// Wires world, resources, output bus and systems into one steppable unit
// ============================================

import type { KeyState } from '#shared';
import { EventBus } from './events/EventBus';
import {
  createWorld,
  createResources,
  SystemRunner,
  SystemPriority,
  PlayerSpawnSystem,
  EnemySpawnSystem,
  InputSystem,
  EnemyFireSystem,
  LinearMotionSystem,
  FormationSystem,
  CollisionSystem,
  ExplosionSystem,
  InvincibilitySystem,
  ExplosionAudioSystem,
  type GameWorld,
  type ResourceOptions,
  type SimResources,
} from './ecs';

export type SimulationOptions = ResourceOptions;

export interface Simulation {
  readonly world: GameWorld;
  readonly resources: SimResources;
  readonly bus: EventBus;
  readonly runner: SystemRunner;
  /** Frames stepped so far */
  readonly frames: number;
  /** Advance one frame by `deltaTime` seconds */
  step(deltaTime: number): void;
  /** Replace the held keys; `fire` stays set until the next frame consumes it */
  setKeys(keys: Partial<KeyState>): void;
}

/**
 * Register every system in frame order.
 */
export function registerSystems(runner: SystemRunner): void {
  runner.register(new PlayerSpawnSystem(), SystemPriority.PLAYER_SPAWN);
  runner.register(new EnemySpawnSystem(), SystemPriority.ENEMY_SPAWN);
  runner.register(new InputSystem(), SystemPriority.INPUT);
  runner.register(new EnemyFireSystem(), SystemPriority.ENEMY_FIRE);
  runner.register(new LinearMotionSystem(), SystemPriority.LINEAR_MOTION);
  runner.register(new FormationSystem(), SystemPriority.FORMATION);
  runner.register(new CollisionSystem(), SystemPriority.COLLISION);
  runner.register(new ExplosionSystem(), SystemPriority.EXPLOSION);
  runner.register(new InvincibilitySystem(), SystemPriority.INVINCIBILITY);
  runner.register(new ExplosionAudioSystem(), SystemPriority.AUDIO);
}

export function createSimulation(options: SimulationOptions = {}): Simulation {
  const world = createWorld();
  const resources = createResources(options);
  const bus = new EventBus();
  const runner = new SystemRunner();
  registerSystems(runner);

  let frames = 0;

  return {
    world,
    resources,
    bus,
    runner,
    get frames() {
      return frames;
    },
    step(deltaTime: number) {
      if (!Number.isFinite(deltaTime) || deltaTime < 0) {
        throw new Error(`InvalidDeltaTime: frame delta must be a finite non-negative number, got ${deltaTime}`);
      }
      runner.update(world, resources, bus, deltaTime);
      frames++;
    },
    setKeys(keys: Partial<KeyState>) {
      const held = resources.keys;
      held.left = keys.left ?? held.left;
      held.right = keys.right ?? held.right;
      held.up = keys.up ?? held.up;
      held.down = keys.down ?? held.down;
      // Only a fresh press sets the edge; releasing does not cancel an unconsumed press
      if (keys.fire) held.fire = true;
    },
  };
}
