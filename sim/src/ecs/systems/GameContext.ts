// ============================================
// System Context
// Everything a system may touch during one frame
// ============================================

import {
  GAME_CONFIG,
  createRepeatingTimer,
  emptyKeyState,
  mathRandom,
  type EnemyKilledEvent,
  type KeyState,
  type Playfield,
  type RandomSource,
  type RepeatingTimer,
} from '#shared';
import type { GameWorld } from '../factories';
import type { EventBus } from '../../events/EventBus';
import { EventQueue } from '../../events/EventQueue';
import { FormationMaker } from '../../helpers/formation';
import {
  createEnemyPopulation,
  createPlayerLifecycle,
  type EnemyPopulation,
  type PlayerLifecycleState,
} from '../../helpers/lifecycle';

export interface TimeResource {
  delta: number;   // Seconds in the current frame
  elapsed: number; // Seconds since the simulation started
}

/**
 * SimResources - process-wide state, passed explicitly instead of held in globals.
 */
export interface SimResources {
  time: TimeResource;
  playfield: Playfield;
  rng: RandomSource;
  keys: KeyState;
  player: PlayerLifecycleState;
  enemies: EnemyPopulation;
  formations: FormationMaker;
  killEvents: EventQueue<EnemyKilledEvent>;
  playerSpawnTimer: RepeatingTimer;
  enemySpawnTimer: RepeatingTimer;
}

/**
 * SystemContext - what every system receives each frame.
 */
export interface SystemContext {
  // ECS World (source of truth for entity state)
  world: GameWorld;

  // Seconds for this frame
  deltaTime: number;

  resources: SimResources;

  // Output to renderer / audio
  bus: EventBus;
}

export interface ResourceOptions {
  playfield?: Playfield;
  rng?: RandomSource;
  enemyMax?: number;
  formationBatchSize?: number;
}

export function createResources(options: ResourceOptions = {}): SimResources {
  return {
    time: { delta: 0, elapsed: 0 },
    playfield: options.playfield ?? {
      width: GAME_CONFIG.PLAYFIELD_WIDTH,
      height: GAME_CONFIG.PLAYFIELD_HEIGHT,
    },
    rng: options.rng ?? mathRandom,
    keys: emptyKeyState(),
    player: createPlayerLifecycle(),
    enemies: createEnemyPopulation(options.enemyMax),
    formations: new FormationMaker(options.formationBatchSize),
    killEvents: new EventQueue(),
    playerSpawnTimer: createRepeatingTimer(GAME_CONFIG.PLAYER_SPAWN_CHECK_INTERVAL),
    enemySpawnTimer: createRepeatingTimer(GAME_CONFIG.ENEMY_SPAWN_INTERVAL),
  };
}
