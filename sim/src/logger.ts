import pino from 'pino';
import type { Vec3 } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'sim.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (spawns, kills, deaths, respawns)
export const logger = createLogger('sim.log', 'sim');

// Frame timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

export function logSimulationStarted(config: { tickRate: number; width: number; height: number; seed?: number }) {
  logger.info({ ...config, event: 'simulation_started' }, `Simulation running at ${config.tickRate} ticks/s`);
}

export function logSimulationStopped(frames: number) {
  logger.info({ frames, event: 'simulation_stopped' }, `Simulation stopped after ${frames} frames`);
}

export function logPlayerRespawn(entity: number, time: number) {
  logger.info({ entity, time, event: 'player_respawned' }, 'Player respawned');
}

export function logPlayerDeath(position: Vec3, time: number) {
  logger.info(
    { position, time, event: 'player_died' },
    `Player shot down at (${position.x.toFixed(0)}, ${position.y.toFixed(0)})`
  );
}

export function logEnemySpawned(entity: number, population: number) {
  logger.debug({ entity, population, event: 'enemy_spawned' }, `Enemy spawned (${population} alive)`);
}

export function logEnemyKilled(entity: number, population: number) {
  logger.info({ entity, population, event: 'enemy_killed' }, `Enemy destroyed (${population} left)`);
}

/**
 * Log aggregate simulation statistics (lightweight, periodic)
 */
export function logAggregateStats(stats: {
  elapsed: number;
  entities: number;
  enemies: number;
  enemyPopulation: number;
  playerLasers: number;
  enemyLasers: number;
  explosions: number;
  playerAlive: boolean;
  playerInvincible: boolean;
}) {
  logger.info(
    { ...stats, event: 'aggregate_stats' },
    `Stats: ${stats.entities} entities, ${stats.enemies} enemies, ${stats.playerLasers + stats.enemyLasers} lasers, player ${stats.playerAlive ? 'alive' : 'down'}`
  );
}
