import { SeededRandom, mathRandom } from '#shared';
import { loadRunnerConfig } from './config';
import { createSimulation } from './simulation';
import { calculateAggregateStats } from './telemetry';
import {
  logger,
  perfLogger,
  logSimulationStarted,
  logSimulationStopped,
  logAggregateStats,
} from './logger';

// ============================================
// Headless Runner
// Steps the simulation on a fixed tick with no renderer attached
// ============================================

const config = loadRunnerConfig();
const TICK_INTERVAL = 1000 / config.tickRate;

const simulation = createSimulation({
  playfield: config.playfield,
  rng: config.seed === null ? mathRandom : new SeededRandom(config.seed),
});

simulation.bus.on('playerDied', ({ time }) => {
  logger.debug({ event: 'bus_player_died', time }, 'Player died');
});

logSimulationStarted({
  tickRate: config.tickRate,
  width: config.playfield.width,
  height: config.playfield.height,
  ...(config.seed === null ? {} : { seed: config.seed }),
});

// ============================================
// Tick Loop
// ============================================

// Track actual tick timing to detect variance
let lastTickTime = performance.now();

// Rolling stats for periodic performance logging
let tickTimesMs: number[] = [];
let lastPerfLogTime = performance.now();
const PERF_LOG_INTERVAL_MS = 10000;

const tickTimer = setInterval(() => {
  const now = performance.now();
  const actualDelta = now - lastTickTime;
  lastTickTime = now;

  // Fixed step: the simulation never sees wall-clock jitter
  const deltaTime = TICK_INTERVAL / 1000;

  const tickStart = performance.now();
  simulation.step(deltaTime);
  tickTimesMs.push(performance.now() - tickStart);

  // Ticks arriving much later than scheduled mean the host is starved
  if (actualDelta > TICK_INTERVAL * 2) {
    perfLogger.info(
      { event: 'tick_late', expectedMs: TICK_INTERVAL, actualMs: parseFloat(actualDelta.toFixed(1)) },
      `Tick arrived ${actualDelta.toFixed(1)}ms after the previous one`
    );
  }

  if (now - lastPerfLogTime >= PERF_LOG_INTERVAL_MS && tickTimesMs.length > 0) {
    const sorted = [...tickTimesMs].sort((a, b) => a - b);
    const avg = sorted.reduce((sum, ms) => sum + ms, 0) / sorted.length;
    const p95 = sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95))] ?? 0;
    const max = sorted[sorted.length - 1] ?? 0;
    perfLogger.info({
      event: 'tick_stats',
      ticks: sorted.length,
      avgMs: parseFloat(avg.toFixed(3)),
      p95Ms: parseFloat(p95.toFixed(3)),
      maxMs: parseFloat(max.toFixed(3)),
      world: simulation.world.getStats(),
    });
    tickTimesMs = [];
    lastPerfLogTime = now;
  }
}, TICK_INTERVAL);

// Aggregate stats (lightweight, periodic)
const statsTimer = setInterval(() => {
  logAggregateStats(calculateAggregateStats(simulation.world, simulation.resources));
}, config.statsIntervalMs);

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);

  clearInterval(tickTimer);
  clearInterval(statsTimer);
  simulation.bus.clear();
  logSimulationStopped(simulation.frames);

  // Give the log transports a moment to flush
  setTimeout(() => process.exit(0), 500);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
