// ============================================
// Runner Configuration
// Environment-driven settings for the headless runner
// ============================================

import { GAME_CONFIG, type Playfield } from '#shared';

export interface RunnerConfig {
  tickRate: number;        // Frames per second
  seed: number | null;     // null: unseeded Math.random
  playfield: Playfield;
  statsIntervalMs: number; // Aggregate stats cadence
}

export const DEFAULT_STATS_INTERVAL_MS = 10000;

/**
 * Parse a positive number, falling back when missing or invalid.
 */
function positiveNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseSeed(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) ? value : null;
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    tickRate: positiveNumber(env.SIM_TICK_RATE, GAME_CONFIG.TICK_RATE),
    seed: parseSeed(env.SIM_SEED),
    playfield: {
      width: positiveNumber(env.SIM_WIDTH, GAME_CONFIG.PLAYFIELD_WIDTH),
      height: positiveNumber(env.SIM_HEIGHT, GAME_CONFIG.PLAYFIELD_HEIGHT),
    },
    statsIntervalMs: positiveNumber(env.SIM_STATS_INTERVAL_MS, DEFAULT_STATS_INTERVAL_MS),
  };
}
