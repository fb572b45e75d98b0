// ============================================
// Formation Helpers
// Flight-path generation and parameter bounds for enemies
// ============================================

import { GAME_CONFIG, clamp, randomChance, randomRange } from '#shared';
import type { FormationComponent, Playfield, RandomSource, Vec2 } from '#shared';

export interface DriftDeltas {
  pivotDelta: Vec2;
  radiusDelta: Vec2;
  speedDelta: number;
}

/**
 * Roll fresh drift rates, each uniform in its symmetric range.
 */
export function rollDriftDeltas(rng: RandomSource): DriftDeltas {
  const pivot = GAME_CONFIG.FORMATION_PIVOT_DRIFT;
  const radius = GAME_CONFIG.FORMATION_RADIUS_DRIFT;
  const speed = GAME_CONFIG.FORMATION_SPEED_DRIFT;
  return {
    pivotDelta: { x: randomRange(rng, -pivot, pivot), y: randomRange(rng, -pivot, pivot) },
    radiusDelta: { x: randomRange(rng, -radius, radius), y: randomRange(rng, -radius, radius) },
    speedDelta: randomRange(rng, -speed, speed),
  };
}

/**
 * Box the pivot may wander in: the inner half-width, upper third minus a margin.
 */
export function pivotBounds(playfield: Playfield): { halfWidth: number; maxY: number } {
  return {
    halfWidth: playfield.width / 4,
    maxY: playfield.height / 3 - GAME_CONFIG.FORMATION_PIVOT_TOP_MARGIN,
  };
}

/**
 * Clamp pivot, radius and speed back into their ranges (in place).
 */
export function clampFormation(formation: FormationComponent, playfield: Playfield): void {
  const { halfWidth, maxY } = pivotBounds(playfield);
  const [rxMin, rxMax] = GAME_CONFIG.FORMATION_RADIUS_X_RANGE;
  const [ryMin, ryMax] = GAME_CONFIG.FORMATION_RADIUS_Y_RANGE;
  const [speedMin, speedMax] = GAME_CONFIG.FORMATION_SPEED_RANGE;

  formation.pivot.x = clamp(formation.pivot.x, -halfWidth, halfWidth);
  formation.pivot.y = clamp(formation.pivot.y, 0, maxY);
  formation.radius.x = clamp(formation.radius.x, rxMin, rxMax);
  formation.radius.y = clamp(formation.radius.y, ryMin, ryMax);
  formation.speed = clamp(
    formation.speed,
    GAME_CONFIG.BASE_SPEED * speedMin,
    GAME_CONFIG.BASE_SPEED * speedMax
  );
}

/**
 * Deep copy, so each enemy drifts its own parameters.
 */
export function cloneFormation(formation: FormationComponent): FormationComponent {
  return {
    ...formation,
    start: { ...formation.start },
    pivot: { ...formation.pivot },
    radius: { ...formation.radius },
    pivotDelta: { ...formation.pivotDelta },
    radiusDelta: { ...formation.radiusDelta },
  };
}

/**
 * FormationMaker - hands out flight paths in batches.
 *
 * The first enemy of a batch rolls a new template; the next
 * FORMATION_MEMBERS_MAX - 1 enemies get copies of it, so a cohort
 * flies the same ellipse.
 */
export class FormationMaker {
  private template: FormationComponent | null = null;
  private members = 0;

  constructor(private readonly batchSize: number = GAME_CONFIG.FORMATION_MEMBERS_MAX) {}

  make(playfield: Playfield, rng: RandomSource): FormationComponent {
    if (this.template && this.members < this.batchSize) {
      this.members++;
      return cloneFormation(this.template);
    }

    const formation = this.roll(playfield, rng);
    this.template = cloneFormation(formation);
    this.members = 1;
    return formation;
  }

  /** Members issued against the current template */
  get issued(): number {
    return this.members;
  }

  private roll(playfield: Playfield, rng: RandomSource): FormationComponent {
    // Start just outside the left or right edge
    const startSpanX = playfield.width / 2 + GAME_CONFIG.FORMATION_START_MARGIN;
    const startSpanY = playfield.height / 2 + GAME_CONFIG.FORMATION_START_MARGIN;
    const start = {
      x: randomChance(rng, 0.5) ? startSpanX : -startSpanX,
      y: randomRange(rng, -startSpanY, startSpanY),
    };

    const { halfWidth, maxY } = pivotBounds(playfield);
    const pivot = {
      x: randomRange(rng, -halfWidth, halfWidth),
      y: randomRange(rng, 0, maxY),
    };

    const radius = {
      x: randomRange(rng, GAME_CONFIG.FORMATION_RADIUS_X_MIN, GAME_CONFIG.FORMATION_RADIUS_X_MAX),
      y: GAME_CONFIG.FORMATION_RADIUS_Y,
    };

    return {
      start,
      pivot,
      radius,
      speed: GAME_CONFIG.BASE_SPEED,
      angle: Math.atan2(start.y - pivot.y, start.x - pivot.x),
      changeTimer: 0,
      ...rollDriftDeltas(rng),
    };
  }
}
