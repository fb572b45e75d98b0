// ============================================
// FormationSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { GAME_CONFIG } from '#shared';
import { FormationSystem, driftFormation, trackEllipse } from '../FormationSystem';
import {
  FRAME,
  PLAYFIELD,
  constantRandom,
  createTestContext,
  makeFormation,
  scriptedRandom,
  type TestContext,
} from './testUtils';
import { createEnemy, requireFormation, requireTransform } from '../../factories';

// One frame of angular advance on a 100x100 ellipse at base speed
const FRAME_ANGLE = (GAME_CONFIG.BASE_SPEED * FRAME) / ((100 * Math.PI) / 2);

describe('trackEllipse', () => {
  it('targets the next point on the ellipse', () => {
    const step = trackEllipse({ x: 0, y: 0 }, makeFormation(), FRAME);

    expect(step.angle).toBeCloseTo(FRAME_ANGLE, 10);
    expect(step.target.x).toBeCloseTo(100 * Math.cos(FRAME_ANGLE), 10);
    expect(step.target.y).toBeCloseTo(100 * Math.sin(FRAME_ANGLE), 10);
  });

  it('runs clockwise for formations entering from the right', () => {
    const step = trackEllipse({ x: 0, y: 0 }, makeFormation({ start: { x: 399, y: 0 } }), FRAME);

    expect(step.angle).toBeCloseTo(-FRAME_ANGLE, 10);
  });

  it('moves at most speed * dt toward the target', () => {
    const position = { x: -399, y: 0 };
    const step = trackEllipse(position, makeFormation(), FRAME);

    const before = Math.hypot(position.x - step.target.x, position.y - step.target.y);
    const after = Math.hypot(step.position.x - step.target.x, step.position.y - step.target.y);
    const moved = Math.hypot(step.position.x - position.x, step.position.y - position.y);

    expect(moved).toBeCloseTo(GAME_CONFIG.BASE_SPEED * FRAME, 6);
    expect(after).toBeCloseTo(before - GAME_CONFIG.BASE_SPEED * FRAME, 6);
    expect(step.angleLocked).toBe(false);
  });

  it('snaps onto the target instead of overshooting', () => {
    const formation = makeFormation();
    const { target } = trackEllipse({ x: 0, y: 0 }, formation, FRAME);

    const step = trackEllipse({ x: target.x + 1, y: target.y }, formation, FRAME);

    expect(step.position).toEqual(target);
    expect(step.angleLocked).toBe(true);
  });

  it('stays put when already on the target', () => {
    const formation = makeFormation();
    const { target } = trackEllipse({ x: 0, y: 0 }, formation, FRAME);

    const step = trackEllipse({ ...target }, formation, FRAME);

    expect(step.position).toEqual(target);
    expect(step.angleLocked).toBe(true);
  });

  it('produces finite values with a zero frame delta', () => {
    const step = trackEllipse({ x: 100, y: 0 }, makeFormation(), 0);

    expect(step.position).toEqual({ x: 100, y: 0 });
    expect(step.angle).toBe(0);
    expect(step.angleLocked).toBe(false);
  });
});

describe('driftFormation', () => {
  it('applies the current deltas without re-rolling before the change interval', () => {
    const rng = scriptedRandom([0.5]);
    const formation = makeFormation({
      pivotDelta: { x: 4, y: 2 },
      radiusDelta: { x: -2, y: 6 },
      speedDelta: 10,
    });

    driftFormation(formation, 0.5, PLAYFIELD, rng);

    expect(rng.calls).toBe(0);
    expect(formation.changeTimer).toBe(0.5);
    expect(formation.pivot).toEqual({ x: 2, y: 1 });
    expect(formation.radius).toEqual({ x: 99, y: 103 });
    expect(formation.speed).toBe(505);
  });

  it('re-rolls the deltas once the change timer passes the interval', () => {
    const formation = makeFormation({ changeTimer: 0.4 });

    driftFormation(formation, 0.2, PLAYFIELD, constantRandom(0.75));

    expect(formation.changeTimer).toBe(0);
    expect(formation.pivotDelta).toEqual({ x: 10, y: 10 });
    expect(formation.radiusDelta).toEqual({ x: 5, y: 5 });
    expect(formation.speedDelta).toBe(5);
    expect(formation.pivot.x).toBeCloseTo(2, 10);
    expect(formation.radius.x).toBeCloseTo(101, 10);
    expect(formation.speed).toBeCloseTo(501, 10);
  });

  it('clamps drifted parameters into their ranges', () => {
    const formation = makeFormation({
      pivot: { x: -149, y: 170 },
      pivotDelta: { x: -20, y: 20 },
      radius: { x: 52, y: 148 },
      radiusDelta: { x: -10, y: 10 },
      speed: 748,
      speedDelta: 10,
    });

    driftFormation(formation, 0.5, PLAYFIELD, constantRandom(0.5));

    expect(formation.pivot.x).toBe(-PLAYFIELD.width / 4);
    expect(formation.pivot.y).toBeCloseTo(PLAYFIELD.height / 3 - 50, 10);
    expect(formation.radius).toEqual({ x: 50, y: 150 });
    expect(formation.speed).toBe(750);
  });
});

describe('FormationSystem', () => {
  let ctx: TestContext;
  let system: FormationSystem;

  beforeEach(() => {
    ctx = createTestContext();
    system = new FormationSystem();
  });

  it('keeps the angle while the enemy is still chasing the ellipse', () => {
    const enemy = createEnemy(ctx.world, makeFormation());

    system.update(ctx);

    expect(requireFormation(ctx.world, enemy).angle).toBe(0);
    expect(requireTransform(ctx.world, enemy).x).toBeCloseTo(-399 + GAME_CONFIG.BASE_SPEED * FRAME, 1);
  });

  it('advances the angle once the enemy is on the ellipse', () => {
    // Entering from the left puts the enemy on the counter-clockwise path
    const formation = makeFormation({ start: { x: -100, y: 0 }, angle: Math.PI });
    const enemy = createEnemy(ctx.world, formation);

    system.update(ctx);

    const angle = Math.PI + FRAME_ANGLE;
    expect(requireFormation(ctx.world, enemy).angle).toBeCloseTo(angle, 10);
    const transform = requireTransform(ctx.world, enemy);
    expect(transform.x).toBeCloseTo(100 * Math.cos(angle), 10);
    expect(transform.y).toBeCloseTo(100 * Math.sin(angle), 10);
  });

  it('skips enemies already queued for destruction', () => {
    const enemy = createEnemy(ctx.world, makeFormation());
    ctx.world.requestDestroy(enemy);

    system.update(ctx);

    expect(requireTransform(ctx.world, enemy).x).toBe(-399);
  });
});
