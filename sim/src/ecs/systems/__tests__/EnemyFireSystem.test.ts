// ============================================
// EnemyFireSystem Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { Tags } from '#shared';
import { EnemyFireSystem } from '../EnemyFireSystem';
import { constantRandom, createTestContext, makeFormation } from './testUtils';
import { createEnemy, requireTransform } from '../../factories';

describe('EnemyFireSystem', () => {
  const system = new EnemyFireSystem();

  it('has every enemy fire one laser downward on a firing frame', () => {
    const ctx = createTestContext({ rng: constantRandom(0) });
    createEnemy(ctx.world, makeFormation({ start: { x: -50, y: 100 } }));
    createEnemy(ctx.world, makeFormation({ start: { x: 50, y: 120 } }));

    system.update(ctx);

    const lasers = ctx.world.getEntitiesWithTag(Tags.Laser);
    expect(lasers.every((laser) => ctx.world.hasTag(laser, Tags.FromEnemy))).toBe(true);
    expect(
      lasers.map((laser) => {
        const { x, y } = requireTransform(ctx.world, laser);
        return { x, y };
      })
    ).toEqual([
      { x: -50, y: 85 },
      { x: 50, y: 105 },
    ]);
  });

  it('holds fire on other frames', () => {
    const ctx = createTestContext({ rng: constantRandom(0.5) });
    createEnemy(ctx.world, makeFormation());

    system.update(ctx);

    expect(ctx.world.getEntitiesWithTag(Tags.Laser)).toHaveLength(0);
  });

  it('skips enemies queued for destruction', () => {
    const ctx = createTestContext({ rng: constantRandom(0) });
    const enemy = createEnemy(ctx.world, makeFormation());
    ctx.world.requestDestroy(enemy);

    system.update(ctx);

    expect(ctx.world.getEntitiesWithTag(Tags.Laser)).toHaveLength(0);
  });
});
