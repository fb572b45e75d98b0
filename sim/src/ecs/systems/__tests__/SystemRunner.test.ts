// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import { createTestContext, type TestContext } from './testUtils';
import { createLaser, createPendingExplosion } from '../../factories';
import { logger } from '../../../logger';

function recordingSystem(name: string, calls: string[]): System {
  return {
    name,
    update: () => {
      calls.push(name);
    },
  };
}

describe('SystemRunner', () => {
  let ctx: TestContext;
  let runner: SystemRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = createTestContext();
    runner = new SystemRunner();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('runs systems in priority order regardless of registration order', () => {
    const calls: string[] = [];
    runner.register(recordingSystem('collision', calls), 400);
    runner.register(recordingSystem('spawn', calls), 50);
    runner.register(recordingSystem('motion', calls), 200);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.1);

    expect(calls).toEqual(['spawn', 'motion', 'collision']);
    expect(runner.getSystemNames()).toEqual([
      'spawn (priority: 50)',
      'motion (priority: 200)',
      'collision (priority: 400)',
    ]);
  });

  it('advances simulated time before the systems run', () => {
    let seen = -1;
    runner.register({ name: 'clock', update: ({ resources }) => { seen = resources.time.elapsed; } }, 1);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.25);
    runner.update(ctx.world, ctx.resources, ctx.bus, 0.25);

    expect(seen).toBe(0.5);
    expect(ctx.resources.time.delta).toBe(0.25);
  });

  it('keeps running later systems when one throws', () => {
    const calls: string[] = [];
    runner.register({ name: 'broken', update: () => { throw new Error('boom'); } }, 1);
    runner.register(recordingSystem('after', calls), 2);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.1);

    expect(calls).toEqual(['after']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('propagates underflow errors outside production', () => {
    vi.stubEnv('NODE_ENV', 'test');
    const calls: string[] = [];
    const underflow = new Error('CounterUnderflow: below zero');
    underflow.name = 'CounterUnderflow';
    runner.register({ name: 'counter', update: () => { throw underflow; } }, 1);
    runner.register(recordingSystem('after', calls), 2);

    expect(() => runner.update(ctx.world, ctx.resources, ctx.bus, 0.1)).toThrow(underflow);
    expect(calls).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('logs underflow errors and carries on in production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const calls: string[] = [];
    const underflow = new Error('CounterUnderflow: below zero');
    underflow.name = 'CounterUnderflow';
    runner.register({ name: 'counter', update: () => { throw underflow; } }, 1);
    runner.register(recordingSystem('after', calls), 2);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.1);

    expect(calls).toEqual(['after']);
  });

  it('destroys queued entities at the end of the frame', () => {
    const laser = createLaser(ctx.world, 'player', { x: 0, y: 0 });
    let aliveDuringFrame = false;
    runner.register({ name: 'destroyer', update: ({ world }) => world.requestDestroy(laser) }, 1);
    runner.register({ name: 'observer', update: ({ world }) => { aliveDuringFrame = world.hasEntity(laser); } }, 2);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.1);

    expect(aliveDuringFrame).toBe(true);
    expect(ctx.world.hasEntity(laser)).toBe(false);
    expect(ctx.events).toEqual([{ type: 'entityDestroyed', entity: laser, kind: 'playerLaser' }]);
  });

  it('does not announce the destruction of internal markers', () => {
    const marker = createPendingExplosion(ctx.world, { x: 0, y: 0, z: 0 });
    ctx.world.requestDestroy(marker);

    runner.update(ctx.world, ctx.resources, ctx.bus, 0.1);

    expect(ctx.world.hasEntity(marker)).toBe(false);
    expect(ctx.events).toEqual([]);
  });
});
