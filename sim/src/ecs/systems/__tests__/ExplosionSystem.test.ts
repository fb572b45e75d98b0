// ============================================
// ExplosionSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Components, GAME_CONFIG } from '#shared';
import { ExplosionSystem } from '../ExplosionSystem';
import { createTestContext, flushDestroyed, type TestContext } from './testUtils';
import { createExplosion, createPendingExplosion, requireTransform } from '../../factories';

const PERIOD = GAME_CONFIG.EXPLOSION_FRAME_INTERVAL;

describe('ExplosionSystem', () => {
  let ctx: TestContext;
  let system: ExplosionSystem;

  beforeEach(() => {
    ctx = createTestContext({}, PERIOD);
    system = new ExplosionSystem();
  });

  describe('materialization', () => {
    it('replaces a pending marker with an explosion at the same spot', () => {
      const marker = createPendingExplosion(ctx.world, { x: 3, y: 4, z: 10 });

      system.update(ctx);

      expect(ctx.world.isPendingDestroy(marker)).toBe(true);
      const [explosion] = ctx.world.query(Components.ExplosionAnimation);
      expect(explosion).toBeDefined();
      if (explosion === undefined) return;
      expect(requireTransform(ctx.world, explosion)).toEqual({ x: 3, y: 4, z: 10, scale: 1 });
      expect(ctx.events).toEqual([
        {
          type: 'entitySpawned',
          entity: explosion,
          kind: 'explosion',
          position: { x: 3, y: 4, z: 10 },
          size: null,
          scale: 1,
        },
      ]);
    });

    it('starts on frame 0 and is not advanced in its first frame', () => {
      createPendingExplosion(ctx.world, { x: 0, y: 0, z: 0 });

      system.update(ctx);

      const [explosion] = ctx.world.query(Components.ExplosionAnimation);
      if (explosion === undefined) throw new Error('explosion was not created');
      expect(ctx.world.getComponent(explosion, Components.ExplosionAnimation)?.frame).toBe(0);
    });

    it('materializes a marker only once', () => {
      createPendingExplosion(ctx.world, { x: 0, y: 0, z: 0 });

      system.update(ctx);
      system.update(ctx);

      expect(ctx.world.query(Components.ExplosionAnimation)).toHaveLength(1);
    });
  });

  describe('animation', () => {
    it('advances one frame per period and reports it', () => {
      const explosion = createExplosion(ctx.world, { x: 0, y: 0, z: 0 });

      system.update(ctx);

      expect(ctx.world.getComponent(explosion, Components.ExplosionAnimation)?.frame).toBe(1);
      expect(ctx.events).toEqual([{ type: 'explosionFrame', entity: explosion, frame: 1 }]);
    });

    it('catches up on several periods in one long frame', () => {
      const explosion = createExplosion(ctx.world, { x: 0, y: 0, z: 0 });
      ctx.deltaTime = PERIOD * 3;

      system.update(ctx);

      expect(ctx.world.getComponent(explosion, Components.ExplosionAnimation)?.frame).toBe(3);
    });

    it('is still alive on its last frame after frame_count - 1 ticks', () => {
      const explosion = createExplosion(ctx.world, { x: 0, y: 0, z: 0 });

      for (let i = 0; i < GAME_CONFIG.EXPLOSION_FRAME_COUNT - 1; i++) {
        system.update(ctx);
        flushDestroyed(ctx.world);
      }

      expect(ctx.world.hasEntity(explosion)).toBe(true);
      expect(ctx.world.getComponent(explosion, Components.ExplosionAnimation)?.frame).toBe(15);
    });

    it('destroys itself after frame_count ticks', () => {
      const explosion = createExplosion(ctx.world, { x: 0, y: 0, z: 0 });

      for (let i = 0; i < GAME_CONFIG.EXPLOSION_FRAME_COUNT; i++) {
        system.update(ctx);
        flushDestroyed(ctx.world);
      }

      expect(ctx.world.hasEntity(explosion)).toBe(false);
      const frames = ctx.events.filter((event) => event.type === 'explosionFrame');
      expect(frames).toHaveLength(15);
    });
  });
});
