// ============================================
// ExplosionAudioSystem Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { ExplosionAudioSystem } from '../ExplosionAudioSystem';
import { createTestContext } from './testUtils';

describe('ExplosionAudioSystem', () => {
  const system = new ExplosionAudioSystem();

  it('plays one sound per kill, even for simultaneous kills', () => {
    const ctx = createTestContext();
    ctx.resources.killEvents.push({ entity: 1, position: { x: 0, y: 0, z: 10 } });
    ctx.resources.killEvents.push({ entity: 2, position: { x: 5, y: 0, z: 10 } });

    system.update(ctx);

    expect(ctx.events).toEqual([
      { type: 'playSound', sound: 'enemy_explosion' },
      { type: 'playSound', sound: 'enemy_explosion' },
    ]);
    expect(ctx.resources.killEvents.length).toBe(0);
  });

  it('stays silent on frames without kills', () => {
    const ctx = createTestContext();

    system.update(ctx);
    system.update(ctx);

    expect(ctx.events).toEqual([]);
  });
});
