// ============================================
// Explosion Audio System
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';

/**
 * ExplosionAudioSystem - drains the frame's kill events, one sound cue
 * per kill. Simultaneous kills are never coalesced.
 *
 * Priority: 900
 */
export class ExplosionAudioSystem implements System {
  readonly name = 'ExplosionAudioSystem';

  update({ resources, bus }: SystemContext): void {
    resources.killEvents.drain().forEach(() => {
      bus.emit({ type: 'playSound', sound: 'enemy_explosion' });
    });
  }
}
