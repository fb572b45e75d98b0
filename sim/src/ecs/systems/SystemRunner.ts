// ============================================
// ECS System Runner
// Manages and executes all simulation systems in priority order
// ============================================

import type { System } from './types';
import type { SimResources, SystemContext } from './GameContext';
import type { GameWorld } from '../factories';
import { getEntityKind } from '../factories';
import type { EventBus } from '../../events/EventBus';
import { isFatalInvariantError } from '../../helpers/lifecycle';
import { logger, perfLogger } from '../../logger';

interface RegisteredSystem {
  system: System;
  priority: number;
}

// Frames slower than this get a per-system breakdown in the perf log
const SLOW_FRAME_MS = 10;

/**
 * SystemRunner - Manages and executes all simulation systems
 *
 * Systems are executed in priority order (lower numbers first).
 * A failing system is logged and skipped, except for invariant
 * violations outside production, which propagate to the caller.
 * Destroy requests issued during the frame are applied after the
 * last system.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first; equal priorities keep registration order
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Advance the clock, run every system once, then apply deferred destruction.
   */
  update(world: GameWorld, resources: SimResources, bus: EventBus, deltaTime: number): void {
    const frameStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    resources.time.delta = deltaTime;
    resources.time.elapsed += deltaTime;

    const ctx: SystemContext = { world, deltaTime, resources, bus };

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(ctx);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        if (isFatalInvariantError(error)) {
          throw error;
        }
        // Continue with next system - one failing pass must not stop the frame
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    this.flushDestroyed(world, bus);

    const totalMs = performance.now() - frameStart;
    if (totalMs > SLOW_FRAME_MS) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms).filter((t) => t.ms > 0.5);
      perfLogger.info({
        event: 'slow_frame_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow frame ${totalMs.toFixed(1)}ms: ${sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ')}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map((s) => `${s.system.name} (priority: ${s.priority})`);
  }

  private flushDestroyed(world: GameWorld, bus: EventBus): void {
    for (const entity of world.takeDestroyQueue()) {
      if (!world.hasEntity(entity)) continue;
      const kind = getEntityKind(world, entity);
      world.destroyEntity(entity);
      // Markers were never announced to the renderer
      if (kind !== 'other') {
        bus.emit({ type: 'entityDestroyed', entity, kind });
      }
    }
  }
}
