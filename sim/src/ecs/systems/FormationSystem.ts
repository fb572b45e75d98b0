// ============================================
// Formation System
// Enemy flight along a drifting ellipse with closed-loop tracking
// ============================================

import type { System } from './types';
import type { SystemContext } from './GameContext';
import { GAME_CONFIG, Components } from '#shared';
import type { FormationComponent, Playfield, RandomSource, Vec2 } from '#shared';
import { clampFormation, rollDriftDeltas } from '../../helpers/formation';

/**
 * Advance drift timers and apply the per-second deltas, then clamp.
 * Deltas are re-rolled once the change timer passes FORMATION_CHANGE_INTERVAL.
 */
export function driftFormation(
  formation: FormationComponent,
  deltaTime: number,
  playfield: Playfield,
  rng: RandomSource
): void {
  formation.changeTimer += deltaTime;
  if (formation.changeTimer > GAME_CONFIG.FORMATION_CHANGE_INTERVAL) {
    Object.assign(formation, rollDriftDeltas(rng));
    formation.changeTimer = 0;
  }

  formation.pivot.x += formation.pivotDelta.x * deltaTime;
  formation.pivot.y += formation.pivotDelta.y * deltaTime;
  formation.radius.x += formation.radiusDelta.x * deltaTime;
  formation.radius.y += formation.radiusDelta.y * deltaTime;
  formation.speed += formation.speedDelta * deltaTime;

  clampFormation(formation, playfield);
}

export interface TrackingStep {
  position: Vec2;
  target: Vec2;
  angle: number;       // Candidate angle on the ellipse
  angleLocked: boolean; // Whether the formation should adopt `angle`
}

/**
 * One tracking step toward the ellipse.
 *
 * The target is the ellipse point one angular step past the locked
 * angle. The entity moves toward it by at most speed * dt without
 * overshooting on either axis. The angle only advances while the
 * entity is close to the target, so a drifted ellipse is chased
 * rather than lapped.
 */
export function trackEllipse(position: Vec2, formation: FormationComponent, deltaTime: number): TrackingStep {
  const maxStep = deltaTime * formation.speed;

  // Spawned on the left: counter-clockwise, on the right: clockwise
  const direction = formation.start.x < 0 ? 1 : -1;
  const { pivot, radius } = formation;

  const angle =
    formation.angle +
    (direction * formation.speed * deltaTime) / ((Math.min(radius.x, radius.y) * Math.PI) / 2);

  const target = {
    x: radius.x * Math.cos(angle) + pivot.x,
    y: radius.y * Math.sin(angle) + pivot.y,
  };

  const dx = position.x - target.x;
  const dy = position.y - target.y;
  const dist = Math.sqrt(dx * dx + dy * dy);
  const ratio = dist === 0 ? 0 : maxStep / dist;

  let x = position.x - dx * ratio;
  x = dx > 0 ? Math.max(x, target.x) : Math.min(x, target.x);
  let y = position.y - dy * ratio;
  y = dy > 0 ? Math.max(y, target.y) : Math.min(y, target.y);

  const lockThreshold = (maxStep * formation.speed) / GAME_CONFIG.FORMATION_ANGLE_LOCK_DIVISOR;

  return {
    position: { x, y },
    target,
    angle,
    angleLocked: dist < lockThreshold,
  };
}

/**
 * FormationSystem - the only integrator for enemies
 *
 * Priority: 300
 */
export class FormationSystem implements System {
  readonly name = 'FormationSystem';

  update({ world, deltaTime, resources }: SystemContext): void {
    for (const entity of world.query(Components.Formation, Components.Transform)) {
      if (world.isPendingDestroy(entity)) continue;
      const formation = world.getComponent(entity, Components.Formation);
      const transform = world.getComponent(entity, Components.Transform);
      if (!formation || !transform) continue;

      driftFormation(formation, deltaTime, resources.playfield, resources.rng);

      const step = trackEllipse(transform, formation, deltaTime);
      if (step.angleLocked) {
        formation.angle = step.angle;
      }
      transform.x = step.position.x;
      transform.y = step.position.y;
    }
  }
}
