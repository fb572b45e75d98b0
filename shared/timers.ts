// ============================================
// Fixed-Step Timers
// Simulated-time countdowns driven by frame deltas
// ============================================

/**
 * Repeating timer state. Plain data so it can live inside components.
 */
export interface RepeatingTimer {
  duration: number; // Seconds per period
  elapsed: number;  // Seconds into the current period
}

export function createRepeatingTimer(duration: number): RepeatingTimer {
  return { duration, elapsed: 0 };
}

/**
 * Advance a repeating timer.
 * Returns how many periods completed during this tick (0 when none).
 */
export function tickRepeatingTimer(timer: RepeatingTimer, deltaTime: number): number {
  if (timer.duration <= 0) return 0;

  timer.elapsed += deltaTime;
  if (timer.elapsed < timer.duration) return 0;

  const completed = Math.floor(timer.elapsed / timer.duration);
  timer.elapsed -= completed * timer.duration;
  return completed;
}

/**
 * Check if a deadline has passed (strictly)
 */
export function hasDeadlinePassed(startTime: number, duration: number, currentTime: number): boolean {
  return currentTime > startTime + duration;
}
