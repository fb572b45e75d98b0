// ============================================
// Game Constants & Configuration
// Compile-time tuning for the simulation
// ============================================

export const GAME_CONFIG = {
  // Reference speed from which all movement is derived
  BASE_SPEED: 500, // Units per second

  // Default playfield (origin at center, +y up)
  PLAYFIELD_WIDTH: 598,
  PLAYFIELD_HEIGHT: 676,
  DESPAWN_MARGIN: 200, // Auto-despawn once this far outside the playfield

  // Sprites
  SPRITE_SCALE: 0.5,
  SPRITE_DEPTH: 10, // Draw depth for ships

  // Player
  PLAYER_WIDTH: 144,
  PLAYER_HEIGHT: 75,
  PLAYER_SPEED: 1.0, // Velocity magnitude, scaled by BASE_SPEED
  PLAYER_SPAWN_GAP: 5, // Gap between the player and the bottom edge
  PLAYER_RESPAWN_DELAY: 2, // Seconds dead before respawn
  PLAYER_SPAWN_CHECK_INTERVAL: 0.5, // Respawn check cadence
  PLAYER_INVINCIBLE_DURATION: 2, // Seconds of shield after respawn

  // Player lasers
  PLAYER_LASER_WIDTH: 9,
  PLAYER_LASER_HEIGHT: 54,
  PLAYER_LASER_OFFSET_Y: 15,
  PLAYER_LASER_EDGE_INSET: 5, // Lasers leave from the wing tips, inset by this much

  // Enemies
  ENEMY_WIDTH: 144,
  ENEMY_HEIGHT: 75,
  ENEMY_MAX: 2, // Population cap
  ENEMY_SPAWN_INTERVAL: 1, // Seconds between spawn attempts
  ENEMY_FIRE_CHANCE: 1 / 60, // Per-frame probability that enemies open fire

  // Enemy lasers
  ENEMY_LASER_WIDTH: 17,
  ENEMY_LASER_HEIGHT: 55,
  ENEMY_LASER_OFFSET_Y: 15,

  // Formations
  FORMATION_MEMBERS_MAX: 2, // Enemies sharing one template
  FORMATION_START_MARGIN: 100, // Spawn this far beyond the side edges
  FORMATION_PIVOT_TOP_MARGIN: 50,
  // Initial roll for a new template
  FORMATION_RADIUS_X_MIN: 80,
  FORMATION_RADIUS_X_MAX: 150,
  FORMATION_RADIUS_Y: 100,
  FORMATION_CHANGE_INTERVAL: 0.5, // Seconds between drift re-rolls
  FORMATION_PIVOT_DRIFT: 20, // +/- units per second
  FORMATION_RADIUS_DRIFT: 10,
  FORMATION_SPEED_DRIFT: 10,
  // Clamp applied after every drift step
  FORMATION_RADIUS_X_RANGE: [50, 200] as const,
  FORMATION_RADIUS_Y_RANGE: [50, 150] as const,
  FORMATION_SPEED_RANGE: [0.5, 1.5] as const, // Multiples of BASE_SPEED
  FORMATION_ANGLE_LOCK_DIVISOR: 20, // Lock-in threshold = step * speed / divisor

  // Explosions
  EXPLOSION_FRAME_COUNT: 16, // 4x4 sprite sheet
  EXPLOSION_FRAME_INTERVAL: 0.05, // Seconds per frame

  // Runner
  TICK_RATE: 60,
};

export type GameConfig = typeof GAME_CONFIG;
