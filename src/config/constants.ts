/**
 * Centralized configuration constants for rwlock-bridge
 *
 * Defaults for the spin lock, the wake policy and the stress runner. Values
 * read from the environment here are process-wide overrides; per-project
 * settings go through the config loader.
 */

/**
 * Spin lock tuning
 */
export const SPIN_CONSTANTS = {
  /** Backoff rounds before a contended locker parks */
  MAX_SPINS: parseInt(process.env.RWLOCK_BRIDGE_MAX_SPINS || '64', 10),

  /** Cap on the inner read-only spin of one backoff round */
  MAX_BACKOFF: 1024,

  /** First park duration (milliseconds); doubles on every park */
  MIN_PARK_MS: 0.05,

  /** Longest single park (milliseconds) */
  MAX_PARK_MS: parseFloat(process.env.RWLOCK_BRIDGE_MAX_PARK_MS || '4'),
} as const;

/**
 * Shared lock word layout
 *
 * Low bits count shared holders; two high bits flag the upgradable and
 * exclusive holds.
 */
export const SHARED_LOCK_CONSTANTS = {
  WRITER: 1 << 30,
  UPGRADABLE: 1 << 29,
  READER: 1,
  READER_MASK: (1 << 29) - 1,

  /** Int32 slots: lock word, number of parked threads */
  STATE_INDEX: 0,
  PARKED_INDEX: 1,
  SLOTS: 2,

  CHANNEL_PREFIX: 'rwlock-bridge:',
} as const;

/**
 * Stress runner defaults
 */
export const STRESS_CONSTANTS = {
  DEFAULT_TASKS: 100,
  DEFAULT_WORKERS: 0,
  DEFAULT_HOLD_MS: 0,
  MAX_TASKS: 100_000,
  MAX_WORKERS: 64,
} as const;

export const DEFAULT_WAKE_POLICY = 'batch-readers' as const;
