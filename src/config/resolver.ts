import { loadConfig } from './loader.js';
import { DEFAULT_WAKE_POLICY, SPIN_CONSTANTS, STRESS_CONSTANTS } from './constants.js';
import type { LockSettings, RwlockBridgeConfig } from './types.js';
import type { StressOptions } from '../stress/schemas.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';

function lockSettingsFrom(config: RwlockBridgeConfig): LockSettings {
  return {
    wakePolicy: config.wakePolicy ?? DEFAULT_WAKE_POLICY,
    spin: {
      maxSpins: config.spin?.maxSpins ?? SPIN_CONSTANTS.MAX_SPINS,
      maxParkMs: config.spin?.maxParkMs ?? SPIN_CONSTANTS.MAX_PARK_MS,
    },
  };
}

/**
 * Adapter defaults from config, falling back to built-in constants
 */
export function resolveLockSettings(basePath = '.'): LockSettings {
  return lockSettingsFrom(loadConfig(basePath));
}

/**
 * Stress run defaults; explicit options (CLI flags) win over config
 */
export function resolveStressOptions(overrides: Partial<StressOptions> = {}, basePath = '.'): StressOptions {
  const config = loadConfig(basePath);
  const lock = lockSettingsFrom(config);

  return {
    tasks: overrides.tasks ?? config.stress?.tasks ?? STRESS_CONSTANTS.DEFAULT_TASKS,
    workers: overrides.workers ?? config.stress?.workers ?? STRESS_CONSTANTS.DEFAULT_WORKERS,
    holdMs: overrides.holdMs ?? config.stress?.holdMs ?? STRESS_CONSTANTS.DEFAULT_HOLD_MS,
    wakePolicy: overrides.wakePolicy ?? lock.wakePolicy,
    spin: overrides.spin ?? lock.spin,
  };
}

/**
 * Configured log level, or undefined to keep the logger's own default
 */
export function resolveLogLevel(basePath = '.'): LogLevel | undefined {
  const { logLevel } = loadConfig(basePath);
  return logLevel ? parseLogLevel(logLevel, LogLevel.INFO) : undefined;
}
