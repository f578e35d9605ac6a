import fs from 'fs';
import path from 'path';
import os from 'os';
import type { ConfigSource, RwlockBridgeConfig, SpinConfig, StressConfig } from './types.js';
import { RwlockBridgeConfigSchema } from './schema.js';
import { log } from '../utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

const PROJECT_CONFIG_FILE = '.rwlock-bridge/config.json';

/**
 * Global config directory; RWLOCK_BRIDGE_HOME relocates it
 */
export function getGlobalConfigDir(): string {
  return process.env.RWLOCK_BRIDGE_HOME || path.join(os.homedir(), '.rwlock-bridge');
}

export function getGlobalConfigPath(): string {
  return path.join(getGlobalConfigDir(), 'config.json');
}

export function getProjectConfigPath(basePath = '.'): string {
  return path.join(path.resolve(basePath), PROJECT_CONFIG_FILE);
}

/**
 * Parse and validate one config file. Missing files yield null; unreadable
 * or invalid ones are reported and ignored.
 * @readonly Never modifies files
 */
function readConfigFile(configPath: string, scope: string): RwlockBridgeConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    log.warn(`Failed to read ${scope} config`, { error: getErrorMessage(error), path: configPath });
    return null;
  }

  const parsed = RwlockBridgeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Ignoring invalid ${scope} config`, {
      path: configPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

export function readGlobalConfig(): RwlockBridgeConfig | null {
  return readConfigFile(getGlobalConfigPath(), 'global');
}

export function readProjectConfig(basePath = '.'): RwlockBridgeConfig | null {
  return readConfigFile(getProjectConfigPath(basePath), 'project');
}

function readNumber(name: string, parse: (value: string) => number = (value) => parseFloat(value)): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parse(raw);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Read configuration from RWLOCK_BRIDGE_* environment variables.
 * Values that fail validation are dropped with a warning.
 * @readonly Never modifies files or environment
 */
export function readEnvConfig(): RwlockBridgeConfig {
  const toInt = (value: string) => parseInt(value, 10);
  const candidate: RwlockBridgeConfig = {};

  if (process.env.RWLOCK_BRIDGE_WAKE_POLICY) {
    const policy = process.env.RWLOCK_BRIDGE_WAKE_POLICY;
    if (policy === 'single' || policy === 'batch-readers') {
      candidate.wakePolicy = policy;
    } else {
      log.warn('Ignoring unknown RWLOCK_BRIDGE_WAKE_POLICY', { value: policy });
    }
  }

  const spin: SpinConfig = {};
  const maxSpins = readNumber('RWLOCK_BRIDGE_MAX_SPINS', toInt);
  const maxParkMs = readNumber('RWLOCK_BRIDGE_MAX_PARK_MS');
  if (maxSpins !== undefined) spin.maxSpins = maxSpins;
  if (maxParkMs !== undefined) spin.maxParkMs = maxParkMs;
  if (Object.keys(spin).length > 0) candidate.spin = spin;

  const stress: StressConfig = {};
  const tasks = readNumber('RWLOCK_BRIDGE_STRESS_TASKS', toInt);
  const workers = readNumber('RWLOCK_BRIDGE_STRESS_WORKERS', toInt);
  const holdMs = readNumber('RWLOCK_BRIDGE_STRESS_HOLD_MS');
  if (tasks !== undefined) stress.tasks = tasks;
  if (workers !== undefined) stress.workers = workers;
  if (holdMs !== undefined) stress.holdMs = holdMs;
  if (Object.keys(stress).length > 0) candidate.stress = stress;

  if (process.env.RWLOCK_BRIDGE_LOG_LEVEL) {
    const level = process.env.RWLOCK_BRIDGE_LOG_LEVEL.toLowerCase();
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
      candidate.logLevel = level;
    }
  }

  const parsed = RwlockBridgeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    log.warn('Ignoring invalid RWLOCK_BRIDGE_* environment settings', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

/**
 * Deep merge configuration objects
 * Later configs override earlier ones
 */
function deepMerge(...configs: (RwlockBridgeConfig | null)[]): RwlockBridgeConfig {
  const result: RwlockBridgeConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.wakePolicy) {
      result.wakePolicy = config.wakePolicy;
    }

    if (config.logLevel) {
      result.logLevel = config.logLevel;
    }

    if (config.spin) {
      result.spin = { ...result.spin, ...config.spin };
    }

    if (config.stress) {
      result.stress = { ...result.stress, ...config.stress };
    }
  }

  return result;
}

/**
 * Load merged configuration from all sources
 * Priority: env > project > global
 *
 * @readonly Never modifies config files
 */
export function loadConfig(basePath = '.'): RwlockBridgeConfig {
  return deepMerge(readGlobalConfig(), readProjectConfig(basePath), readEnvConfig());
}

/**
 * Get configuration sources for debugging
 * @readonly Never modifies files
 */
export function getConfigSources(basePath = '.'): ConfigSource {
  return {
    global: readGlobalConfig(),
    project: readProjectConfig(basePath),
    env: readEnvConfig(),
  };
}
