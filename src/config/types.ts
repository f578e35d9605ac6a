import type { WakePolicy } from '../types/lock.js';

export interface SpinConfig {
  maxSpins?: number;
  maxParkMs?: number;
}

export interface StressConfig {
  tasks?: number;
  workers?: number;
  holdMs?: number;
}

export interface RwlockBridgeConfig {
  wakePolicy?: WakePolicy;
  spin?: SpinConfig;
  stress?: StressConfig;
  logLevel?: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

export interface ConfigSource {
  global: RwlockBridgeConfig | null;
  project: RwlockBridgeConfig | null;
  env: RwlockBridgeConfig;
}

/**
 * Fully resolved settings used to build locks
 */
export interface LockSettings {
  wakePolicy: WakePolicy;
  spin: Required<SpinConfig>;
}
