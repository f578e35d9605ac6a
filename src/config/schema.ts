/**
 * Zod schema for config files and environment overrides
 */

import { z } from 'zod';
import { STRESS_CONSTANTS } from './constants.js';

export const WakePolicySchema = z.enum(['single', 'batch-readers']);

export const SpinConfigSchema = z
  .object({
    maxSpins: z.number().int('maxSpins must be an integer').min(0).max(1_000_000),
    maxParkMs: z.number().positive('maxParkMs must be positive').max(1000),
  })
  .partial();

export const StressConfigSchema = z
  .object({
    tasks: z.number().int().min(1).max(STRESS_CONSTANTS.MAX_TASKS),
    workers: z.number().int().min(0).max(STRESS_CONSTANTS.MAX_WORKERS),
    holdMs: z.number().min(0),
  })
  .partial();

export const RwlockBridgeConfigSchema = z
  .object({
    wakePolicy: WakePolicySchema,
    spin: SpinConfigSchema,
    stress: StressConfigSchema,
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .partial();
