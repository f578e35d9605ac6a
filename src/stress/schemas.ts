/**
 * Zod schemas for stress run options and the data handed to worker threads
 */

import { z } from 'zod';
import { DEFAULT_WAKE_POLICY, SPIN_CONSTANTS, STRESS_CONSTANTS } from '../config/constants.js';
import { SpinConfigSchema, WakePolicySchema } from '../config/schema.js';

const SpinSettingsSchema = SpinConfigSchema.required();

export const StressOptionsSchema = z.object({
  tasks: z
    .number()
    .int('Task count must be an integer')
    .min(1, 'Task count must be at least 1')
    .max(STRESS_CONSTANTS.MAX_TASKS, `Task count cannot exceed ${STRESS_CONSTANTS.MAX_TASKS}`)
    .default(STRESS_CONSTANTS.DEFAULT_TASKS),
  workers: z
    .number()
    .int('Worker count must be an integer')
    .min(0, 'Worker count cannot be negative')
    .max(STRESS_CONSTANTS.MAX_WORKERS, `Worker count cannot exceed ${STRESS_CONSTANTS.MAX_WORKERS}`)
    .default(STRESS_CONSTANTS.DEFAULT_WORKERS),
  holdMs: z.number().min(0, 'Hold time cannot be negative').default(STRESS_CONSTANTS.DEFAULT_HOLD_MS),
  wakePolicy: WakePolicySchema.default(DEFAULT_WAKE_POLICY),
  spin: SpinSettingsSchema.default({ maxSpins: SPIN_CONSTANTS.MAX_SPINS, maxParkMs: SPIN_CONSTANTS.MAX_PARK_MS }),
});

export type StressOptions = z.infer<typeof StressOptionsSchema>;
export type StressOptionsInput = z.input<typeof StressOptionsSchema>;

export const StressWorkerDataSchema = z.object({
  lock: z.object({
    buffer: z.instanceof(SharedArrayBuffer),
    channel: z.string().min(1),
  }),
  data: z.instanceof(SharedArrayBuffer),
  probe: z.instanceof(SharedArrayBuffer),
  ids: z.array(z.number().int().nonnegative()),
  holdMs: z.number().min(0),
  wakePolicy: WakePolicySchema,
  spin: SpinSettingsSchema,
});

export type StressWorkerData = z.infer<typeof StressWorkerDataSchema>;

export const StressWorkerMessageSchema = z.object({
  type: z.literal('done'),
  completed: z.number().int().nonnegative(),
});

export type StressWorkerMessage = z.infer<typeof StressWorkerMessageSchema>;
