import path from 'path';
import { performance } from 'perf_hooks';
import { fileURLToPath } from 'url';
import { Worker } from 'worker_threads';
import { RwLock } from '../lock/rwlock.js';
import { SharedRawRwLock } from '../raw/shared-raw-rwlock.js';
import { log } from '../utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { ConcurrencyProbe, type ProbeSnapshot } from './probe.js';
import { SharedInt32Sequence, StringSequence, type Sequence } from './sequence.js';
import {
  StressOptionsSchema,
  StressWorkerMessageSchema,
  type StressOptions,
  type StressOptionsInput,
  type StressWorkerData,
} from './schemas.js';
import type { SpinSettings } from '../utils/spin-lock.js';
import { runStressTasks } from './tasks.js';

export interface StressReport extends ProbeSnapshot {
  mode: 'local' | 'threads';
  tasks: number;
  workers: number;
  wakePolicy: string;
  spin: SpinSettings;
  entries: number;
  missing: number[];
  duplicates: number[];
  elapsedMs: number;
  ok: boolean;
}

/**
 * Compare what the tasks left in the sequence against ids 0..tasks-1
 */
export function verifyEntries(values: number[], tasks: number): Pick<StressReport, 'entries' | 'missing' | 'duplicates'> {
  const seen = new Map<number, number>();
  for (const value of values) {
    seen.set(value, (seen.get(value) ?? 0) + 1);
  }

  const missing: number[] = [];
  for (let id = 0; id < tasks; id++) {
    if (!seen.has(id)) missing.push(id);
  }

  const duplicates = [...seen.entries()]
    .filter(([, count]) => count > 1)
    .map(([value]) => value)
    .sort((a, b) => a - b);

  return { entries: values.length, missing, duplicates };
}

function splitIds(tasks: number, workers: number): number[][] {
  const groups: number[][] = Array.from({ length: workers }, () => []);
  for (let id = 0; id < tasks; id++) {
    groups[id % workers].push(id);
  }
  return groups.filter((group) => group.length > 0);
}

function workerEntryUrl(): URL {
  // sources run through a TypeScript loader, builds run from dist
  const extension = path.extname(fileURLToPath(import.meta.url));
  return new URL(`./worker${extension}`, import.meta.url);
}

function runWorker(data: StressWorkerData): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const worker = new Worker(workerEntryUrl(), { workerData: data });
    let completed: number | null = null;

    worker.on('message', (message: unknown) => {
      const parsed = StressWorkerMessageSchema.safeParse(message);
      if (parsed.success) {
        completed = parsed.data.completed;
      } else {
        log.warn('Ignoring unexpected stress worker message', { issues: parsed.error.issues.length });
      }
    });
    worker.once('error', reject);
    worker.once('exit', (code) => {
      if (completed === null) {
        reject(new Error(`Stress worker exited with code ${code} before finishing`));
      } else {
        resolve(completed);
      }
    });
  });
}

/**
 * Lock for an in-thread run, tuned with the run's wake policy and spin settings
 */
export function createLocalStressLock(options: Pick<StressOptions, 'wakePolicy' | 'spin'>): RwLock<Sequence> {
  return new RwLock<Sequence>(new StringSequence(), { wakePolicy: options.wakePolicy, spin: options.spin });
}

async function runLocal(tasks: number, holdMs: number, lock: RwLock<Sequence>, probe: ConcurrencyProbe): Promise<number[]> {
  const ids = Array.from({ length: tasks }, (_, id) => id);
  await runStressTasks(lock, ids, probe, holdMs);
  return lock.withRead((sequence) => sequence.values());
}

async function runThreads(options: StressOptions, probeBuffer: SharedArrayBuffer): Promise<number[]> {
  const { tasks, workers, holdMs, wakePolicy, spin } = options;
  const raw = new SharedRawRwLock();
  const dataBuffer = SharedInt32Sequence.allocate(tasks);

  try {
    const completed = await Promise.all(
      splitIds(tasks, workers).map((ids) =>
        runWorker({ lock: raw.handle(), data: dataBuffer, probe: probeBuffer, ids, holdMs, wakePolicy, spin })
      )
    );
    log.debug('Stress workers finished', { completed });
    if (raw.isLocked()) {
      throw new Error('Shared lock still held after every worker exited');
    }
    return new SharedInt32Sequence(dataBuffer).values();
  } finally {
    raw.close();
  }
}

/**
 * Race `tasks` writers-then-readers on one lock, in this thread or spread
 * over worker threads, and check every id landed exactly once with
 * exclusion intact
 */
export async function runStress(input: StressOptionsInput = {}): Promise<StressReport> {
  const options = StressOptionsSchema.parse(input);
  const mode = options.workers > 0 ? 'threads' : 'local';
  const probeBuffer = ConcurrencyProbe.allocate();
  const probe = new ConcurrencyProbe(probeBuffer);

  log.info('Starting stress run', { mode, tasks: options.tasks, workers: options.workers, wakePolicy: options.wakePolicy });
  const started = performance.now();

  let values: number[];
  if (mode === 'threads') {
    values = await runThreads(options, probeBuffer);
  } else {
    const lock = createLocalStressLock(options);
    try {
      values = await runLocal(options.tasks, options.holdMs, lock, probe);
    } finally {
      lock.dispose();
    }
  }

  const verification = verifyEntries(values, options.tasks);
  const snapshot = probe.snapshot();
  const ok =
    verification.entries === options.tasks &&
    verification.missing.length === 0 &&
    verification.duplicates.length === 0 &&
    snapshot.violations === 0;

  const report: StressReport = {
    mode,
    tasks: options.tasks,
    workers: options.workers,
    wakePolicy: options.wakePolicy,
    spin: options.spin,
    ...verification,
    ...snapshot,
    elapsedMs: Math.round(performance.now() - started),
    ok,
  };

  if (ok) {
    log.info('Stress run passed', { entries: report.entries, elapsedMs: report.elapsedMs });
  } else {
    log.warn('Stress run failed verification', {
      entries: report.entries,
      missing: report.missing.length,
      duplicates: report.duplicates.length,
      violations: report.violations,
    });
  }

  return report;
}

export function describeStressFailure(error: unknown): string {
  return `Stress run could not complete: ${getErrorMessage(error)}`;
}
