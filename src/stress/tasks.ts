import { setImmediate as yieldToLoop, setTimeout as delay } from 'timers/promises';
import type { RwLock } from '../lock/rwlock.js';
import type { ConcurrencyProbe } from './probe.js';
import type { Sequence } from './sequence.js';

async function hold(holdMs: number): Promise<void> {
  if (holdMs > 0) {
    await delay(holdMs);
  } else {
    await yieldToLoop();
  }
}

/**
 * One stress task: append its id under the write lock, then read the
 * length back under the read lock. Each critical section suspends at
 * least once so the other tasks pile up behind it.
 */
export async function runStressTask(
  lock: RwLock<Sequence>,
  id: number,
  probe: ConcurrencyProbe,
  holdMs: number
): Promise<number> {
  await lock.withWrite(async (guard) => {
    probe.enterWriter();
    try {
      await hold(holdMs);
      guard.value.append(id);
    } finally {
      probe.exitWriter();
    }
  });

  return lock.withRead(async (sequence) => {
    probe.enterReader();
    try {
      await hold(holdMs);
      return sequence.length();
    } finally {
      probe.exitReader();
    }
  });
}

export async function runStressTasks(
  lock: RwLock<Sequence>,
  ids: number[],
  probe: ConcurrencyProbe,
  holdMs: number
): Promise<number[]> {
  return Promise.all(ids.map((id) => runStressTask(lock, id, probe, holdMs)));
}
