import { parentPort, workerData } from 'node:worker_threads';
import { SharedRawRwLock, isSharedRawRwLockHandle } from '../../raw/shared-raw-rwlock.js';

// Takes and releases the exclusive hold in a loop from its own thread, so
// the parent's async acquires keep registering right as releases land.

const handle: unknown = workerData.handle;
const rounds: unknown = workerData.rounds;
const holdMs: unknown = workerData.holdMs;

if (!isSharedRawRwLockHandle(handle) || typeof rounds !== 'number' || typeof holdMs !== 'number') {
  throw new TypeError('exclusive-cycler needs { handle, rounds, holdMs }');
}

const lock = SharedRawRwLock.fromHandle(handle);
const pause = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

for (let round = 0; round < rounds; round++) {
  lock.lockExclusive();
  Atomics.wait(pause, 0, 0, holdMs);
  lock.unlockExclusive();
  Atomics.wait(pause, 0, 0, holdMs);
}

lock.close();
parentPort?.postMessage({ rounds });
