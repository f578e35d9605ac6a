import { parentPort, workerData } from 'worker_threads';
import { RwLock } from '../lock/rwlock.js';
import { ConcurrencyProbe } from './probe.js';
import { SharedInt32Sequence, type Sequence } from './sequence.js';
import { StressWorkerDataSchema, type StressWorkerMessage } from './schemas.js';
import { runStressTasks } from './tasks.js';

async function main(): Promise<void> {
  if (!parentPort) {
    throw new Error('Stress worker must run inside a worker thread');
  }

  const data = StressWorkerDataSchema.parse(workerData);
  const lock = RwLock.fromHandle<Sequence>(data.lock, new SharedInt32Sequence(data.data), {
    wakePolicy: data.wakePolicy,
    spin: data.spin,
  });

  try {
    const lengths = await runStressTasks(lock, data.ids, new ConcurrencyProbe(data.probe), data.holdMs);
    const message: StressWorkerMessage = { type: 'done', completed: lengths.length };
    parentPort.postMessage(message);
  } finally {
    lock.dispose();
  }
}

// a rejection here surfaces as the worker's 'error' event in the parent
await main();
