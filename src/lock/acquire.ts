import type { WakeIntent } from '../types/lock.js';
import type { WakingRawRwLock, WakingRawRwLockUpgrade } from '../core/waking-raw-rwlock.js';
import { LockAbortedError } from '../core/errors.js';
import { TaskWaker } from './task-waker.js';

export interface AcquireOptions {
  /** Cancels a suspended acquire; combine with AbortSignal.timeout for deadlines */
  signal?: AbortSignal;
}

function throwIfAborted(signal: AbortSignal | undefined, kind: string): void {
  if (signal?.aborted) {
    throw new LockAbortedError(kind, signal.reason);
  }
}

function waitForWake(waker: TaskWaker, signal: AbortSignal | undefined, kind: string): Promise<void> {
  if (!signal) return waker.promise;

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new LockAbortedError(kind, signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    waker.promise.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Try / register / retry / suspend loop shared by every async acquire.
 *
 * The retry right after registration is what makes the protocol safe: a
 * release that landed between the failed try and the push found no waker
 * to pop, so this task has to observe the freed capacity itself.
 */
async function acquireWith(
  lock: WakingRawRwLock,
  attempt: () => boolean,
  intent: WakeIntent,
  kind: string,
  options: AcquireOptions
): Promise<void> {
  const { signal } = options;

  for (;;) {
    throwIfAborted(signal, kind);
    if (attempt()) return;

    const waker = new TaskWaker(() => {
      lock.wakeUp('one');
    });
    lock.registerWaker(waker, intent);

    if (attempt()) {
      waker.abandon();
      return;
    }

    try {
      await waitForWake(waker, signal, kind);
    } catch (error) {
      waker.abandon();
      throw error;
    }
    // woken or spuriously resumed: go round and race for it again
  }
}

export function acquireRead(lock: WakingRawRwLock, options: AcquireOptions = {}): Promise<void> {
  return acquireWith(lock, () => lock.tryLockShared(), 'shared', 'read', options);
}

export function acquireWrite(lock: WakingRawRwLock, options: AcquireOptions = {}): Promise<void> {
  return acquireWith(lock, () => lock.tryLockExclusive(), 'exclusive', 'write', options);
}

export function acquireUpgradableRead(lock: WakingRawRwLockUpgrade, options: AcquireOptions = {}): Promise<void> {
  return acquireWith(lock, () => lock.tryLockUpgradable(), 'upgradable', 'upgradable read', options);
}

/**
 * Promote an upgradable hold the caller already owns, once the remaining
 * shared holders have left
 */
export function upgradeWhenReady(lock: WakingRawRwLockUpgrade, options: AcquireOptions = {}): Promise<void> {
  return acquireWith(lock, () => lock.tryUpgrade(), 'upgrade', 'upgrade', options);
}
