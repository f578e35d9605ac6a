/**
 * Capability interfaces shared by the synchronous primitives and the waking adapter.
 */

/**
 * Synchronous reader/writer lock. `lock*` calls may block the calling thread,
 * `tryLock*` calls never do.
 */
export interface RawRwLock {
  lockShared(): void;
  tryLockShared(): boolean;
  unlockShared(): void;
  lockExclusive(): void;
  tryLockExclusive(): boolean;
  unlockExclusive(): void;

  isLocked(): boolean;
  isLockedExclusive(): boolean;
}

/**
 * Adds an upgradable read hold: compatible with shared holds, exclusive
 * against other upgradable and exclusive holds, and promotable to exclusive.
 */
export interface RawRwLockUpgrade extends RawRwLock {
  lockUpgradable(): void;
  tryLockUpgradable(): boolean;
  unlockUpgradable(): void;
  upgrade(): void;
  tryUpgrade(): boolean;

  /** exclusive -> shared */
  downgrade(): void;
  /** upgradable -> shared */
  downgradeUpgradable(): void;
  /** exclusive -> upgradable */
  downgradeToUpgradable(): void;
}

/**
 * Resumes one suspended task. Calling it twice, or after the task is gone,
 * must be harmless.
 *
 * Returning `false` declines the wakeup: the task already had one, or no
 * longer waits. The adapter then hands it to the next queued waiter.
 */
export interface Waker {
  wake(): boolean | void;
}

export type WakeIntent = 'shared' | 'exclusive' | 'upgradable' | 'upgrade';

export interface WakerEntry {
  waker: Waker;
  intent: WakeIntent;
}

/** How many queued waiters a release hands capacity to. */
export type WakeMode = 'one' | 'readers';

export type WakePolicy = 'single' | 'batch-readers';

/**
 * Subscription to releases performed by other threads on the same lock.
 * `park` and `unpark` bracket the periods where this thread has waiters.
 */
export interface ReleaseWatch {
  park(): void;
  unpark(): void;
  close(): void;
}

export interface RemoteReleaseSource {
  watchReleases(listener: () => void): ReleaseWatch;
}

export function isRemoteReleaseSource(value: unknown): value is RemoteReleaseSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'watchReleases' in value &&
    typeof value.watchReleases === 'function'
  );
}
