export type {
  RawRwLock,
  RawRwLockUpgrade,
  ReleaseWatch,
  RemoteReleaseSource,
  WakeIntent,
  WakeMode,
  WakePolicy,
  Waker,
  WakerEntry,
} from './types/lock.js';
export { isRemoteReleaseSource } from './types/lock.js';

export {
  GuardReleasedError,
  LockAbortedError,
  LockError,
  LockStateError,
  LockWouldBlockError,
} from './core/errors.js';
export { WakingRawRwLock, WakingRawRwLockUpgrade, type WakingRawRwLockOptions } from './core/waking-raw-rwlock.js';

export { LocalRawRwLock } from './raw/local-raw-rwlock.js';
export { SharedRawRwLock, isSharedRawRwLockHandle, type SharedRawRwLockHandle } from './raw/shared-raw-rwlock.js';

export { acquireRead, acquireUpgradableRead, acquireWrite, upgradeWhenReady, type AcquireOptions } from './lock/acquire.js';
export { ReadGuard, UpgradableReadGuard, WriteGuard, type ValueCell } from './lock/guards.js';
export { RwLock, type RwLockOptions } from './lock/rwlock.js';
export { TaskWaker } from './lock/task-waker.js';

export { FifoQueue } from './utils/fifo-queue.js';
export { OnceCell } from './utils/once-cell.js';
export { SpinLock, type SpinLockOptions, type SpinSettings } from './utils/spin-lock.js';

export { loadConfig, getConfigSources } from './config/loader.js';
export { resolveLockSettings, resolveStressOptions } from './config/resolver.js';
export type { LockSettings, RwlockBridgeConfig } from './config/types.js';

export { runStress, type StressReport } from './stress/runner.js';
