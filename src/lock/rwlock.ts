import type { RawRwLockUpgrade } from '../types/lock.js';
import { WakingRawRwLockUpgrade, type WakingRawRwLockOptions } from '../core/waking-raw-rwlock.js';
import { LocalRawRwLock } from '../raw/local-raw-rwlock.js';
import { SharedRawRwLock, type SharedRawRwLockHandle } from '../raw/shared-raw-rwlock.js';
import { acquireRead, acquireUpgradableRead, acquireWrite, type AcquireOptions } from './acquire.js';
import { ReadGuard, UpgradableReadGuard, WriteGuard, type ValueCell } from './guards.js';

export interface RwLockOptions extends WakingRawRwLockOptions {
  /** Synchronous primitive to wrap; a LocalRawRwLock when omitted */
  raw?: RawRwLockUpgrade;
}

/**
 * Reader/writer lock around a value, acquired without blocking the thread.
 *
 * Any number of readers, one upgradable reader alongside them, or a single
 * writer. Guards release explicitly:
 *
 * ```typescript
 * const lock = new RwLock<string[]>([]);
 *
 * const writer = await lock.write();
 * writer.value.push('A');
 * writer.release();
 *
 * const total = await lock.withRead((items) => items.length);
 * ```
 */
export class RwLock<T> {
  readonly raw: WakingRawRwLockUpgrade;
  private data: T;
  private readonly cell: ValueCell<T>;

  constructor(value: T, options: RwLockOptions = {}) {
    const { raw = new LocalRawRwLock(), ...adapterOptions } = options;
    this.raw = new WakingRawRwLockUpgrade(raw, adapterOptions);
    this.data = value;
    this.cell = {
      get: () => this.data,
      set: (next: T) => {
        this.data = next;
      },
    };
  }

  /**
   * Lock backed by shared memory, usable from other threads via `handle()`
   */
  static shared<T>(value: T, options: WakingRawRwLockOptions = {}): RwLock<T> {
    return new RwLock(value, { ...options, raw: new SharedRawRwLock() });
  }

  /**
   * Attach to a shared lock created in another thread. `value` is this
   * thread's view of the protected data, typically over shared memory too.
   */
  static fromHandle<T>(handle: SharedRawRwLockHandle, value: T, options: WakingRawRwLockOptions = {}): RwLock<T> {
    return new RwLock(value, { ...options, raw: SharedRawRwLock.fromHandle(handle) });
  }

  handle(): SharedRawRwLockHandle {
    const inner = this.raw.inner;
    if (!(inner instanceof SharedRawRwLock)) {
      throw new TypeError('Only locks backed by a SharedRawRwLock have a handle');
    }
    return inner.handle();
  }

  async read(options: AcquireOptions = {}): Promise<ReadGuard<T>> {
    await acquireRead(this.raw, options);
    return new ReadGuard(this.raw, this.cell);
  }

  async write(options: AcquireOptions = {}): Promise<WriteGuard<T>> {
    await acquireWrite(this.raw, options);
    return new WriteGuard(this.raw, this.cell);
  }

  async upgradableRead(options: AcquireOptions = {}): Promise<UpgradableReadGuard<T>> {
    await acquireUpgradableRead(this.raw, options);
    return new UpgradableReadGuard(this.raw, this.cell);
  }

  tryRead(): ReadGuard<T> | null {
    return this.raw.tryLockShared() ? new ReadGuard(this.raw, this.cell) : null;
  }

  tryWrite(): WriteGuard<T> | null {
    return this.raw.tryLockExclusive() ? new WriteGuard(this.raw, this.cell) : null;
  }

  tryUpgradableRead(): UpgradableReadGuard<T> | null {
    return this.raw.tryLockUpgradable() ? new UpgradableReadGuard(this.raw, this.cell) : null;
  }

  /**
   * Blocking acquire through the primitive. Throws LockWouldBlockError on a
   * single-thread primitive that is held; parks the thread on a shared one.
   */
  readBlocking(): ReadGuard<T> {
    this.raw.lockShared();
    return new ReadGuard(this.raw, this.cell);
  }

  writeBlocking(): WriteGuard<T> {
    this.raw.lockExclusive();
    return new WriteGuard(this.raw, this.cell);
  }

  /**
   * Run a function under a read hold, releasing it even if the function throws
   */
  async withRead<R>(fn: (value: T) => R | Promise<R>, options: AcquireOptions = {}): Promise<R> {
    const guard = await this.read(options);
    try {
      return await fn(guard.value);
    } finally {
      guard.release();
    }
  }

  /**
   * Run a function with a write guard. The guard is released afterwards
   * unless `fn` released or transitioned it; a guard returned by
   * `downgrade()` inside `fn` is the caller's to release.
   */
  async withWrite<R>(fn: (guard: WriteGuard<T>) => R | Promise<R>, options: AcquireOptions = {}): Promise<R> {
    const guard = await this.write(options);
    try {
      return await fn(guard);
    } finally {
      if (!guard.isReleased()) guard.release();
    }
  }

  async withUpgradableRead<R>(
    fn: (guard: UpgradableReadGuard<T>) => R | Promise<R>,
    options: AcquireOptions = {}
  ): Promise<R> {
    const guard = await this.upgradableRead(options);
    try {
      return await fn(guard);
    } finally {
      if (!guard.isReleased()) guard.release();
    }
  }

  isLocked(): boolean {
    return this.raw.isLocked();
  }

  waiterCount(): number {
    return this.raw.waiterCount();
  }

  dispose(): void {
    this.raw.dispose();
  }
}
