import type { WakingRawRwLockUpgrade } from '../core/waking-raw-rwlock.js';
import { GuardReleasedError, LockStateError } from '../core/errors.js';
import { upgradeWhenReady, type AcquireOptions } from './acquire.js';

/**
 * Access to the value a lock protects, handed to guards only
 */
export interface ValueCell<T> {
  get(): T;
  set(value: T): void;
}

abstract class Guard<T> {
  private released = false;

  constructor(
    protected readonly raw: WakingRawRwLockUpgrade,
    protected readonly cell: ValueCell<T>,
    private readonly kind: string
  ) {}

  isReleased(): boolean {
    return this.released;
  }

  protected ensureHeld(): void {
    if (this.released) {
      throw new GuardReleasedError(this.kind);
    }
  }

  /**
   * Give up this guard without touching the lock; used when a transition
   * hands the hold to a new guard
   */
  protected retire(): void {
    this.ensureHeld();
    this.released = true;
  }
}

export class ReadGuard<T> extends Guard<T> {
  constructor(raw: WakingRawRwLockUpgrade, cell: ValueCell<T>) {
    super(raw, cell, 'read');
  }

  get value(): T {
    this.ensureHeld();
    return this.cell.get();
  }

  release(): void {
    this.retire();
    this.raw.unlockShared();
  }
}

export class WriteGuard<T> extends Guard<T> {
  constructor(raw: WakingRawRwLockUpgrade, cell: ValueCell<T>) {
    super(raw, cell, 'write');
  }

  get value(): T {
    this.ensureHeld();
    return this.cell.get();
  }

  set value(next: T) {
    this.ensureHeld();
    this.cell.set(next);
  }

  release(): void {
    this.retire();
    this.raw.unlockExclusive();
  }

  /**
   * Keep reading without letting a writer in between
   */
  downgrade(): ReadGuard<T> {
    this.retire();
    this.raw.downgrade();
    return new ReadGuard(this.raw, this.cell);
  }

  downgradeToUpgradable(): UpgradableReadGuard<T> {
    this.retire();
    this.raw.downgradeToUpgradable();
    return new UpgradableReadGuard(this.raw, this.cell);
  }
}

export class UpgradableReadGuard<T> extends Guard<T> {
  private upgrading = false;

  constructor(raw: WakingRawRwLockUpgrade, cell: ValueCell<T>) {
    super(raw, cell, 'upgradable read');
  }

  get value(): T {
    this.ensureHeld();
    return this.cell.get();
  }

  /** True while an `upgrade()` call is waiting for the other readers */
  isUpgrading(): boolean {
    return this.upgrading;
  }

  release(): void {
    this.ensureIdle('release');
    this.retire();
    this.raw.unlockUpgradable();
  }

  /**
   * Wait for the other readers to leave, then hold the lock exclusively.
   * On abort the upgradable hold is kept and this guard stays usable.
   * The guard cannot be released or transitioned while the upgrade waits.
   */
  async upgrade(options: AcquireOptions = {}): Promise<WriteGuard<T>> {
    this.ensureIdle('upgrade');
    this.upgrading = true;
    try {
      await upgradeWhenReady(this.raw, options);
    } finally {
      this.upgrading = false;
    }
    this.retire();
    return new WriteGuard(this.raw, this.cell);
  }

  tryUpgrade(): WriteGuard<T> | null {
    this.ensureIdle('tryUpgrade');
    if (!this.raw.tryUpgrade()) return null;
    this.retire();
    return new WriteGuard(this.raw, this.cell);
  }

  downgrade(): ReadGuard<T> {
    this.ensureIdle('downgrade');
    this.retire();
    this.raw.downgradeUpgradable();
    return new ReadGuard(this.raw, this.cell);
  }

  private ensureIdle(operation: string): void {
    this.ensureHeld();
    if (this.upgrading) {
      throw new LockStateError(operation, 'an upgrade of this guard is still pending');
    }
  }
}
