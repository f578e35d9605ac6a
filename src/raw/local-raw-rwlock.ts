import type { RawRwLockUpgrade } from '../types/lock.js';
import { LockStateError, LockWouldBlockError } from '../core/errors.js';

/**
 * Reader/writer primitive for a single thread.
 *
 * Nothing else can run while the thread is blocked, so a blocking acquire
 * that cannot be granted immediately throws instead of hanging.
 */
export class LocalRawRwLock implements RawRwLockUpgrade {
  private readers = 0;
  private writer = false;
  private upgradable = false;

  lockShared(): void {
    if (!this.tryLockShared()) throw new LockWouldBlockError('lockShared');
  }

  tryLockShared(): boolean {
    if (this.writer) return false;
    this.readers++;
    return true;
  }

  unlockShared(): void {
    if (this.readers === 0) {
      throw new LockStateError('unlockShared', 'no shared hold to release');
    }
    this.readers--;
  }

  lockExclusive(): void {
    if (!this.tryLockExclusive()) throw new LockWouldBlockError('lockExclusive');
  }

  tryLockExclusive(): boolean {
    if (this.writer || this.upgradable || this.readers > 0) return false;
    this.writer = true;
    return true;
  }

  unlockExclusive(): void {
    if (!this.writer) {
      throw new LockStateError('unlockExclusive', 'exclusive hold is not held');
    }
    this.writer = false;
  }

  lockUpgradable(): void {
    if (!this.tryLockUpgradable()) throw new LockWouldBlockError('lockUpgradable');
  }

  tryLockUpgradable(): boolean {
    if (this.writer || this.upgradable) return false;
    this.upgradable = true;
    return true;
  }

  unlockUpgradable(): void {
    if (!this.upgradable) {
      throw new LockStateError('unlockUpgradable', 'upgradable hold is not held');
    }
    this.upgradable = false;
  }

  upgrade(): void {
    if (!this.tryUpgrade()) throw new LockWouldBlockError('upgrade');
  }

  tryUpgrade(): boolean {
    if (!this.upgradable) {
      throw new LockStateError('tryUpgrade', 'upgradable hold is not held');
    }
    if (this.readers > 0) return false;
    this.upgradable = false;
    this.writer = true;
    return true;
  }

  downgrade(): void {
    this.unlockExclusive();
    this.readers++;
  }

  downgradeUpgradable(): void {
    this.unlockUpgradable();
    this.readers++;
  }

  downgradeToUpgradable(): void {
    this.unlockExclusive();
    this.upgradable = true;
  }

  isLocked(): boolean {
    return this.writer || this.upgradable || this.readers > 0;
  }

  isLockedExclusive(): boolean {
    return this.writer;
  }

  /**
   * Current shared holder count (for debugging)
   */
  getReaderCount(): number {
    return this.readers;
  }
}
