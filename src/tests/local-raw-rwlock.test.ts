import test from 'node:test';
import assert from 'node:assert/strict';
import { LocalRawRwLock } from '../raw/local-raw-rwlock.js';
import { LockStateError, LockWouldBlockError } from '../core/errors.js';

test('LocalRawRwLock admits many readers but no writer alongside them', () => {
  const lock = new LocalRawRwLock();

  assert.equal(lock.tryLockShared(), true);
  assert.equal(lock.tryLockShared(), true);
  assert.equal(lock.getReaderCount(), 2);
  assert.equal(lock.tryLockExclusive(), false);

  lock.unlockShared();
  lock.unlockShared();
  assert.equal(lock.isLocked(), false);
  assert.equal(lock.tryLockExclusive(), true);
  assert.equal(lock.isLockedExclusive(), true);
  assert.equal(lock.tryLockShared(), false);
});

test('LocalRawRwLock blocking acquires throw instead of hanging', () => {
  const lock = new LocalRawRwLock();
  lock.lockExclusive();

  assert.throws(() => lock.lockShared(), LockWouldBlockError);
  assert.throws(() => lock.lockExclusive(), (error: unknown) => {
    assert.ok(error instanceof LockWouldBlockError);
    assert.equal(error.operation, 'lockExclusive');
    return true;
  });
});

test('LocalRawRwLock rejects releasing what is not held', () => {
  const lock = new LocalRawRwLock();

  assert.throws(() => lock.unlockShared(), LockStateError);
  assert.throws(() => lock.unlockExclusive(), /unlockExclusive: exclusive hold is not held/);
  assert.throws(() => lock.unlockUpgradable(), LockStateError);
  assert.throws(() => lock.tryUpgrade(), LockStateError);
});

test('LocalRawRwLock upgradable hold coexists with readers and upgrades once they leave', () => {
  const lock = new LocalRawRwLock();

  assert.equal(lock.tryLockUpgradable(), true);
  assert.equal(lock.tryLockUpgradable(), false);
  assert.equal(lock.tryLockShared(), true);
  assert.equal(lock.tryLockExclusive(), false);

  assert.equal(lock.tryUpgrade(), false);
  lock.unlockShared();
  assert.equal(lock.tryUpgrade(), true);
  assert.equal(lock.isLockedExclusive(), true);
});

test('LocalRawRwLock downgrades keep the lock held', () => {
  const lock = new LocalRawRwLock();

  lock.lockExclusive();
  lock.downgradeToUpgradable();
  assert.equal(lock.isLockedExclusive(), false);
  assert.equal(lock.tryLockUpgradable(), false);
  assert.equal(lock.tryLockShared(), true);
  lock.unlockShared();

  lock.downgradeUpgradable();
  assert.equal(lock.getReaderCount(), 1);
  assert.equal(lock.tryLockUpgradable(), true);
  lock.unlockUpgradable();
  lock.unlockShared();

  lock.lockExclusive();
  lock.downgrade();
  assert.equal(lock.getReaderCount(), 1);
  assert.equal(lock.isLockedExclusive(), false);
  lock.unlockShared();
  assert.equal(lock.isLocked(), false);
});
