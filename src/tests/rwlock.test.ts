import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { setImmediate as tick } from 'node:timers/promises';
import { Worker } from 'node:worker_threads';
import { RwLock } from '../lock/rwlock.js';
import { GuardReleasedError, LockStateError, LockWouldBlockError } from '../core/errors.js';
import { LogLevel, log } from '../utils/logger.js';

log.setLevel(LogLevel.ERROR);

test('single task writes then reads back its entry', async () => {
  const lock = new RwLock<string[]>([]);

  const writer = await lock.write();
  writer.value.push('A');
  writer.release();

  const reader = await lock.read();
  assert.deepStrictEqual(reader.value, ['A']);
  assert.equal(reader.value.length, 1);
  reader.release();

  assert.equal(lock.isLocked(), false);
  lock.dispose();
});

test('100 concurrent tasks each land exactly one entry', async () => {
  const lock = new RwLock<string[]>([]);
  let writers = 0;
  let maxWriters = 0;

  const lengths = await Promise.all(
    Array.from({ length: 100 }, async (_, index) => {
      const writer = await lock.write();
      writers++;
      maxWriters = Math.max(maxWriters, writers);
      await tick();
      writer.value.push(String(index));
      writers--;
      writer.release();

      const reader = await lock.read();
      const length = reader.value.length;
      reader.release();
      return length;
    })
  );

  const entries = await lock.withRead((items) => items.map(Number).sort((a, b) => a - b));
  assert.equal(entries.length, 100);
  assert.deepStrictEqual(entries, Array.from({ length: 100 }, (_, index) => index));
  assert.equal(maxWriters, 1);
  assert.ok(lengths.every((length) => length >= 1 && length <= 100));
  assert.equal(lock.waiterCount(), 0);
});

test('readers hold the lock together', async () => {
  const lock = new RwLock({ hits: 0 });
  let active = 0;
  let maxActive = 0;

  await Promise.all(
    Array.from({ length: 5 }, () =>
      lock.withRead(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await tick();
        active--;
      })
    )
  );

  assert.equal(maxActive, 5);
});

test('releasing a writer admits every reader queued behind it', async () => {
  const lock = new RwLock(0);
  const writer = await lock.write();

  let admitted = 0;
  const readers = Array.from({ length: 3 }, async () => {
    const guard = await lock.read();
    admitted++;
    return guard;
  });
  await tick();
  assert.equal(lock.waiterCount(), 3);

  writer.release();
  await tick();
  assert.equal(admitted, 3);
  for (const guard of await Promise.all(readers)) guard.release();
});

test('the single wake policy admits queued readers one release at a time', async () => {
  const lock = new RwLock(0, { wakePolicy: 'single' });
  const writer = await lock.write();

  let admitted = 0;
  const readers = Array.from({ length: 2 }, async () => {
    const guard = await lock.read();
    admitted++;
    return guard;
  });
  await tick();

  writer.release();
  await tick();
  assert.equal(admitted, 1);
  assert.equal(lock.waiterCount(), 1);

  // an acquire that succeeds wakes nobody, so the second reader waits for a release
  (await readers[0]).release();
  await tick();
  assert.equal(admitted, 2);
  (await readers[1]).release();
  assert.equal(lock.isLocked(), false);
});

test('an upgradable reader upgrades ahead of queued writers', async () => {
  const lock = new RwLock<string[]>([]);
  const upgradable = await lock.upgradableRead();
  const reader = await lock.read();

  const queuedWriter = lock.withWrite((guard) => {
    guard.value.push('writer');
  });
  const upgrading = upgradable.upgrade();
  await tick();
  assert.equal(lock.waiterCount(), 2);

  reader.release();
  const writer = await upgrading;
  writer.value.push('upgraded');
  assert.equal(upgradable.isReleased(), true);
  writer.release();

  await queuedWriter;
  assert.deepStrictEqual(await lock.withRead((items) => [...items]), ['upgraded', 'writer']);
});

test('an upgradable guard cannot be released while its upgrade waits', async () => {
  const lock = new RwLock(0);
  const upgradable = await lock.upgradableRead();
  const reader = await lock.read();

  const upgrading = upgradable.upgrade();
  assert.equal(upgradable.isUpgrading(), true);
  assert.throws(() => upgradable.release(), LockStateError);
  assert.throws(() => upgradable.downgrade(), /downgrade: an upgrade of this guard is still pending/);
  assert.throws(() => upgradable.tryUpgrade(), LockStateError);
  await assert.rejects(upgradable.upgrade(), LockStateError);

  reader.release();
  const writer = await upgrading;
  assert.equal(upgradable.isUpgrading(), false);
  assert.equal(upgradable.isReleased(), true);
  writer.release();
  assert.equal(lock.isLocked(), false);
});

test('an aborted upgrade leaves the upgradable guard usable', async () => {
  const lock = new RwLock(0);
  const upgradable = await lock.upgradableRead();
  const reader = await lock.read();

  const controller = new AbortController();
  const upgrading = upgradable.upgrade({ signal: controller.signal });
  controller.abort('stop');
  await assert.rejects(upgrading, /upgrade acquire aborted/);

  assert.equal(upgradable.isUpgrading(), false);
  reader.release();
  upgradable.release();
  assert.equal(lock.isLocked(), false);
});

test('tryUpgrade succeeds only once the other readers left', async () => {
  const lock = new RwLock('v1');
  const upgradable = await lock.upgradableRead();
  const reader = lock.tryRead();
  assert.ok(reader);

  assert.equal(upgradable.tryUpgrade(), null);
  reader.release();

  const writer = upgradable.tryUpgrade();
  assert.ok(writer);
  writer.value = 'v2';
  const downgraded = writer.downgradeToUpgradable();
  assert.equal(downgraded.value, 'v2');
  const plain = downgraded.downgrade();
  assert.equal(lock.tryWrite(), null);
  const extra = lock.tryRead();
  assert.ok(extra);
  extra.release();
  plain.release();
  assert.equal(lock.isLocked(), false);
});

test('a downgraded writer lets readers in but keeps writers out', async () => {
  const lock = new RwLock({ count: 1 });
  const writer = await lock.write();
  writer.value = { count: 2 };

  const reader = writer.downgrade();
  assert.equal(lock.tryWrite(), null);
  const other = lock.tryRead();
  assert.ok(other);
  assert.deepStrictEqual(other.value, { count: 2 });

  other.release();
  reader.release();
  assert.ok(lock.tryWrite());
});

test('guards reject use after release', async () => {
  const lock = new RwLock(1);
  const writer = await lock.write();
  writer.release();

  assert.throws(() => writer.value, GuardReleasedError);
  assert.throws(() => writer.release(), /write guard used after release/);
  assert.throws(() => writer.downgrade(), GuardReleasedError);
  assert.equal(lock.isLocked(), false);
});

test('withWrite releases the lock when the callback throws', async () => {
  const lock = new RwLock<number[]>([]);

  await assert.rejects(
    lock.withWrite(() => {
      throw new Error('write failed');
    }),
    /write failed/
  );
  assert.equal(lock.isLocked(), false);

  const total = await lock.withWrite((guard) => {
    guard.value = [1, 2, 3];
    return guard.value.length;
  });
  assert.equal(total, 3);
});

test('blocking acquires on a single-thread lock throw while it is held', async () => {
  const lock = new RwLock('x');
  const reader = lock.readBlocking();
  assert.equal(reader.value, 'x');

  assert.throws(() => lock.writeBlocking(), LockWouldBlockError);
  reader.release();

  const writer = lock.writeBlocking();
  assert.throws(() => lock.readBlocking(), LockWouldBlockError);
  writer.release();
});

test('only shared locks expose a handle', () => {
  const local = new RwLock(0);
  assert.throws(() => local.handle(), TypeError);

  const shared = RwLock.shared(0);
  const attached = RwLock.fromHandle(shared.handle(), 0);
  const writer = shared.tryWrite();
  assert.ok(writer);
  assert.equal(attached.tryRead(), null);
  writer.release();

  const reader = attached.tryRead();
  assert.ok(reader);
  reader.release();
  shared.dispose();
  attached.dispose();
});

test('readers that queue while another thread releases are always woken', async () => {
  const lock = RwLock.shared('shared');
  const rounds = 200;
  const cycler = new Worker(new URL('./fixtures/exclusive-cycler.ts', import.meta.url), {
    workerData: { handle: lock.handle(), rounds, holdMs: 0.2 },
  });
  const exited = once(cycler, 'exit');

  let reads = 0;
  try {
    for (let i = 0; i < rounds * 2; i++) {
      // a lost wakeup fails the read instead of hanging the test
      const reader = await lock.read({ signal: AbortSignal.timeout(5000) });
      const value = reader.value;
      reader.release();
      assert.equal(value, 'shared');
      reads++;
      await tick();
    }
  } finally {
    const [code] = await exited;
    assert.equal(code, 0);
  }

  assert.equal(reads, rounds * 2);
  assert.equal(lock.waiterCount(), 0);
  assert.equal(lock.isLocked(), false);
  lock.dispose();
});

test('dispose can run before any acquire and more than once', () => {
  for (let i = 0; i < 100; i++) {
    const lock = new RwLock(i);
    lock.dispose();
    lock.dispose();
  }
  const lock = new RwLock(0);
  assert.ok(lock.tryRead());
  lock.dispose();
});
