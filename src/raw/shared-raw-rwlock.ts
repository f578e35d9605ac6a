import { randomUUID } from 'crypto';
import { BroadcastChannel } from 'worker_threads';
import type { RawRwLockUpgrade, ReleaseWatch, RemoteReleaseSource } from '../types/lock.js';
import { LockStateError } from '../core/errors.js';
import { SHARED_LOCK_CONSTANTS } from '../config/constants.js';
import { log } from '../utils/logger.js';

const { WRITER, UPGRADABLE, READER, READER_MASK, STATE_INDEX, PARKED_INDEX, SLOTS } = SHARED_LOCK_CONSTANTS;

/**
 * Everything another thread needs to attach to the same lock.
 * Structured-cloneable, so it can travel through `workerData` or `postMessage`.
 */
export interface SharedRawRwLockHandle {
  buffer: SharedArrayBuffer;
  channel: string;
}

export function isSharedRawRwLockHandle(value: unknown): value is SharedRawRwLockHandle {
  return (
    typeof value === 'object' &&
    value !== null &&
    'buffer' in value &&
    value.buffer instanceof SharedArrayBuffer &&
    'channel' in value &&
    typeof value.channel === 'string'
  );
}

/**
 * Reader/writer primitive living in shared memory.
 *
 * The whole lock is one Int32 word (see SHARED_LOCK_CONSTANTS): shared holders
 * in the low bits, upgradable and exclusive flags above. Blocking acquires
 * park on the word with `Atomics.wait` and every release notifies it.
 * Releases are also broadcast to other threads whose adapters have waiters,
 * counted in the second word.
 */
export class SharedRawRwLock implements RawRwLockUpgrade, RemoteReleaseSource {
  private readonly words: Int32Array;
  private readonly channelName: string;
  private channel: BroadcastChannel | null = null;
  private readonly listeners = new Set<() => void>();
  private parkedWatches = 0;

  constructor(handle?: SharedRawRwLockHandle) {
    const buffer = handle?.buffer ?? new SharedArrayBuffer(SLOTS * Int32Array.BYTES_PER_ELEMENT);
    if (buffer.byteLength < SLOTS * Int32Array.BYTES_PER_ELEMENT) {
      throw new RangeError(`Shared lock buffer needs ${SLOTS * Int32Array.BYTES_PER_ELEMENT} bytes, got ${buffer.byteLength}`);
    }
    this.words = new Int32Array(buffer, 0, SLOTS);
    this.channelName = handle?.channel ?? `${SHARED_LOCK_CONSTANTS.CHANNEL_PREFIX}${randomUUID()}`;
  }

  static fromHandle(handle: SharedRawRwLockHandle): SharedRawRwLock {
    return new SharedRawRwLock(handle);
  }

  handle(): SharedRawRwLockHandle {
    const buffer = this.words.buffer;
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new TypeError('Shared lock is not backed by a SharedArrayBuffer');
    }
    return { buffer, channel: this.channelName };
  }

  tryLockShared(): boolean {
    for (;;) {
      const state = Atomics.load(this.words, STATE_INDEX);
      if (state & WRITER) return false;
      if (Atomics.compareExchange(this.words, STATE_INDEX, state, state + READER) === state) {
        return true;
      }
    }
  }

  lockShared(): void {
    this.blockUntil(() => this.tryLockShared());
  }

  unlockShared(): void {
    for (;;) {
      const state = Atomics.load(this.words, STATE_INDEX);
      if ((state & READER_MASK) === 0) {
        throw new LockStateError('unlockShared', 'no shared hold to release');
      }
      if (Atomics.compareExchange(this.words, STATE_INDEX, state, state - READER) === state) {
        break;
      }
    }
    this.released();
  }

  tryLockExclusive(): boolean {
    return Atomics.compareExchange(this.words, STATE_INDEX, 0, WRITER) === 0;
  }

  lockExclusive(): void {
    this.blockUntil(() => this.tryLockExclusive());
  }

  unlockExclusive(): void {
    this.replaceFlag('unlockExclusive', WRITER, 0);
    this.released();
  }

  tryLockUpgradable(): boolean {
    for (;;) {
      const state = Atomics.load(this.words, STATE_INDEX);
      if (state & (WRITER | UPGRADABLE)) return false;
      if (Atomics.compareExchange(this.words, STATE_INDEX, state, state | UPGRADABLE) === state) {
        return true;
      }
    }
  }

  lockUpgradable(): void {
    this.blockUntil(() => this.tryLockUpgradable());
  }

  unlockUpgradable(): void {
    this.replaceFlag('unlockUpgradable', UPGRADABLE, 0);
    this.released();
  }

  tryUpgrade(): boolean {
    const state = Atomics.load(this.words, STATE_INDEX);
    if (!(state & UPGRADABLE)) {
      throw new LockStateError('tryUpgrade', 'upgradable hold is not held');
    }
    return Atomics.compareExchange(this.words, STATE_INDEX, UPGRADABLE, WRITER) === UPGRADABLE;
  }

  upgrade(): void {
    this.blockUntil(() => this.tryUpgrade());
  }

  downgrade(): void {
    this.replaceFlag('downgrade', WRITER, READER);
    this.released();
  }

  downgradeUpgradable(): void {
    this.replaceFlag('downgradeUpgradable', UPGRADABLE, READER);
    this.released();
  }

  downgradeToUpgradable(): void {
    this.replaceFlag('downgradeToUpgradable', WRITER, UPGRADABLE);
    this.released();
  }

  isLocked(): boolean {
    return Atomics.load(this.words, STATE_INDEX) !== 0;
  }

  isLockedExclusive(): boolean {
    return (Atomics.load(this.words, STATE_INDEX) & WRITER) !== 0;
  }

  getReaderCount(): number {
    return Atomics.load(this.words, STATE_INDEX) & READER_MASK;
  }

  /**
   * Number of threads currently waiting for a broadcast release
   */
  getParkedThreadCount(): number {
    return Atomics.load(this.words, PARKED_INDEX);
  }

  watchReleases(listener: () => void): ReleaseWatch {
    this.openChannel();
    this.listeners.add(listener);

    let parked = false;
    let closed = false;

    const unpark = (): void => {
      if (!parked) return;
      parked = false;
      Atomics.sub(this.words, PARKED_INDEX, 1);
      this.parkedWatches--;
      if (this.parkedWatches === 0) this.channel?.unref();
    };

    return {
      park: () => {
        if (parked || closed) return;
        parked = true;
        this.parkedWatches++;
        this.channel?.ref();
        Atomics.add(this.words, PARKED_INDEX, 1);
      },
      unpark,
      close: () => {
        if (closed) return;
        closed = true;
        unpark();
        this.listeners.delete(listener);
        if (this.listeners.size === 0) this.close();
      },
    };
  }

  /**
   * Close the release channel. Watches opened later reopen it.
   */
  close(): void {
    if (!this.channel) return;
    this.channel.close();
    this.channel = null;
    log.debug('Closed shared lock release channel', { channel: this.channelName });
  }

  private openChannel(): void {
    if (this.channel) return;
    const channel = new BroadcastChannel(this.channelName);
    channel.onmessage = () => {
      for (const listener of [...this.listeners]) {
        listener();
      }
    };
    // only parked watches keep the thread alive
    channel.unref();
    this.channel = channel;
    log.debug('Opened shared lock release channel', { channel: this.channelName });
  }

  private replaceFlag(operation: string, held: number, replacement: number): void {
    for (;;) {
      const state = Atomics.load(this.words, STATE_INDEX);
      if (!(state & held)) {
        throw new LockStateError(operation, held === WRITER ? 'exclusive hold is not held' : 'upgradable hold is not held');
      }
      const next = state - held + replacement;
      if (Atomics.compareExchange(this.words, STATE_INDEX, state, next) === state) {
        return;
      }
    }
  }

  private blockUntil(attempt: () => boolean): void {
    for (;;) {
      const observed = Atomics.load(this.words, STATE_INDEX);
      if (attempt()) return;
      Atomics.wait(this.words, STATE_INDEX, observed);
    }
  }

  private released(): void {
    Atomics.notify(this.words, STATE_INDEX);
    if (Atomics.load(this.words, PARKED_INDEX) > 0) {
      this.openChannel();
      this.channel?.postMessage(null);
    }
  }
}
