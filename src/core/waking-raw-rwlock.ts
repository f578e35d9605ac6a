import type {
  RawRwLock,
  RawRwLockUpgrade,
  ReleaseWatch,
  WakeIntent,
  WakeMode,
  WakePolicy,
  Waker,
  WakerEntry,
} from '../types/lock.js';
import { isRemoteReleaseSource } from '../types/lock.js';
import { DEFAULT_WAKE_POLICY } from '../config/constants.js';
import { FifoQueue } from '../utils/fifo-queue.js';
import { OnceCell } from '../utils/once-cell.js';
import { SpinLock, type SpinSettings } from '../utils/spin-lock.js';
import { log } from '../utils/logger.js';

export interface WakingRawRwLockOptions {
  wakePolicy?: WakePolicy;
  spin?: Partial<SpinSettings>;
}

/**
 * Wraps a synchronous reader/writer primitive and collects wakers of tasks
 * that failed to acquire it, waking them when a hold is released.
 *
 * The adapter exposes the primitive's own capability set, so it can stand in
 * wherever the primitive is expected. Suspended acquirers must follow the
 * protocol: try, on failure `registerWaker`, then try once more before
 * suspending. A release that slips in between the first try and the
 * registration is caught by that second try; one that comes after the
 * registration pops the waker. Push and pop are serialised by `locking`,
 * which is never held across a call into the primitive or a waker.
 */
export class WakingRawRwLock<R extends RawRwLock = RawRwLock> implements RawRwLock {
  readonly inner: R;
  protected readonly wakePolicy: WakePolicy;
  private readonly locking: SpinLock;
  private readonly queue = new OnceCell<FifoQueue<WakerEntry>>();
  private releaseWatch: ReleaseWatch | null = null;

  constructor(inner: R, options: WakingRawRwLockOptions = {}) {
    this.inner = inner;
    this.wakePolicy = options.wakePolicy ?? DEFAULT_WAKE_POLICY;
    this.locking = new SpinLock(options.spin);
  }

  lockShared(): void {
    this.ensureQueue();
    this.inner.lockShared();
  }

  tryLockShared(): boolean {
    this.ensureQueue();
    return this.inner.tryLockShared();
  }

  unlockShared(): void {
    this.inner.unlockShared();
    this.wakeUp('one');
  }

  lockExclusive(): void {
    this.ensureQueue();
    this.inner.lockExclusive();
  }

  tryLockExclusive(): boolean {
    this.ensureQueue();
    return this.inner.tryLockExclusive();
  }

  unlockExclusive(): void {
    this.inner.unlockExclusive();
    this.wakeUp(this.exclusiveReleaseMode());
  }

  isLocked(): boolean {
    return this.inner.isLocked();
  }

  isLockedExclusive(): boolean {
    return this.inner.isLockedExclusive();
  }

  /**
   * Queue a waker for the next release. Call only right after a failed
   * try-acquire, and retry once afterwards before suspending.
   */
  registerWaker(waker: Waker, intent: WakeIntent = 'exclusive'): void {
    const queue = this.ensureQueue();
    const entry: WakerEntry = { waker, intent };

    this.locking.withLock(() => {
      if (queue.isEmpty()) {
        this.releaseWatch?.park();
      }
      // a pending upgrade blocks everyone queued behind it
      if (intent === 'upgrade') {
        queue.pushFront(entry);
      } else {
        queue.push(entry);
      }
    });
  }

  /**
   * Pop and wake queued waiters. `'one'` wakes the head; `'readers'` also
   * wakes the shared waiters queued directly behind a shared head.
   *
   * A waker that declines hands the wakeup on: popping continues until one
   * takes it or the queue runs dry. Returns how many wakers took it.
   */
  wakeUp(mode: WakeMode = 'one'): number {
    const queue = this.queue.get();
    if (!queue) return 0;

    const failures: unknown[] = [];
    let taken = 0;

    while (taken === 0) {
      const popped = this.popBatch(queue, mode);
      if (popped.length === 0) break;

      for (const entry of popped) {
        try {
          if (entry.waker.wake() !== false) taken++;
        } catch (error) {
          taken++;
          failures.push(error);
        }
      }
    }

    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) throw new AggregateError(failures, `${failures.length} wakers failed`);
    return taken;
  }

  waiterCount(): number {
    return this.queue.get()?.length ?? 0;
  }

  hasQueue(): boolean {
    return this.queue.isInitialized();
  }

  /**
   * Drop the waker queue and stop listening for releases from other threads.
   * Safe to call more than once; a later acquire starts a fresh queue.
   */
  dispose(): void {
    const queue = this.queue.take();
    this.releaseWatch?.close();
    this.releaseWatch = null;

    if (queue && !queue.isEmpty()) {
      log.warn('Disposed lock with suspended waiters still queued', { waiters: queue.length });
    } else if (queue) {
      log.debug('Disposed lock wait queue');
    }
  }

  /** Spin lock tuning the queue guard runs with */
  spinSettings(): SpinSettings {
    return this.locking.settings();
  }

  protected exclusiveReleaseMode(): WakeMode {
    return this.wakePolicy === 'batch-readers' ? 'readers' : 'one';
  }

  private popBatch(queue: FifoQueue<WakerEntry>, mode: WakeMode): WakerEntry[] {
    return this.locking.withLock(() => {
      const entries: WakerEntry[] = [];
      const head = queue.shift();
      if (!head) return entries;

      entries.push(head);
      if (mode === 'readers' && head.intent === 'shared') {
        while (queue.peek()?.intent === 'shared') {
          const next = queue.shift();
          if (next) entries.push(next);
        }
      }

      if (queue.isEmpty()) {
        this.releaseWatch?.unpark();
      }
      return entries;
    });
  }

  protected ensureQueue(): FifoQueue<WakerEntry> {
    return this.queue.getOrInit(() => {
      if (isRemoteReleaseSource(this.inner)) {
        this.releaseWatch = this.inner.watchReleases(() => {
          try {
            this.wakeUp('readers');
          } catch (error) {
            // nobody up the stack of a channel message to hand this to
            log.error('Waker failed while handling a release from another thread', error);
          }
        });
      }
      log.debug('Created lock wait queue', { remote: this.releaseWatch !== null, wakePolicy: this.wakePolicy });
      return new FifoQueue<WakerEntry>();
    });
  }
}

/**
 * Waking adapter for primitives that also support upgradable reads
 */
export class WakingRawRwLockUpgrade<R extends RawRwLockUpgrade = RawRwLockUpgrade>
  extends WakingRawRwLock<R>
  implements RawRwLockUpgrade
{
  lockUpgradable(): void {
    this.ensureQueue();
    this.inner.lockUpgradable();
  }

  tryLockUpgradable(): boolean {
    this.ensureQueue();
    return this.inner.tryLockUpgradable();
  }

  unlockUpgradable(): void {
    this.inner.unlockUpgradable();
    this.wakeUp('one');
  }

  upgrade(): void {
    this.ensureQueue();
    this.inner.upgrade();
  }

  tryUpgrade(): boolean {
    this.ensureQueue();
    return this.inner.tryUpgrade();
  }

  downgrade(): void {
    this.inner.downgrade();
    this.wakeUp(this.exclusiveReleaseMode());
  }

  downgradeUpgradable(): void {
    this.inner.downgradeUpgradable();
    this.wakeUp('one');
  }

  downgradeToUpgradable(): void {
    this.inner.downgradeToUpgradable();
    this.wakeUp(this.exclusiveReleaseMode());
  }
}
