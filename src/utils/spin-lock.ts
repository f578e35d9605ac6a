import { SPIN_CONSTANTS } from '../config/constants.js';

const UNLOCKED = 0;
const LOCKED = 1;

export interface SpinSettings {
  /** Backoff rounds before falling back to a timed park */
  maxSpins: number;
  /** Upper bound for a single park, in milliseconds */
  maxParkMs: number;
}

export interface SpinLockOptions extends Partial<SpinSettings> {
  /** Share the flag with other threads by passing the same buffer */
  buffer?: SharedArrayBuffer;
  /** Int32 slot inside `buffer` */
  index?: number;
}

/**
 * Guard for short, constant-time critical sections.
 *
 * Test-and-test-and-set with exponential backoff, then a futex-style timed
 * `Atomics.wait` so a contended thread stops burning CPU. Never hold it
 * across anything that can block.
 */
export class SpinLock {
  private readonly flag: Int32Array;
  private readonly index: number;
  private readonly maxSpins: number;
  private readonly maxParkMs: number;

  constructor(options: SpinLockOptions = {}) {
    this.flag = new Int32Array(options.buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    this.index = options.index ?? 0;
    if (this.index < 0 || this.index >= this.flag.length) {
      throw new RangeError(`SpinLock index ${this.index} is outside the shared buffer`);
    }
    this.maxSpins = Math.max(0, options.maxSpins ?? SPIN_CONSTANTS.MAX_SPINS);
    this.maxParkMs = Math.max(SPIN_CONSTANTS.MIN_PARK_MS, options.maxParkMs ?? SPIN_CONSTANTS.MAX_PARK_MS);
  }

  settings(): SpinSettings {
    return { maxSpins: this.maxSpins, maxParkMs: this.maxParkMs };
  }

  tryLock(): boolean {
    return Atomics.compareExchange(this.flag, this.index, UNLOCKED, LOCKED) === UNLOCKED;
  }

  lock(): void {
    let spins = 0;
    let backoff = 1;
    let parkMs: number = SPIN_CONSTANTS.MIN_PARK_MS;

    while (!this.tryLock()) {
      if (spins < this.maxSpins) {
        // read-only spin so the cache line is not hammered with writes
        for (let i = 0; i < backoff; i++) {
          if (Atomics.load(this.flag, this.index) !== LOCKED) break;
        }
        spins++;
        backoff = Math.min(backoff * 2, SPIN_CONSTANTS.MAX_BACKOFF);
        continue;
      }

      Atomics.wait(this.flag, this.index, LOCKED, parkMs);
      parkMs = Math.min(parkMs * 2, this.maxParkMs);
    }
  }

  unlock(): void {
    Atomics.store(this.flag, this.index, UNLOCKED);
    Atomics.notify(this.flag, this.index, 1);
  }

  isLocked(): boolean {
    return Atomics.load(this.flag, this.index) === LOCKED;
  }

  /**
   * Run a synchronous critical section with automatic lock/unlock
   */
  withLock<T>(fn: () => T): T {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }
}
