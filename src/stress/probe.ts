const ACTIVE_WRITERS = 0;
const ACTIVE_READERS = 1;
const MAX_WRITERS = 2;
const MAX_READERS = 3;
const VIOLATIONS = 4;
const SLOTS = 5;

export interface ProbeSnapshot {
  maxConcurrentWriters: number;
  maxConcurrentReaders: number;
  violations: number;
}

function raiseTo(words: Int32Array, index: number, candidate: number): void {
  for (;;) {
    const current = Atomics.load(words, index);
    if (candidate <= current) return;
    if (Atomics.compareExchange(words, index, current, candidate) === current) return;
  }
}

/**
 * Counts holders inside critical sections, in shared memory so every
 * thread of a stress run reports into the same counters. A writer that
 * sees anyone else inside, or a reader that sees a writer, is a violation.
 */
export class ConcurrencyProbe {
  private readonly words: Int32Array;

  constructor(buffer: SharedArrayBuffer = ConcurrencyProbe.allocate()) {
    this.words = new Int32Array(buffer, 0, SLOTS);
  }

  static allocate(): SharedArrayBuffer {
    return new SharedArrayBuffer(SLOTS * Int32Array.BYTES_PER_ELEMENT);
  }

  enterWriter(): void {
    const writers = Atomics.add(this.words, ACTIVE_WRITERS, 1) + 1;
    raiseTo(this.words, MAX_WRITERS, writers);
    if (writers > 1 || Atomics.load(this.words, ACTIVE_READERS) > 0) {
      Atomics.add(this.words, VIOLATIONS, 1);
    }
  }

  exitWriter(): void {
    Atomics.sub(this.words, ACTIVE_WRITERS, 1);
  }

  enterReader(): void {
    const readers = Atomics.add(this.words, ACTIVE_READERS, 1) + 1;
    raiseTo(this.words, MAX_READERS, readers);
    if (Atomics.load(this.words, ACTIVE_WRITERS) > 0) {
      Atomics.add(this.words, VIOLATIONS, 1);
    }
  }

  exitReader(): void {
    Atomics.sub(this.words, ACTIVE_READERS, 1);
  }

  snapshot(): ProbeSnapshot {
    return {
      maxConcurrentWriters: Atomics.load(this.words, MAX_WRITERS),
      maxConcurrentReaders: Atomics.load(this.words, MAX_READERS),
      violations: Atomics.load(this.words, VIOLATIONS),
    };
  }
}
