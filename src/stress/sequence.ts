/**
 * Append-only sequence the stress tasks write into
 */
export interface Sequence {
  append(value: number): void;
  length(): number;
  values(): number[];
}

/**
 * In-thread sequence keeping entries as strings
 */
export class StringSequence implements Sequence {
  readonly items: string[] = [];

  append(value: number): void {
    this.items.push(String(value));
  }

  length(): number {
    return this.items.length;
  }

  values(): number[] {
    return this.items.map((item) => Number(item));
  }
}

/**
 * Sequence over shared memory: slot 0 holds the length, entries follow.
 * Only safe to mutate under the write lock that guards it.
 */
export class SharedInt32Sequence implements Sequence {
  private readonly words: Int32Array;

  constructor(buffer: SharedArrayBuffer) {
    this.words = new Int32Array(buffer);
  }

  static allocate(capacity: number): SharedArrayBuffer {
    return new SharedArrayBuffer((capacity + 1) * Int32Array.BYTES_PER_ELEMENT);
  }

  get capacity(): number {
    return this.words.length - 1;
  }

  append(value: number): void {
    const length = Atomics.load(this.words, 0);
    if (length >= this.capacity) {
      throw new RangeError(`Shared sequence is full (${this.capacity} entries)`);
    }
    Atomics.store(this.words, length + 1, value);
    Atomics.store(this.words, 0, length + 1);
  }

  length(): number {
    return Atomics.load(this.words, 0);
  }

  values(): number[] {
    const length = this.length();
    return Array.from(this.words.subarray(1, length + 1));
  }
}
