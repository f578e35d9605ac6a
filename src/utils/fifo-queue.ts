/**
 * Unbounded FIFO on a growable ring buffer
 *
 * O(1) push at both ends and pop from the front. Front pushes exist for
 * entries that must be served before everything already queued.
 */
export class FifoQueue<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(initialCapacity: number = 16) {
    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
      throw new Error('FifoQueue requires a positive integer capacity');
    }
    this.buffer = new Array<T | undefined>(initialCapacity);
  }

  get length(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  push(item: T): void {
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.buffer[(this.head + this.count) % this.buffer.length] = item;
    this.count++;
  }

  pushFront(item: T): void {
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.head = (this.head - 1 + this.buffer.length) % this.buffer.length;
    this.buffer[this.head] = item;
    this.count++;
  }

  shift(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;
    return item;
  }

  peek(): T | undefined {
    return this.count === 0 ? undefined : this.buffer[this.head];
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.buffer.length];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(16);
    this.head = 0;
    this.count = 0;
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
  }
}
