// api/_lib/utils/ringBuffer.ts
// Fixed-capacity FIFO; pushing into a full buffer evicts the oldest entry.

export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /** Returns the evicted entry, if any. */
  push(value: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = value;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** The last n entries, oldest first; fewer when the buffer holds fewer. */
  last(n: number): T[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const out: T[] = [];
    for (let i = this.count - take; i < this.count; i++) {
      const value = this.slots[(this.head + i) % this.capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }

  toArray(): T[] {
    return this.last(this.count);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
