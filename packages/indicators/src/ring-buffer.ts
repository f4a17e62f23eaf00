/**
 * Fixed-capacity circular buffer. Pushing into a full buffer overwrites the
 * oldest value and hands it back so rolling sums can be kept in O(1).
 */
export class RingBuffer<T> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  get full(): boolean {
    return this.count === this.capacity;
  }

  push(value: T): T | undefined {
    const evicted = this.full ? this.items[this.head] : undefined;
    this.items[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (!this.full) this.count += 1;
    return evicted;
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    const start = this.full ? this.head : 0;
    for (let i = 0; i < this.count; i += 1) {
      const item = this.items[(start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.items[(this.head - 1 + this.capacity) % this.capacity];
  }
}
