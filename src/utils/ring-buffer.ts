/**
 * @module ring-buffer
 * @description Fixed-capacity circular FIFO with a drop-oldest overflow policy.
 * Pushing never blocks and never allocates after construction.
 */

/**
 * Circular queue that evicts its oldest item when a push would exceed
 * capacity. Evictions are counted in {@link RingBuffer.dropped}.
 *
 * @example
 * ```typescript
 * const buffer = new RingBuffer<LogRecord>(1000);
 *
 * const evicted = buffer.push(record);
 * if (evicted) recordsDropped.inc();
 *
 * const batch = buffer.popMany(50);
 * ```
 */
export class RingBuffer<T> {
  private buf: (T | undefined)[];
  /** Index where the next item will be written */
  private head = 0;
  /** Index where the next item will be read */
  private tail = 0;
  private count = 0;
  /** Items evicted by overflow since construction */
  private _dropped = 0;
  readonly capacity: number;

  constructor(capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buf = new Array(capacity);
  }

  /**
   * Appends `val`. When the buffer is full the oldest item is removed to
   * make room and returned; otherwise returns undefined.
   */
  push(val: T): T | undefined {
    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.buf[this.tail];
      this.buf[this.tail] = undefined;
      this.tail = (this.tail + 1) % this.capacity;
      this.count--;
      this._dropped++;
    }
    this.buf[this.head] = val;
    this.head = (this.head + 1) % this.capacity;
    this.count++;
    return evicted;
  }

  /** Removes and returns up to `n` items, oldest first. */
  popMany(n = this.capacity): T[] {
    const out: T[] = [];
    while (this.count > 0 && out.length < n) {
      const item = this.buf[this.tail];
      this.buf[this.tail] = undefined; // free for GC
      this.tail = (this.tail + 1) % this.capacity;
      this.count--;
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  get length(): number {
    return this.count;
  }

  get dropped(): number {
    return this._dropped;
  }
}
