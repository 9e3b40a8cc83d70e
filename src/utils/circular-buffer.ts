/**
 * CircularBuffer — Fixed-size ring buffer used for bounded audit trails.
 *
 * When full, new items overwrite the oldest.
 * toArray() returns items in insertion order (oldest → newest).
 */
export class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;    // next write position
  private count = 0;
  private dropped = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('CircularBuffer capacity must be an integer >= 1');
    }
    this.capacity = capacity;
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Push an item. If full, overwrites the oldest item and returns it.
   */
  push(item: T): T | undefined {
    const evicted = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.dropped++;
    }
    return evicted;
  }

  /**
   * Push several items in order.
   */
  pushAll(items: readonly T[]): void {
    for (const item of items) {
      this.push(item);
    }
  }

  /**
   * Returns all items in order oldest → newest.
   */
  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  /**
   * Get the most recent item (last pushed).
   */
  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  get length(): number {
    return this.count;
  }

  /** Items overwritten since the last clear */
  get evicted(): number {
    return this.dropped;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
    this.dropped = 0;
  }
}
