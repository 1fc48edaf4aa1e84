/**
 * Fixed-capacity FIFO buffer. Pushing onto a full buffer evicts the oldest item.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append an item, returning the evicted item when the buffer was full
   */
  push(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Items oldest first
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }

  /**
   * Items newest first
   */
  toReversedArray(): T[] {
    return this.toArray().reverse();
  }

  /**
   * Replace the newest item matching the predicate
   */
  replaceLast(predicate: (item: T) => boolean, next: T): boolean {
    for (let i = this.count - 1; i >= 0; i--) {
      const index = (this.head + i) % this.capacity;
      const item = this.slots[index];
      if (item !== undefined && predicate(item)) {
        this.slots[index] = next;
        return true;
      }
    }
    return false;
  }
}
