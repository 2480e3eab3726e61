/**
 * Fixed-capacity FIFO that evicts its oldest entry when full
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private readonly capacity: number;
  private evicted: number = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Append an item
   * @returns the evicted item, if the queue was full
   */
  push(item: T): T | undefined {
    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
      this.evicted++;
    }
    this.items.push(item);
    return dropped;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Remove and return up to `maxCount` oldest items
   */
  drain(maxCount: number = Infinity): T[] {
    return this.items.splice(0, Math.max(0, maxCount));
  }

  peek(): T | undefined {
    return this.items[0];
  }

  clear(): T[] {
    const removed = this.items;
    this.items = [];
    return removed;
  }

  get length(): number {
    return this.items.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  get evictedCount(): number {
    return this.evicted;
  }
}
