/**
 * Bounded FIFO buffer that drops the oldest entry when full.
 */
export class BoundedBuffer<T> {
  private items: T[] = [];
  private dropped = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Append an item. Returns the evicted item when the buffer was full.
   */
  push(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.items.length >= this.capacity) {
      evicted = this.items.shift();
      this.dropped++;
    }
    this.items.push(item);
    return evicted;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
