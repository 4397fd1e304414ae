/**
 * Ordered container with a hard capacity. Appending past capacity throws
 * rather than truncating; callers check `isFull()` first.
 */
export class BoundedList<T> {
  private readonly items: T[];

  constructor(
    public readonly capacity: number,
    items: readonly T[] = []
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Capacity must be a positive integer, got ${capacity}`);
    }
    if (items.length > capacity) {
      throw new BoundedListOverflowError(capacity);
    }
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  append(item: T): void {
    if (this.isFull()) {
      throw new BoundedListOverflowError(this.capacity);
    }
    this.items.push(item);
  }

  /**
   * Remove every item matching `predicate`; the rest keep their order.
   */
  removeWhere(predicate: (item: T) => boolean): T[] {
    const removed: T[] = [];
    const kept: T[] = [];
    for (const item of this.items) {
      (predicate(item) ? removed : kept).push(item);
    }
    this.items.splice(0, this.items.length, ...kept);
    return removed;
  }

  toArray(): T[] {
    return [...this.items];
  }
}

export class BoundedListOverflowError extends Error {
  constructor(public readonly capacity: number) {
    super(`List is at capacity (${capacity})`);
    this.name = 'BoundedListOverflowError';
  }
}
