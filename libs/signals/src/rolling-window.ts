const COMPACT_AFTER = 64;

/**
 * Time-ordered deque. Appends go to the tail, eviction advances a head index
 * and the backing array is compacted once the dead prefix dominates.
 */
export class RollingWindow<T extends { readonly timestamp: number }> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  first(): T | undefined {
    return this.length ? this.items[this.head] : undefined;
  }

  last(): T | undefined {
    return this.length ? this.items[this.items.length - 1] : undefined;
  }

  /** Drops entries with `timestamp < cutoff` from the head. */
  evictBefore(cutoff: number, onEvict?: (item: T) => void): number {
    const start = this.head;
    while (this.head < this.items.length && this.items[this.head].timestamp < cutoff) {
      onEvict?.(this.items[this.head]);
      this.head += 1;
    }
    const evicted = this.head - start;
    if (this.head >= COMPACT_AFTER && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return evicted;
  }

  toArray(): T[] {
    return this.items.slice(this.head);
  }
}
