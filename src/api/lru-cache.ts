/**
 * Bounded map that evicts the least recently used entry.
 *
 * Relies on `Map` iterating in insertion order: a read re-inserts the
 * entry, so the first key is always the oldest.
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const value = this.entries.get(key);

    if (value !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, value);
    }

    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Store an entry, evicting the oldest ones beyond capacity. A cache of
   * capacity 0 stores nothing.
   */
  set(key: K, value: V): void {
    if (this.capacity <= 0) {
      return;
    }

    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();

      if (oldest.done) {
        break;
      }

      this.entries.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }
}
