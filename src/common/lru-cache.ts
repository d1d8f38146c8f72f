/**
 * Bounded map that evicts the least recently read entry first.
 * Holds parsed roll expressions for the parser.
 */

export class LRUCache<K, V> {
  private cache = new Map<K, V>();

  constructor(private readonly maxSize = 1000) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRUCache size must be a positive integer, got ${maxSize}`);
    }
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    // re-insert to mark as most recently used
    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: K, value: V): this {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.delete(key);
    this.cache.set(key, value);
    return this;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
