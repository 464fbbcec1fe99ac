/**
 * LRU cache over Map insertion order, used to memoise content-addressed
 * registry documents (manifests, referrer indexes, blobs).
 */
export class LRUCache<K, V> {
  // Boxed so that cached `undefined` values are distinguishable from misses
  private map = new Map<K, { value: V }>();
  private readonly maxSize: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRU cache size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    return this.touch(key)?.value;
  }

  /**
   * Returns the cached value, or computes, stores and returns it.
   * Rejected computations are not cached.
   */
  async getOrLoad(key: K, load: () => Promise<V>): Promise<V> {
    const hit = this.touch(key);
    if (hit) {
      return hit.value;
    }
    const value = await load();
    this.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  set(key: K, value: V): void {
    this.map.delete(key);
    this.map.set(key, { value });
    for (const oldest of this.map.keys()) {
      if (this.map.size <= this.maxSize) break;
      this.map.delete(oldest);
    }
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  private touch(key: K): { value: V } | undefined {
    const entry = this.map.get(key);
    if (entry) {
      // Re-insert so the entry becomes most recently used
      this.map.delete(key);
      this.map.set(key, entry);
    }
    return entry;
  }
}
