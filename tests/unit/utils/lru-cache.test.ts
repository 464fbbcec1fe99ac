/**
 * Tests for the LRU cache
 */

import { describe, it, expect, vi } from 'vitest';
import { LRUCache } from '../../../src/utils/lru-cache.js';

describe('LRUCache', () => {
  it('should evict the least recently used entry', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('should distinguish a cached undefined from a miss', async () => {
    const cache = new LRUCache<string, undefined>(1);
    const load = vi.fn(async () => undefined);

    await cache.getOrLoad('k', load);
    await cache.getOrLoad('k', load);

    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should load once and then serve from cache', async () => {
    const cache = new LRUCache<string, string>(4);
    const load = vi.fn(async () => 'value');

    expect(await cache.getOrLoad('k', load)).toBe('value');
    expect(await cache.getOrLoad('k', load)).toBe('value');
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should not cache a failed load', async () => {
    const cache = new LRUCache<string, string>(4);
    const load = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce('second');

    await expect(cache.getOrLoad('k', load)).rejects.toThrow('boom');
    await expect(cache.getOrLoad('k', load)).resolves.toBe('second');
  });

  it('should empty on clear', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });

  it('should reject a non-positive size', () => {
    expect(() => new LRUCache(0)).toThrow(RangeError);
  });
});
