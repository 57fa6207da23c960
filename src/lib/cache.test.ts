import { afterEach, describe, expect, it } from 'vitest';
import { MemoryTtlCache } from './cache';
import { CacheAdapter } from './redis';

describe('MemoryTtlCache', () => {
  let now = 0;
  const caches: MemoryTtlCache<string>[] = [];
  const create = (maxEntries = 10) => {
    const cache = new MemoryTtlCache<string>(1000, maxEntries, () => now);
    caches.push(cache);
    return cache;
  };

  afterEach(() => {
    caches.splice(0).forEach((cache) => cache.destroy());
    now = 0;
  });

  it('expires entries after their TTL', () => {
    const cache = create();
    cache.set('a', 'one', 100);
    now = 100;
    expect(cache.get('a')).toBe('one');
    now = 101;
    expect(cache.get('a')).toBeUndefined();
  });

  it('evicts the oldest entry when full', () => {
    const cache = create(2);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(2);
  });

  it('invalidates by prefix', () => {
    const cache = create();
    cache.set('forecast:A:7', 'x');
    cache.set('forecast:A:30', 'y');
    cache.set('forecast:B:7', 'z');
    expect(cache.invalidate('forecast:A:')).toBe(2);
    expect(cache.get('forecast:B:7')).toBe('z');
  });
});

describe('CacheAdapter without Redis', () => {
  it('round-trips JSON values through memory', async () => {
    const cache = new CacheAdapter();
    await cache.set('forecast:SKU-1', { total: 3, days: [1, 2] }, 60);

    expect(await cache.get('forecast:SKU-1')).toEqual({ total: 3, days: [1, 2] });
    expect(cache.getStats()).toEqual({ backend: 'memory', redisConnected: false, memoryEntries: 1 });

    await cache.delete('forecast:SKU-1');
    expect(await cache.get('forecast:SKU-1')).toBeNull();
    await cache.disconnect();
  });
});
