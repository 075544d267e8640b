/**
 * LRU Cache Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LRUCache } from '../lru-cache.js';
import { MemoryPermissionCache } from '../memory-cache.js';
import type { CachedPermissionSet } from '../types.js';

describe('LRUCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1000;
  });

  // ==========================================================================
  // Recency
  // ==========================================================================

  describe('eviction', () => {
    it('should evict the least recently used entry', () => {
      const cache = new LRUCache<number>({ maxSize: 2 });
      cache.set('a', 1);
      cache.set('b', 2);
      cache.get('a');
      cache.set('c', 3);

      expect(cache.keys()).toEqual(['a', 'c']);
      expect(cache.getLRU()).toBe('a');
      expect(cache.stats().evictions).toBe(1);
    });

    it('should update an existing key without evicting', () => {
      const cache = new LRUCache<number>({ maxSize: 2 });
      cache.set('a', 1);
      cache.set('b', 2);
      cache.set('a', 10);

      expect(cache.size()).toBe(2);
      expect(cache.get('a')).toBe(10);
      expect(cache.getLRU()).toBe('b');
      expect(cache.stats().evictions).toBe(0);
    });

    it('should reject a size below one', () => {
      expect(() => new LRUCache<number>({ maxSize: 0 })).toThrow('LRU cache maxSize must be at least 1, got 0');
    });
  });

  // ==========================================================================
  // TTL
  // ==========================================================================

  describe('ttl', () => {
    it('should expire entries after the default TTL', () => {
      const cache = new LRUCache<number>({ maxSize: 10, defaultTtl: 100, now: clock });
      cache.set('a', 1);

      now = 1100;
      expect(cache.get('a')).toBe(1);

      now = 1101;
      expect(cache.get('a')).toBeUndefined();
      expect(cache.size()).toBe(0);
    });

    it('should never expire an entry set with a TTL of zero', () => {
      const cache = new LRUCache<number>({ maxSize: 10, defaultTtl: 100, now: clock });
      cache.set('a', 1, 0);

      now = 1_000_000;
      expect(cache.get('a')).toBe(1);
    });
  });

  // ==========================================================================
  // Stats
  // ==========================================================================

  it('should track hits and misses', () => {
    const cache = new LRUCache<number>({ maxSize: 5 });
    cache.set('a', 1);
    cache.get('a');
    cache.get('a');
    cache.get('a');
    cache.get('b');

    expect(cache.stats()).toEqual({ size: 1, maxSize: 5, hits: 3, misses: 1, hitRate: 0.75, evictions: 0 });
  });
});

describe('MemoryPermissionCache', () => {
  const entry = (roleId: string, epoch = 1): CachedPermissionSet => ({
    epoch,
    value: { roleId, permissions: [], computedAt: new Date('2024-03-01T00:00:00.000Z') },
  });

  it('should count the roles actually removed', async () => {
    const cache = new MemoryPermissionCache();
    await cache.set('admin', entry('admin'));
    await cache.set('editor', entry('editor'));

    expect(await cache.delete(['editor', 'viewer'])).toBe(1);
    expect(cache.keys()).toEqual(['admin']);
  });

  it('should apply the configured TTL', async () => {
    let now = 0;
    const cache = new MemoryPermissionCache({ ttlMs: 50 }, () => now);
    await cache.set('admin', entry('admin', 4));

    now = 50;
    expect(await cache.get('admin')).toEqual(entry('admin', 4));
    now = 51;
    expect(await cache.get('admin')).toBeUndefined();
  });

  it('should bound its size', async () => {
    const cache = new MemoryPermissionCache({ maxSize: 1 });
    await cache.set('admin', entry('admin'));
    await cache.set('editor', entry('editor'));

    const stats = await cache.stats();
    expect(stats.size).toBe(1);
    expect(stats.maxSize).toBe(1);
    expect(stats.evictions).toBe(1);
  });

  it('should hand out copies that callers cannot change', async () => {
    const cache = new MemoryPermissionCache();
    const stored = entry('editor');
    stored.value.permissions.push({ id: 'perm-1', codename: 'post.view', name: 'View posts', subsystem: 'post' });
    await cache.set('editor', stored);

    stored.value.permissions.push({ id: 'perm-2', codename: 'user.delete', name: 'Delete users', subsystem: 'user' });
    const first = await cache.get('editor');
    first?.value.permissions.push({ id: 'perm-2', codename: 'user.delete', name: 'Delete users', subsystem: 'user' });
    const [held] = first?.value.permissions ?? [];
    if (held) held.codename = 'user.delete';

    const second = await cache.get('editor');
    expect(second?.value.permissions).toEqual([
      { id: 'perm-1', codename: 'post.view', name: 'View posts', subsystem: 'post' },
    ]);
  });

  it('should empty on clear', async () => {
    const cache = new MemoryPermissionCache();
    await cache.set('admin', entry('admin'));
    await cache.clear();

    expect(cache.keys()).toEqual([]);
  });
});
