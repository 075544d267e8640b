/**
 * In-process permission cache backed by the LRU cache.
 */

import { LRUCache } from './lru-cache.js';
import type { CachedPermissionSet, MemoryCacheConfig, PermissionCache, PermissionCacheStats } from './types.js';

const MEMORY_CACHE_DEFAULTS = {
  MAX_SIZE: 10000,
  TTL_MS: 3600000, // 1 hour
} as const;

// Entries never share arrays or objects with callers
function copyEntry(entry: CachedPermissionSet): CachedPermissionSet {
  return {
    epoch: entry.epoch,
    value: {
      roleId: entry.value.roleId,
      computedAt: new Date(entry.value.computedAt),
      permissions: entry.value.permissions.map((permission) => ({ ...permission })),
    },
  };
}

export class MemoryPermissionCache implements PermissionCache {
  readonly type = 'memory';
  private lru: LRUCache<CachedPermissionSet>;

  constructor(config: Partial<MemoryCacheConfig> = {}, now?: () => number) {
    this.lru = new LRUCache({
      maxSize: config.maxSize ?? MEMORY_CACHE_DEFAULTS.MAX_SIZE,
      defaultTtl: config.ttlMs ?? MEMORY_CACHE_DEFAULTS.TTL_MS,
      now,
    });
  }

  async get(roleId: string): Promise<CachedPermissionSet | undefined> {
    const entry = this.lru.get(roleId);
    return entry ? copyEntry(entry) : undefined;
  }

  async set(roleId: string, entry: CachedPermissionSet): Promise<void> {
    this.lru.set(roleId, copyEntry(entry));
  }

  async delete(roleIds: string[]): Promise<number> {
    let removed = 0;
    for (const roleId of roleIds) {
      if (this.lru.delete(roleId)) removed++;
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.lru.clear();
  }

  async stats(): Promise<PermissionCacheStats> {
    return this.lru.stats();
  }

  async close(): Promise<void> {
    this.lru.clear();
  }

  /** Cached role ids */
  keys(): string[] {
    return this.lru.keys();
  }
}
