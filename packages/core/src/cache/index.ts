/**
 * Permission cache backends and the coordinator that keeps them coherent.
 */

export type {
  CacheConfig,
  MemoryCacheConfig,
  RedisCacheConfig,
  AnyCacheConfig,
  CachedPermissionSet,
  PermissionCache,
  PermissionCacheStats,
} from './types.js';

export { LRUCache, type LRUCacheOptions } from './lru-cache.js';
export { MemoryPermissionCache } from './memory-cache.js';
export { RedisPermissionCache } from './redis-cache.js';
export {
  CacheInvalidationCoordinator,
  type CoordinatorStats,
  type InvalidationListener,
  type LookupOptions,
} from './invalidation-coordinator.js';

import type { AnyCacheConfig, PermissionCache } from './types.js';
import { MemoryPermissionCache } from './memory-cache.js';
import { RedisPermissionCache } from './redis-cache.js';

/**
 * Factory function to create a permission cache based on configuration.
 */
export async function createPermissionCache(config: AnyCacheConfig): Promise<PermissionCache> {
  if (config.type === 'redis') {
    const cache = new RedisPermissionCache(config);
    await cache.connect();
    return cache;
  }
  return new MemoryPermissionCache(config);
}
