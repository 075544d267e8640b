/**
 * Permission Cache Types
 *
 * The cache holds derived EffectivePermissionSet values keyed by role id.
 * It is never a source of truth: every entry can be recomputed from the store.
 */

import type { EffectivePermissionSet } from '../types/rbac.types.js';

export interface CacheConfig {
  /** Cache backend type */
  type: 'memory' | 'redis';

  /** Maximum number of entries (memory backend) */
  maxSize?: number;

  /** Time-to-live per entry in ms; 0 disables expiry */
  ttlMs?: number;
}

export interface MemoryCacheConfig extends CacheConfig {
  type: 'memory';
}

export interface RedisCacheConfig extends CacheConfig {
  type: 'redis';
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  db?: number;
  /** Key prefix for all cache entries */
  keyPrefix?: string;
}

export type AnyCacheConfig = MemoryCacheConfig | RedisCacheConfig;

/**
 * A cached set together with the coordinator epoch at which the read that
 * computed it started.
 */
export interface CachedPermissionSet {
  value: EffectivePermissionSet;
  epoch: number;
}

export interface PermissionCacheStats {
  size: number;
  maxSize?: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
}

export interface PermissionCache {
  readonly type: CacheConfig['type'];

  get(roleId: string): Promise<CachedPermissionSet | undefined>;
  set(roleId: string, entry: CachedPermissionSet): Promise<void>;
  /** Returns the number of entries removed */
  delete(roleIds: string[]): Promise<number>;
  clear(): Promise<void>;
  stats(): Promise<PermissionCacheStats>;
  close(): Promise<void>;
}
