/**
 * Redis Permission Cache
 *
 * Stores EffectivePermissionSet entries as JSON strings under
 * `<prefix>perm:<roleId>` with a millisecond TTL. Entries read back are
 * validated before use; a malformed entry counts as a miss and is removed.
 */

import { Redis } from 'ioredis';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import type { CachedPermissionSet, PermissionCache, PermissionCacheStats, RedisCacheConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Default Redis configuration values */
const REDIS_DEFAULTS = {
  HOST: 'localhost',
  PORT: 6379,
  DB: 0,
  KEY_PREFIX: 'rolegraph:',
  TTL_MS: 3600000,
  MAX_RETRIES: 3,
  CONNECTION_TIMEOUT_MS: 5000,
  SCAN_COUNT: 100,
} as const;

const cachedSetSchema = z.object({
  epoch: z.number().int().nonnegative(),
  value: z.object({
    roleId: z.string(),
    computedAt: z.coerce.date(),
    permissions: z.array(
      z.object({
        id: z.string(),
        codename: z.string(),
        name: z.string(),
        subsystem: z.string(),
      }),
    ),
  }),
});

export class RedisPermissionCache implements PermissionCache {
  readonly type = 'redis';
  private client: Redis;
  private keyPrefix: string;
  private ttlMs: number;
  private logger = new Logger('rolegraph').child({ component: 'redis-cache' });

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: Omit<RedisCacheConfig, 'type'> = {}, client?: Redis) {
    this.keyPrefix = config.keyPrefix ?? REDIS_DEFAULTS.KEY_PREFIX;
    this.ttlMs = config.ttlMs ?? REDIS_DEFAULTS.TTL_MS;

    this.client = client ?? (config.url
      ? new Redis(config.url, { lazyConnect: true, maxRetriesPerRequest: REDIS_DEFAULTS.MAX_RETRIES })
      : new Redis({
          host: config.host ?? REDIS_DEFAULTS.HOST,
          port: config.port ?? REDIS_DEFAULTS.PORT,
          password: config.password,
          db: config.db ?? REDIS_DEFAULTS.DB,
          lazyConnect: true,
          connectTimeout: REDIS_DEFAULTS.CONNECTION_TIMEOUT_MS,
          maxRetriesPerRequest: REDIS_DEFAULTS.MAX_RETRIES,
        }));

    this.client.on('error', (error: Error) => {
      this.logger.error('Redis cache connection error', error);
    });
  }

  /**
   * Verify connectivity. Commands issued before this connect on demand.
   */
  async connect(): Promise<void> {
    await this.client.ping();
  }

  async get(roleId: string): Promise<CachedPermissionSet | undefined> {
    const raw = await this.client.get(this.key(roleId));
    if (raw === null) {
      this.misses++;
      return undefined;
    }

    const parsed = cachedSetSchema.safeParse(this.parseJson(raw));
    if (!parsed.success) {
      this.logger.warn('Discarding malformed cache entry', { roleId });
      await this.client.del(this.key(roleId));
      this.misses++;
      return undefined;
    }

    this.hits++;
    return parsed.data;
  }

  async set(roleId: string, entry: CachedPermissionSet): Promise<void> {
    const payload = JSON.stringify(entry);
    if (this.ttlMs > 0) {
      await this.client.set(this.key(roleId), payload, 'PX', this.ttlMs);
    } else {
      await this.client.set(this.key(roleId), payload);
    }
  }

  async delete(roleIds: string[]): Promise<number> {
    if (roleIds.length === 0) return 0;
    const removed = await this.client.del(...roleIds.map((roleId) => this.key(roleId)));
    this.evictions += removed;
    return removed;
  }

  async clear(): Promise<void> {
    const keys = await this.scanKeys();
    if (keys.length > 0) {
      await this.client.del(...keys);
    }
  }

  async stats(): Promise<PermissionCacheStats> {
    const total = this.hits + this.misses;
    const keys = await this.scanKeys();
    return {
      size: keys.length,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
    };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private key(roleId: string): string {
    return `${this.keyPrefix}perm:${roleId}`;
  }

  private async scanKeys(): Promise<string[]> {
    const found: string[] = [];
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(
        cursor,
        'MATCH',
        `${this.keyPrefix}perm:*`,
        'COUNT',
        REDIS_DEFAULTS.SCAN_COUNT,
      );
      found.push(...keys);
      cursor = next;
    } while (cursor !== '0');
    return found;
  }

  private parseJson(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      return undefined;
    }
  }
}
