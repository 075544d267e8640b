/**
 * Cache Invalidation Coordinator
 *
 * Sole writer of the permission cache. Keeps cached effective sets coherent
 * with committed state using a monotonic epoch:
 *
 * - every read records the epoch current at its start (`beginRead`)
 * - every post-commit invalidation stamps each affected role with a fresh
 *   epoch (its fence)
 * - a populate from a read that began before the role's fence is dropped,
 *   and a cached entry computed before the fence is a miss
 *
 * A reader that loaded pre-commit state can therefore never make that state
 * visible again once the mutation has returned.
 */

import type { EffectivePermissionSet } from '../types/rbac.types.js';
import type { RbacReader } from '../storage/types.js';
import { RoleHierarchyReader, type HierarchyOptions } from '../hierarchy/role-hierarchy-store.js';
import { Logger } from '../utils/logger.js';
import type { CachedPermissionSet, PermissionCache, PermissionCacheStats } from './types.js';

export interface CoordinatorStats {
  epoch: number;
  fencedRoles: number;
  populatesDropped: number;
  staleEntriesRejected: number;
  cache: PermissionCacheStats;
}

export interface LookupOptions {
  /** Skip entries whose read began after this epoch */
  notAfter?: number;
}

export type InvalidationListener = (roleIds: string[]) => void;

export class CacheInvalidationCoordinator {
  private epoch = 0;
  private fences: Map<string, number> = new Map();
  /** Fence applied to every role by invalidateAll */
  private globalFence = 0;
  private populatesDropped = 0;
  private staleEntriesRejected = 0;
  private listeners: Set<InvalidationListener> = new Set();
  private logger: Logger;

  constructor(
    private readonly cache: PermissionCache,
    private readonly hierarchyOptions: HierarchyOptions = {},
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.logger = logger.child({ component: 'cache-coordinator' });
  }

  /**
   * Epoch to hand to `populate` for a read that starts now.
   */
  beginRead(): number {
    return this.epoch;
  }

  /**
   * True when `roleId` was invalidated after a read that began at `readEpoch`.
   */
  changedSince(roleId: string, readEpoch: number): boolean {
    return this.fenceOf(roleId) > readEpoch;
  }

  /**
   * Cached set for a role, or undefined on a miss. Entries computed before
   * the role's fence are treated as misses. Cache backend failures degrade
   * to misses; the store remains the source of truth.
   *
   * With `notAfter`, entries computed by a read that began after that epoch
   * are skipped too: a resolution that combines a cached ancestor with rows
   * from its own snapshot must not take the ancestor from a later commit.
   */
  async lookup(roleId: string, options: LookupOptions = {}): Promise<EffectivePermissionSet | undefined> {
    let cached: CachedPermissionSet | undefined;
    try {
      cached = await this.cache.get(roleId);
    } catch (error) {
      this.logger.warn('Cache lookup failed, treating as miss', {
        roleId,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    if (!cached) return undefined;

    if (cached.epoch < this.fenceOf(roleId)) {
      this.staleEntriesRejected++;
      return undefined;
    }
    if (options.notAfter !== undefined && cached.epoch > options.notAfter) {
      return undefined;
    }
    return cached.value;
  }

  /**
   * Store a freshly computed set unless the role was invalidated after the
   * read that produced it began.
   *
   * @returns whether the entry was written
   */
  async populate(roleId: string, value: EffectivePermissionSet, readEpoch: number): Promise<boolean> {
    if (this.changedSince(roleId, readEpoch)) {
      this.populatesDropped++;
      this.logger.debug('Dropped populate from a read older than the fence', { roleId, readEpoch });
      return false;
    }

    try {
      await this.cache.set(roleId, { value, epoch: readEpoch });
      return true;
    } catch (error) {
      this.logger.warn('Cache populate failed', {
        roleId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Evict a role and its descendant closure, computed through `reader` (the
   * mutation's own session). Runs inside the transaction: a failure here
   * propagates and rolls the mutation back.
   *
   * @returns the evicted closure, role first
   */
  async invalidate(roleId: string, reader: RbacReader): Promise<string[]> {
    const hierarchy = new RoleHierarchyReader(reader, this.hierarchyOptions);
    const closure = await hierarchy.closure(roleId);
    await this.cache.delete(closure);
    return closure;
  }

  /**
   * Drop every cached set from inside a transaction. A failure propagates
   * and rolls the mutation back; the runner fences everything after commit.
   */
  async evictAll(): Promise<void> {
    await this.cache.clear();
  }

  /**
   * Post-commit step: fence every role in `roleIds` and evict them again.
   * An eviction failure is logged only; the fence already hides the entries.
   */
  async fenceAndEvict(roleIds: string[]): Promise<void> {
    if (roleIds.length === 0) return;

    const stamp = ++this.epoch;
    for (const roleId of roleIds) {
      this.fences.set(roleId, stamp);
    }

    try {
      await this.cache.delete(roleIds);
    } catch (error) {
      this.logger.warn('Post-commit eviction failed; entries remain fenced', {
        roleIds,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.notify(roleIds);
  }

  /**
   * Fence and clear everything.
   */
  async invalidateAll(): Promise<void> {
    this.globalFence = ++this.epoch;
    this.fences.clear();
    await this.cache.clear();
    this.logger.info('Permission cache cleared', { epoch: this.epoch });
  }

  /**
   * Register a listener called after every post-commit invalidation.
   */
  onInvalidate(listener: InvalidationListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async stats(): Promise<CoordinatorStats> {
    return {
      epoch: this.epoch,
      fencedRoles: this.fences.size,
      populatesDropped: this.populatesDropped,
      staleEntriesRejected: this.staleEntriesRejected,
      cache: await this.cache.stats(),
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.cache.close();
  }

  private fenceOf(roleId: string): number {
    return Math.max(this.fences.get(roleId) ?? 0, this.globalFence);
  }

  private notify(roleIds: string[]): void {
    for (const listener of this.listeners) {
      try {
        listener(roleIds);
      } catch (error) {
        this.logger.error('Invalidation listener failed', error);
      }
    }
  }
}
