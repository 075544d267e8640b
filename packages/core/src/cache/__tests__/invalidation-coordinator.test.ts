/**
 * Cache Invalidation Coordinator Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CacheInvalidationCoordinator } from '../invalidation-coordinator.js';
import { MemoryPermissionCache } from '../memory-cache.js';
import { MemoryRbacStore } from '../../storage/memory-store.js';
import type { EffectivePermissionSet } from '../../types/rbac.types.js';

const COMPUTED_AT = new Date('2024-03-01T12:00:00.000Z');

function setFor(roleId: string, ...codenames: string[]): EffectivePermissionSet {
  return {
    roleId,
    permissions: codenames.map((codename) => ({ id: `perm-${codename}`, codename, name: codename, subsystem: 'post' })),
    computedAt: COMPUTED_AT,
  };
}

describe('CacheInvalidationCoordinator', () => {
  let cache: MemoryPermissionCache;
  let coordinator: CacheInvalidationCoordinator;

  beforeEach(() => {
    cache = new MemoryPermissionCache();
    coordinator = new CacheInvalidationCoordinator(cache);
  });

  // ==========================================================================
  // Fencing
  // ==========================================================================

  describe('fencing', () => {
    it('should serve an entry populated by a current read', async () => {
      const epoch = coordinator.beginRead();
      expect(await coordinator.populate('editor', setFor('editor', 'post.edit'), epoch)).toBe(true);

      expect(await coordinator.lookup('editor')).toEqual(setFor('editor', 'post.edit'));
    });

    it('should skip an entry from a later read when asked for an older epoch', async () => {
      const olderRead = coordinator.beginRead();
      await coordinator.fenceAndEvict(['admin']);
      await coordinator.populate('admin', setFor('admin', 'post.view', 'user.view'), coordinator.beginRead());

      expect(await coordinator.lookup('admin', { notAfter: olderRead })).toBeUndefined();
      expect(await coordinator.lookup('admin', { notAfter: olderRead + 1 })).toEqual(
        setFor('admin', 'post.view', 'user.view'),
      );
      expect(await coordinator.lookup('admin')).toEqual(setFor('admin', 'post.view', 'user.view'));
    });

    it('should drop a populate from a read that began before the fence', async () => {
      const staleEpoch = coordinator.beginRead();
      await coordinator.fenceAndEvict(['editor']);

      const written = await coordinator.populate('editor', setFor('editor', 'post.edit'), staleEpoch);

      expect(written).toBe(false);
      expect(await coordinator.lookup('editor')).toBeUndefined();
      expect((await coordinator.stats()).populatesDropped).toBe(1);
    });

    it('should only fence the roles named', async () => {
      const epoch = coordinator.beginRead();
      await coordinator.fenceAndEvict(['editor']);

      expect(await coordinator.populate('viewer', setFor('viewer', 'post.view'), epoch)).toBe(true);
      expect(coordinator.changedSince('editor', epoch)).toBe(true);
      expect(coordinator.changedSince('viewer', epoch)).toBe(false);
    });

    it('should reject an entry computed before the fence even if eviction failed', async () => {
      await coordinator.populate('editor', setFor('editor', 'post.edit'), coordinator.beginRead());
      vi.spyOn(cache, 'delete').mockRejectedValueOnce(new Error('cache down'));

      await coordinator.fenceAndEvict(['editor']);

      expect(cache.keys()).toEqual(['editor']);
      expect(await coordinator.lookup('editor')).toBeUndefined();
      expect((await coordinator.stats()).staleEntriesRejected).toBe(1);
    });

    it('should advance the epoch once per post-commit invalidation', async () => {
      await coordinator.fenceAndEvict(['a', 'b']);
      await coordinator.fenceAndEvict([]);
      await coordinator.fenceAndEvict(['c']);

      const stats = await coordinator.stats();
      expect(stats.epoch).toBe(2);
      expect(stats.fencedRoles).toBe(3);
    });
  });

  // ==========================================================================
  // invalidate
  // ==========================================================================

  describe('invalidate', () => {
    it('should evict the role and its descendants', async () => {
      const store = new MemoryRbacStore();
      await store.initialize();
      await store.transaction(async (session) => {
        for (const [id, parentId] of [['admin', null], ['editor', 'admin'], ['viewer', 'editor']] as const) {
          await session.insertRole({
            id,
            name: id,
            description: '',
            parentId,
            createdBy: null,
            updatedBy: null,
            createdAt: COMPUTED_AT,
            updatedAt: COMPUTED_AT,
          });
        }
      });

      const epoch = coordinator.beginRead();
      for (const roleId of ['admin', 'editor', 'viewer']) {
        await coordinator.populate(roleId, setFor(roleId), epoch);
      }

      const evicted = await store.read((reader) => coordinator.invalidate('editor', reader));

      expect(evicted).toEqual(['editor', 'viewer']);
      expect(cache.keys()).toEqual(['admin']);
      await store.close();
    });
  });

  // ==========================================================================
  // invalidateAll / listeners
  // ==========================================================================

  describe('invalidateAll', () => {
    it('should clear the cache and fence every role', async () => {
      const epoch = coordinator.beginRead();
      await coordinator.populate('admin', setFor('admin'), epoch);

      await coordinator.invalidateAll();

      expect(cache.keys()).toEqual([]);
      expect(coordinator.changedSince('never-seen', epoch)).toBe(true);
      expect(await coordinator.populate('admin', setFor('admin'), epoch)).toBe(false);
      expect(await coordinator.populate('admin', setFor('admin'), coordinator.beginRead())).toBe(true);
    });
  });

  describe('onInvalidate', () => {
    it('should notify listeners after each post-commit invalidation', async () => {
      const listener = vi.fn();
      const unsubscribe = coordinator.onInvalidate(listener);

      await coordinator.fenceAndEvict(['editor', 'viewer']);
      unsubscribe();
      await coordinator.fenceAndEvict(['admin']);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(['editor', 'viewer']);
    });
  });

  // ==========================================================================
  // Backend failures
  // ==========================================================================

  describe('backend failures', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should treat a failed lookup as a miss', async () => {
      vi.spyOn(cache, 'get').mockRejectedValueOnce(new Error('cache down'));
      expect(await coordinator.lookup('admin')).toBeUndefined();
    });

    it('should report a failed populate as not written', async () => {
      vi.spyOn(cache, 'set').mockRejectedValueOnce(new Error('cache down'));
      expect(await coordinator.populate('admin', setFor('admin'), coordinator.beginRead())).toBe(false);
    });
  });
});
