/**
 * Mutation Coordinator Tests
 *
 * Atomicity, audit coupling and cache freshness of every write path.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'eventemitter3';
import { MemoryRbacStore, MemorySession } from '../../../src/storage/memory-store.js';
import { MemoryPermissionCache } from '../../../src/cache/memory-cache.js';
import { CacheInvalidationCoordinator } from '../../../src/cache/invalidation-coordinator.js';
import { KeyedLock } from '../../../src/locking/keyed-lock.js';
import { MutationRunner } from '../../../src/mutation/mutation-runner.js';
import { MutationCoordinator } from '../../../src/mutation/mutation-coordinator.js';
import { PermissionResolver } from '../../../src/resolver/permission-resolver.js';
import type { RbacEvents } from '../../../src/types/events.types.js';
import type { RoleDeletionPolicy } from '../../../src/types/rbac.types.js';
import {
  AuditWriteFailedError,
  ConcurrentModificationError,
  CycleDetectedError,
  NotFoundError,
  RoleInUseError,
  ValidationError,
} from '../../../src/errors/index.js';
import { role, seed, user } from '../../fixtures/seed.js';

const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

describe('MutationCoordinator', () => {
  let store: MemoryRbacStore;
  let cache: MemoryPermissionCache;
  let coordinator: CacheInvalidationCoordinator;
  let lock: KeyedLock;
  let resolver: PermissionResolver;
  let events: EventEmitter<RbacEvents>;
  let mutations: MutationCoordinator;

  const build = (deletionPolicy: RoleDeletionPolicy = 'restrict') => {
    const runner = new MutationRunner(store, lock, coordinator, 50);
    return new MutationCoordinator(runner, coordinator, events, { deletionPolicy, now: () => FIXED_NOW });
  };

  const effective = async (roleId: string) =>
    (await resolver.effectivePermissions(roleId)).permissions.map((p) => p.codename);

  const direct = (roleId: string) =>
    store.read(async (reader) => (await reader.directPermissions(roleId)).map((p) => p.codename));

  beforeEach(async () => {
    store = new MemoryRbacStore();
    await store.initialize();
    cache = new MemoryPermissionCache();
    coordinator = new CacheInvalidationCoordinator(cache);
    lock = new KeyedLock(50);
    resolver = new PermissionResolver(store, coordinator);
    events = new EventEmitter<RbacEvents>();
    mutations = build();

    // admin <- editor <- author; guest stands alone
    await seed(store, {
      permissions: ['post.view', 'post.edit', 'post.delete', 'user.view'],
      roles: [role('admin'), role('editor', 'admin'), role('author', 'editor'), role('guest')],
      grants: {
        admin: ['post.view'],
        editor: ['post.edit'],
        author: ['post.delete'],
      },
      users: [user('u-1', 'editor')],
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await store.close();
  });

  // ==========================================================================
  // applyBulk
  // ==========================================================================

  describe('applyBulk', () => {
    it('should grant and revoke in one step and report no-ops', async () => {
      const summary = await mutations.applyBulk('editor', ['post.view', 'user.view'], ['post.edit', 'post.delete'], 'root-user');

      expect(summary).toEqual({
        roleId: 'editor',
        granted: ['post.view', 'user.view'],
        revoked: ['post.edit'],
        noOps: ['post.delete'],
      });
      expect(await direct('editor')).toEqual(['post.view', 'user.view']);
    });

    it('should write one audit entry per effective change', async () => {
      await mutations.applyBulk('editor', ['post.edit', 'user.view'], [], 'root-user');

      expect(store.permissionChangeRows.map((e) => [e.sequence, e.action, e.codename, e.roleName, e.actorId])).toEqual([
        [1, 'GRANT', 'user.view', 'editor', 'root-user'],
      ]);
    });

    it('should not audit or evict when every item is a no-op', async () => {
      await effective('author');
      const listener = vi.fn();
      events.on('permissions:changed', listener);

      const summary = await mutations.applyBulk('editor', ['post.edit'], ['user.view'], 'root-user');

      expect(summary.noOps).toEqual(['post.edit', 'user.view']);
      expect(store.permissionChangeRows).toHaveLength(0);
      expect(cache.keys()).toEqual(['admin', 'editor', 'author']);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should apply nothing when any codename is unknown', async () => {
      const error = await mutations
        .applyBulk('editor', ['user.view', 'post.publish'], ['post.edit', 'post.archive'], 'root-user')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        entity: 'permission',
        ids: ['post.publish', 'post.archive'],
        message: 'Unknown permissions: post.publish, post.archive',
      });
      expect(await direct('editor')).toEqual(['post.edit']);
      expect(store.permissionChangeRows).toHaveLength(0);
    });

    it('should reject an unknown role', async () => {
      await expect(mutations.applyBulk('ghost', ['post.view'], [], 'root-user')).rejects.toMatchObject({
        entity: 'role',
        ids: ['ghost'],
      });
    });

    it('should reject an empty request', async () => {
      await expect(mutations.applyBulk('editor', [], [], 'root-user')).rejects.toThrow(
        'Invalid bulk permission change: grants: At least one grant or revoke is required',
      );
    });

    it('should reject a codename in both lists', async () => {
      const error = await mutations.applyBulk('editor', ['post.view'], ['post.view'], 'root-user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Invalid bulk permission change: revokes: Permission post.view is both granted and revoked',
      });
    });

    it('should roll back every change when an audit write fails', async () => {
      vi.spyOn(MemorySession.prototype, 'insertPermissionChange')
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('disk full'));

      const error = await mutations.applyBulk('editor', ['post.view', 'user.view'], [], 'root-user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuditWriteFailedError);
      expect(error).toMatchObject({ code: 'AUDIT_WRITE_FAILED', details: { roleId: 'editor', permissionId: 'perm-user.view' } });
      expect(await direct('editor')).toEqual(['post.edit']);
      expect(store.permissionChangeRows).toHaveLength(0);
    });

    it('should make the change visible to descendants once it returns', async () => {
      expect(await effective('author')).toEqual(['post.delete', 'post.edit', 'post.view']);

      await mutations.applyBulk('admin', ['user.view'], [], 'root-user');

      expect(await effective('author')).toEqual(['post.delete', 'post.edit', 'post.view', 'user.view']);
      expect(await effective('guest')).toEqual([]);
    });

    it('should emit permissions:changed with the affected closure', async () => {
      const listener = vi.fn();
      events.on('permissions:changed', listener);

      await mutations.applyBulk('editor', [], ['post.edit'], 'root-user');

      expect(listener).toHaveBeenCalledWith({
        roleId: 'editor',
        actorId: 'root-user',
        granted: [],
        revoked: ['post.edit'],
        affectedRoleIds: ['editor', 'author'],
      });
    });

    it('should time out while another mutation holds the role', async () => {
      const release = await lock.acquire('role:editor', 'exclusive');

      const error = await mutations.applyBulk('editor', ['user.view'], [], 'root-user').catch((e: unknown) => e);
      release();

      expect(error).toBeInstanceOf(ConcurrentModificationError);
      expect(error).toMatchObject({ lockKey: 'role:editor', timeoutMs: 50 });
      expect(await direct('editor')).toEqual(['post.edit']);
    });

    it('should serialize concurrent changes to the same role', async () => {
      await Promise.all([
        mutations.applyBulk('guest', ['post.view'], [], 'actor-a'),
        mutations.applyBulk('guest', ['user.view'], [], 'actor-b'),
      ]);

      expect(await direct('guest')).toEqual(['post.view', 'user.view']);
      expect(store.permissionChangeRows.map((e) => e.sequence)).toEqual([1, 2]);
      expect(store.permissionChangeRows[1].previousHash).toBe(store.permissionChangeRows[0].hash);
    });
  });

  // ==========================================================================
  // setParent
  // ==========================================================================

  describe('setParent', () => {
    it('should move a role, record the move and refresh inherited sets', async () => {
      expect(await effective('author')).toEqual(['post.delete', 'post.edit', 'post.view']);
      const listener = vi.fn();
      events.on('hierarchy:changed', listener);

      const moved = await mutations.setParent('author', 'guest', 'root-user');

      expect(moved.parentId).toBe('guest');
      expect(await effective('author')).toEqual(['post.delete']);
      expect(await store.read((reader) => reader.parentChanges('author'))).toMatchObject([
        { sequence: 1, roleId: 'author', previousParentId: 'editor', newParentId: 'guest', actorId: 'root-user' },
      ]);
      expect(listener).toHaveBeenCalledWith({
        type: 'moved',
        roleId: 'author',
        actorId: 'root-user',
        previousParentId: 'editor',
        newParentId: 'guest',
      });
    });

    it('should leave links and log untouched when a cycle is rejected', async () => {
      const error = await mutations.setParent('admin', 'editor', 'root-user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CycleDetectedError);
      expect(error).toMatchObject({ path: ['admin', 'editor', 'admin'] });
      expect(await store.read((reader) => reader.getRole('admin'))).toMatchObject({ parentId: null });
      expect(await store.read((reader) => reader.getRole('editor'))).toMatchObject({ parentId: 'admin' });
      expect(await store.read((reader) => reader.lastParentChange())).toBeNull();
    });

    it('should do nothing when the parent is unchanged', async () => {
      const listener = vi.fn();
      events.on('hierarchy:changed', listener);

      await mutations.setParent('editor', 'admin', 'root-user');

      expect(listener).not.toHaveBeenCalled();
      expect(await store.read((reader) => reader.lastParentChange())).toBeNull();
    });
  });

  // ==========================================================================
  // createRole / updateRole
  // ==========================================================================

  describe('createRole and updateRole', () => {
    it('should emit hierarchy events', async () => {
      const listener = vi.fn();
      events.on('hierarchy:changed', listener);

      const created = await mutations.createRole({ name: 'Reviewer', parentId: 'editor' }, 'root-user');
      await mutations.updateRole(created.id, { description: 'Reviews drafts' }, 'root-user');

      expect(listener.mock.calls).toEqual([
        [{ type: 'created', roleId: created.id, actorId: 'root-user', newParentId: 'editor' }],
        [{ type: 'updated', roleId: created.id, actorId: 'root-user' }],
      ]);
      expect(await effective(created.id)).toEqual(['post.edit', 'post.view']);
    });
  });

  // ==========================================================================
  // deleteRole
  // ==========================================================================

  describe('deleteRole', () => {
    it('should refuse a referenced role under the restrict policy', async () => {
      const error = await mutations.deleteRole('editor', 'root-user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RoleInUseError);
      expect(error).toMatchObject({ childCount: 1, userCount: 1 });
      expect(await store.read((reader) => reader.getRole('editor'))).not.toBeNull();
    });

    it('should revoke and audit direct permissions of an unreferenced role', async () => {
      await mutations.applyBulk('guest', ['post.view'], [], 'root-user');

      const summary = await mutations.deleteRole('guest', 'root-user');

      expect(summary).toEqual({ roleId: 'guest', detachedChildren: [], unassignedUsers: [], revoked: ['post.view'] });
      expect(store.permissionChangeRows.map((e) => e.action)).toEqual(['GRANT', 'REVOKE']);
      expect(await store.read((reader) => reader.getRole('guest'))).toBeNull();
      await expect(effective('guest')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should detach children and unassign users under the orphan policy', async () => {
      mutations = build('orphan');
      expect(await effective('author')).toEqual(['post.delete', 'post.edit', 'post.view']);
      const roleChanges = vi.fn();
      events.on('user:role-changed', roleChanges);

      const summary = await mutations.deleteRole('editor', 'root-user');

      expect(summary).toEqual({
        roleId: 'editor',
        detachedChildren: ['author'],
        unassignedUsers: ['u-1'],
        revoked: ['post.edit'],
      });
      expect(await effective('author')).toEqual(['post.delete']);
      expect(await store.read((reader) => reader.getUser('u-1'))).toMatchObject({ roleId: null });
      expect(await store.read((reader) => reader.parentChanges('author'))).toMatchObject([
        { previousParentId: 'editor', newParentId: null },
      ]);
      expect(roleChanges).toHaveBeenCalledWith({
        userId: 'u-1',
        previousRoleId: 'editor',
        roleId: null,
        actorId: 'root-user',
      });
    });
  });

  // ==========================================================================
  // assignUserRole
  // ==========================================================================

  describe('assignUserRole', () => {
    it('should change the role and emit an event', async () => {
      const listener = vi.fn();
      events.on('user:role-changed', listener);

      const updated = await mutations.assignUserRole('u-1', 'admin', 'root-user');

      expect(updated).toMatchObject({ id: 'u-1', roleId: 'admin', updatedAt: FIXED_NOW });
      expect(listener).toHaveBeenCalledWith({ userId: 'u-1', previousRoleId: 'editor', roleId: 'admin', actorId: 'root-user' });
    });

    it('should not emit when the role is unchanged', async () => {
      const listener = vi.fn();
      events.on('user:role-changed', listener);

      await mutations.assignUserRole('u-1', 'editor', 'root-user');
      expect(listener).not.toHaveBeenCalled();
    });

    it('should reject an unknown user or role', async () => {
      await expect(mutations.assignUserRole('u-404', 'admin', 'root-user')).rejects.toMatchObject({
        entity: 'user',
        ids: ['u-404'],
      });
      await expect(mutations.assignUserRole('u-1', 'ghost', 'root-user')).rejects.toMatchObject({
        entity: 'role',
        ids: ['ghost'],
      });
    });
  });
});
