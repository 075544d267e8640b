/**
 * Permission Assignment Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryRbacStore } from '../../../src/storage/memory-store.js';
import {
  PermissionAssignmentReader,
  PermissionAssignmentStore,
} from '../../../src/assignments/permission-assignment-store.js';
import { role, seed } from '../../fixtures/seed.js';

describe('PermissionAssignmentStore', () => {
  let store: MemoryRbacStore;

  beforeEach(async () => {
    store = new MemoryRbacStore();
    await store.initialize();
    await seed(store, { permissions: ['post.view', 'post.edit'], roles: [role('editor')] });
  });

  afterEach(async () => {
    await store.close();
  });

  it('should grant and revoke idempotently', async () => {
    const outcomes = await store.transaction(async (session) => {
      const assignments = new PermissionAssignmentStore(session);
      return [
        await assignments.grant('editor', 'perm-post.edit'),
        await assignments.grant('editor', 'perm-post.edit'),
        await assignments.revoke('editor', 'perm-post.view'),
      ];
    });

    expect(outcomes).toEqual([true, false, false]);
  });

  it('should read direct assignments only', async () => {
    await seed(store, { roles: [role('author', 'editor')], grants: { editor: ['post.view'], author: ['post.edit'] } });

    const [direct, hasView, hasEdit] = await store.read(async (reader) => {
      const assignments = new PermissionAssignmentReader(reader);
      return Promise.all([
        assignments.directPermissions('author'),
        assignments.has('author', 'perm-post.view'),
        assignments.has('author', 'perm-post.edit'),
      ]);
    });

    expect(direct.map((p) => p.codename)).toEqual(['post.edit']);
    expect(hasView).toBe(false);
    expect(hasEdit).toBe(true);
  });
});
