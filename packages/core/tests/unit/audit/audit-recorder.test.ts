/**
 * Audit Recorder Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryRbacStore } from '../../../src/storage/memory-store.js';
import { AuditReader, AuditRecorder, type AuditOptions } from '../../../src/audit/audit-recorder.js';
import { computeEntryHash } from '../../../src/audit/hash-chain.js';
import { ValidationError } from '../../../src/errors/index.js';
import type { PermissionChangeAction } from '../../../src/types/rbac.types.js';
import { permission, role } from '../../fixtures/seed.js';

describe('AuditRecorder', () => {
  let store: MemoryRbacStore;
  let tick: number;

  // One second per entry, starting at 2024-03-01T00:00:00Z
  const clock = () => new Date(Date.UTC(2024, 2, 1, 0, 0, tick++));

  const record = (roleId: string, codename: string, action: PermissionChangeAction, actorId = 'root-user') =>
    store.transaction((session) =>
      new AuditRecorder(session, {}, clock).record(role(roleId), permission(codename), action, actorId),
    );

  const reader = <T>(fn: (audit: AuditReader) => Promise<T>, options: AuditOptions = {}) =>
    store.read((r) => fn(new AuditReader(r, options)));

  beforeEach(async () => {
    store = new MemoryRbacStore();
    await store.initialize();
    tick = 0;
  });

  afterEach(async () => {
    await store.close();
  });

  // ==========================================================================
  // Hash chain
  // ==========================================================================

  describe('record', () => {
    it('should link each entry to the previous one', async () => {
      const first = await record('editor', 'post.edit', 'GRANT');
      const second = await record('editor', 'post.edit', 'REVOKE');

      expect(first).toMatchObject({
        sequence: 1,
        roleId: 'editor',
        roleName: 'editor',
        permissionId: 'perm-post.edit',
        codename: 'post.edit',
        action: 'GRANT',
        actorId: 'root-user',
        changedAt: new Date('2024-03-01T00:00:00.000Z'),
        previousHash: null,
      });
      expect(first.hash).toBe(computeEntryHash(first));
      expect(first.hash).toMatch(/^[0-9a-f]{64}$/);

      expect(second.sequence).toBe(2);
      expect(second.previousHash).toBe(first.hash);
      expect(second.changedAt).toEqual(new Date('2024-03-01T00:00:01.000Z'));
    });

    it('should hash every field', () => {
      const base = {
        id: 'entry-1',
        sequence: 1,
        roleId: 'editor',
        roleName: 'Editor',
        permissionId: 'perm-1',
        codename: 'post.edit',
        action: 'GRANT' as const,
        actorId: 'root-user',
        changedAt: new Date('2024-03-01T00:00:00.000Z'),
        previousHash: null,
      };

      expect(computeEntryHash({ ...base, actorId: 'other-user' })).not.toBe(computeEntryHash(base));
      expect(computeEntryHash({ ...base, previousHash: 'abc' })).not.toBe(computeEntryHash(base));
      expect(computeEntryHash({ ...base })).toBe(computeEntryHash(base));
    });
  });

  // ==========================================================================
  // verifyChain
  // ==========================================================================

  describe('verifyChain', () => {
    it('should accept an empty log', async () => {
      expect(await reader((audit) => audit.verifyChain())).toEqual({ valid: true, checked: 0 });
    });

    it('should accept an intact log', async () => {
      await record('editor', 'post.edit', 'GRANT');
      await record('editor', 'post.view', 'GRANT');
      await record('admin', 'user.view', 'REVOKE');

      expect(await reader((audit) => audit.verifyChain())).toEqual({ valid: true, checked: 3 });
    });

    it('should point at an edited entry', async () => {
      await record('editor', 'post.edit', 'GRANT');
      await record('editor', 'post.view', 'GRANT');
      await record('admin', 'user.view', 'REVOKE');

      const rows = store.permissionChangeRows;
      rows[1] = { ...rows[1], actorId: 'someone-else' };

      expect(await reader((audit) => audit.verifyChain())).toEqual({ valid: false, checked: 2, brokenAt: 2 });
    });

    it('should detect a removed entry', async () => {
      await record('editor', 'post.edit', 'GRANT');
      await record('editor', 'post.view', 'GRANT');

      store.permissionChangeRows.splice(0, 1);

      expect(await reader((audit) => audit.verifyChain())).toEqual({ valid: false, checked: 1, brokenAt: 2 });
    });
  });

  // ==========================================================================
  // query
  // ==========================================================================

  describe('query', () => {
    beforeEach(async () => {
      for (let i = 0; i < 15; i++) {
        await record(i % 3 === 0 ? 'admin' : 'editor', 'post.edit', i % 2 === 0 ? 'GRANT' : 'REVOKE', `actor-${i % 2}`);
      }
    });

    it('should return the newest ten by default', async () => {
      const page = await reader((audit) => audit.query());

      expect(page.entries.map((e) => e.sequence)).toEqual([15, 14, 13, 12, 11, 10, 9, 8, 7, 6]);
      expect(page.total).toBe(15);
      expect(page.hasMore).toBe(true);
    });

    it('should page with offset', async () => {
      const page = await reader((audit) => audit.query({}, { offset: 10 }));

      expect(page.entries.map((e) => e.sequence)).toEqual([5, 4, 3, 2, 1]);
      expect(page.hasMore).toBe(false);
    });

    it('should sort ascending on request', async () => {
      const page = await reader((audit) => audit.query({}, { limit: 3, sortOrder: 'asc' }));
      expect(page.entries.map((e) => e.sequence)).toEqual([1, 2, 3]);
    });

    it('should filter by role, action and time window', async () => {
      const byRole = await reader((audit) => audit.query({ roleId: 'admin' }, { sortOrder: 'asc' }));
      expect(byRole.entries.map((e) => e.sequence)).toEqual([1, 4, 7, 10, 13]);

      const revokes = await reader((audit) => audit.query({ action: 'REVOKE', actorId: 'actor-1' }));
      expect(revokes.total).toBe(7);

      const window = await reader((audit) =>
        audit.query(
          { from: new Date('2024-03-01T00:00:02.000Z'), to: new Date('2024-03-01T00:00:04.000Z') },
          { sortOrder: 'asc' },
        ),
      );
      expect(window.entries.map((e) => e.sequence)).toEqual([3, 4, 5]);
    });

    it('should cap the limit at the configured maximum', async () => {
      const page = await reader((audit) => audit.query({}, { limit: 500 }), { maxLimit: 12 });

      expect(page.entries).toHaveLength(12);
      expect(page.hasMore).toBe(true);
    });

    it('should reject an inverted time window', async () => {
      await expect(
        reader((audit) =>
          audit.query({ from: new Date('2024-03-02T00:00:00.000Z'), to: new Date('2024-03-01T00:00:00.000Z') }),
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ==========================================================================
  // Parent changes
  // ==========================================================================

  describe('recordParentChange', () => {
    it('should keep a separate sequence per log', async () => {
      await record('editor', 'post.edit', 'GRANT');

      const entry = await store.transaction((session) =>
        new AuditRecorder(session, {}, clock).recordParentChange('editor', 'admin', null, 'root-user'),
      );

      expect(entry).toMatchObject({
        sequence: 1,
        roleId: 'editor',
        previousParentId: 'admin',
        newParentId: null,
        actorId: 'root-user',
        changedAt: new Date('2024-03-01T00:00:01.000Z'),
      });
      expect(await reader((audit) => audit.parentChanges('editor'))).toEqual([entry]);
    });
  });
});
