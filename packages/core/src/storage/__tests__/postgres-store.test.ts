/**
 * PostgreSQL RBAC Store Tests
 *
 * pg is mocked; these tests check the statements the store issues around
 * each unit of work, not the SQL engine.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import pg from 'pg';
import { PostgresRbacStore } from '../postgres-store.js';
import { RoleHierarchyReader } from '../../hierarchy/role-hierarchy-store.js';
import { NotFoundError } from '../../errors/index.js';

interface QueryResult {
  rows: unknown[];
  rowCount: number;
}

const fake = vi.hoisted(() => {
  const respond = vi.fn(async (_text: string, _values?: unknown[]): Promise<QueryResult> => ({ rows: [], rowCount: 0 }));
  const client = {
    query: vi.fn((text: string, values?: unknown[]) => respond(text, values)),
    release: vi.fn(),
  };
  const pool = {
    on: vi.fn(),
    connect: vi.fn(async () => client),
    query: vi.fn(async (_text: string) => ({ rows: [], rowCount: 0 })),
    end: vi.fn(async () => undefined),
  };
  return { respond, client, pool };
});

vi.mock('pg', () => ({
  default: {
    Pool: vi.fn(function () {
      return fake.pool;
    }),
  },
}));

const statements = () => fake.client.query.mock.calls.map(([text]) => text);

describe('PostgresRbacStore', () => {
  let store: PostgresRbacStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    fake.respond.mockImplementation(async () => ({ rows: [], rowCount: 0 }));
    store = new PostgresRbacStore({ type: 'postgresql', connectionString: 'postgres://localhost/rbac_test' });
    await store.initialize();
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe('initialize', () => {
    it('should create a pool and run migrations', () => {
      expect(pg.Pool).toHaveBeenCalledWith(
        expect.objectContaining({
          connectionString: 'postgres://localhost/rbac_test',
          max: 10,
          connectionTimeoutMillis: 5000,
          ssl: undefined,
        }),
      );
      expect(fake.client.release).toHaveBeenCalledTimes(1);
      expect(fake.pool.query).toHaveBeenCalledWith(expect.stringContaining('CREATE SCHEMA IF NOT EXISTS rbac;'));
    });

    it('should listen for idle client errors', () => {
      expect(fake.pool.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should store ids and actors as free-form text', () => {
      const migration = String(fake.pool.query.mock.calls[0][0]);

      expect(migration).not.toContain('UUID');
      expect(migration).toContain('actor_id TEXT NOT NULL');
      expect(migration).toContain('parent_id TEXT REFERENCES rbac.roles(id) ON DELETE RESTRICT');
    });

    it('should skip migrations when autoMigrate is off', async () => {
      vi.clearAllMocks();
      await new PostgresRbacStore({ type: 'postgresql', autoMigrate: false }).initialize();
      expect(fake.pool.query).not.toHaveBeenCalled();
    });

    it('should reject a schema name that is not a plain identifier', () => {
      expect(() => new PostgresRbacStore({ type: 'postgresql', schema: 'rbac; DROP TABLE x' })).toThrow(
        'Invalid schema name: rbac; DROP TABLE x',
      );
    });

    it('should refuse work before initialize', async () => {
      const idle = new PostgresRbacStore({ type: 'postgresql' });
      await expect(idle.read(async () => 1)).rejects.toThrow(
        'PostgresRbacStore not initialized. Call initialize() first.',
      );
    });

    it('should end the pool on close', async () => {
      await store.close();
      expect(fake.pool.end).toHaveBeenCalledTimes(1);
      expect((await store.health()).healthy).toBe(false);
    });
  });

  // ==========================================================================
  // Transactions
  // ==========================================================================

  describe('transaction', () => {
    it('should take advisory locks after BEGIN and commit', async () => {
      fake.respond.mockImplementation(async (text: string) => ({
        rows: [],
        rowCount: text.includes('INSERT INTO rbac.role_permissions') ? 1 : 0,
      }));

      const added = await store.transaction((session) => session.addAssignment('editor', 'perm-1'), {
        locks: [
          { key: 'hierarchy', mode: 'shared' },
          { key: 'role:editor', mode: 'exclusive' },
        ],
      });

      expect(added).toBe(true);
      const issued = statements();
      expect(issued.slice(0, 4)).toEqual([
        'BEGIN',
        'SET LOCAL statement_timeout = 30000',
        'SELECT pg_advisory_xact_lock_shared(hashtext($1))',
        'SELECT pg_advisory_xact_lock(hashtext($1))',
      ]);
      expect(fake.client.query.mock.calls[2][1]).toEqual(['hierarchy']);
      expect(fake.client.query.mock.calls[3][1]).toEqual(['role:editor']);
      expect(issued[4]).toContain('INSERT INTO rbac.role_permissions');
      expect(issued[5]).toBe('COMMIT');
      expect(fake.client.release).toHaveBeenCalledTimes(2);
    });

    it('should roll back and rethrow when the work fails', async () => {
      await expect(
        store.transaction(async () => {
          throw new Error('constraint violated');
        }),
      ).rejects.toThrow('constraint violated');

      expect(statements()).toEqual(['BEGIN', 'SET LOCAL statement_timeout = 30000', 'ROLLBACK']);
      expect(fake.client.release).toHaveBeenCalledTimes(2);
    });

    it('should lock the audit chain once per write transaction', async () => {
      await store.transaction(async (session) => {
        await session.lastPermissionChange();
        await session.lastPermissionChange();
      });

      const chainLocks = fake.client.query.mock.calls.filter(([, values]) => values?.[0] === 'rbac:audit-chain');
      expect(chainLocks).toHaveLength(1);
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe('read', () => {
    it('should use a read-only repeatable-read snapshot and map rows', async () => {
      fake.respond.mockImplementation(async (text: string) =>
        text.startsWith('SELECT * FROM rbac.roles WHERE id')
          ? {
              rows: [
                {
                  id: 'editor',
                  name: 'Editor',
                  description: 'Edits posts',
                  parent_id: 'admin',
                  created_by: null,
                  updated_by: 'root-user',
                  created_at: new Date('2024-01-01T00:00:00.000Z'),
                  updated_at: new Date('2024-01-02T00:00:00.000Z'),
                },
              ],
              rowCount: 1,
            }
          : { rows: [], rowCount: 0 },
      );

      const role = await store.read((reader) => reader.getRole('editor'));

      expect(role).toEqual({
        id: 'editor',
        name: 'Editor',
        description: 'Edits posts',
        parentId: 'admin',
        createdBy: null,
        updatedBy: 'root-user',
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        updatedAt: new Date('2024-01-02T00:00:00.000Z'),
      });
      expect(statements()[0]).toBe('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      expect(statements()[2]).toBe('COMMIT');
    });

    it('should report an unknown role id as not found', async () => {
      const lookup = store.read((reader) => new RoleHierarchyReader(reader).require('ghost'));

      await expect(lookup).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.read((reader) => new RoleHierarchyReader(reader).require('ghost'))).rejects.toThrow(
        'Unknown role: ghost',
      );
      expect(fake.client.query).toHaveBeenCalledWith('SELECT * FROM rbac.roles WHERE id = $1', ['ghost']);
    });

    it('should not take the audit chain lock on a read', async () => {
      await store.read((reader) => reader.lastPermissionChange());

      expect(fake.client.query.mock.calls.some(([, values]) => values?.[0] === 'rbac:audit-chain')).toBe(false);
    });

    it('should parse bigint sequences', async () => {
      fake.respond.mockImplementation(async (text: string) =>
        text.includes('FROM rbac.permission_changes')
          ? {
              rows: [
                {
                  id: 'entry-1',
                  sequence: '42',
                  role_id: 'editor',
                  role_name: 'Editor',
                  permission_id: 'perm-1',
                  codename: 'post.edit',
                  action: 'GRANT',
                  actor_id: 'root-user',
                  changed_at: new Date('2024-01-01T00:00:00.000Z'),
                  previous_hash: null,
                  hash: 'abc',
                },
              ],
              rowCount: 1,
            }
          : { rows: [], rowCount: 0 },
      );

      const last = await store.read((reader) => reader.lastPermissionChange());
      expect(last?.sequence).toBe(42);
      expect(last?.roleName).toBe('Editor');
    });
  });

  // ==========================================================================
  // Health
  // ==========================================================================

  describe('health', () => {
    it('should report healthy when the pool answers', async () => {
      const health = await store.health();

      expect(health.healthy).toBe(true);
      expect(health.details).toEqual({ type: 'postgresql', host: 'localhost', port: 5432, database: 'rolegraph' });
    });

    it('should report the error when the pool fails', async () => {
      fake.pool.query.mockRejectedValueOnce(new Error('connection refused'));

      const health = await store.health();
      expect(health.healthy).toBe(false);
      expect(health.details).toEqual({ error: 'connection refused' });
    });
  });
});
