/**
 * PostgreSQL RBAC Store
 *
 * Production implementation for role/permission persistence.
 * Supports:
 * - Connection pooling with pg
 * - Automatic schema migrations
 * - Transaction-scoped advisory locks mirroring the in-process lock keys, so
 *   several processes sharing one database serialize the same way
 * - REPEATABLE READ snapshots for the resolver's read path
 */

import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import type {
  Permission,
  PermissionChangeAction,
  PermissionChangeLogEntry,
  PermissionQuery,
  Role,
  RoleParentChangeEntry,
  RoleQuery,
  User,
} from '../types/rbac.types.js';
import type {
  PermissionChangeListResult,
  PermissionChangeQuery,
  PostgresConfig,
  RbacReader,
  RbacSession,
  RbacStore,
  RoleListResult,
  StoreHealth,
  TransactionOptions,
} from './types.js';
import { Logger } from '../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

/** Default PostgreSQL configuration values */
const POSTGRES_DEFAULTS = {
  HOST: 'localhost',
  PORT: 5432,
  DATABASE: 'rolegraph',
  USER: 'postgres',
  SCHEMA: 'rbac',
  POOL_SIZE: 10,
  CONNECTION_TIMEOUT_MS: 5000,
  QUERY_TIMEOUT_MS: 30000,
  IDLE_TIMEOUT_MS: 30000,
  DEFAULT_QUERY_LIMIT: 100,
} as const;

/** Advisory lock serializing appends to the audit hash chain */
const AUDIT_CHAIN_LOCK = 'rbac:audit-chain';

const SCHEMA_NAME = /^[a-z_][a-z0-9_]*$/;

interface RoleRow {
  id: string;
  name: string;
  description: string;
  parent_id: string | null;
  created_by: string | null;
  updated_by: string | null;
  created_at: Date;
  updated_at: Date;
}

interface PermissionRow {
  id: string;
  codename: string;
  name: string;
  subsystem: string;
}

interface UserRow {
  id: string;
  email: string;
  role_id: string | null;
  is_active: boolean;
  is_superuser: boolean;
  last_login_ip: string | null;
  created_at: Date;
  updated_at: Date;
}

interface PermissionChangeRow {
  id: string;
  sequence: string; // bigint arrives as text
  role_id: string;
  role_name: string;
  permission_id: string;
  codename: string;
  action: PermissionChangeAction;
  actor_id: string;
  changed_at: Date;
  previous_hash: string | null;
  hash: string;
}

interface ParentChangeRow {
  id: string;
  sequence: string;
  role_id: string;
  previous_parent_id: string | null;
  new_parent_id: string | null;
  actor_id: string;
  changed_at: Date;
}

// =============================================================================
// Row mapping
// =============================================================================

function rowToRole(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    parentId: row.parent_id,
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToPermission(row: PermissionRow): Permission {
  return { id: row.id, codename: row.codename, name: row.name, subsystem: row.subsystem };
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    roleId: row.role_id,
    isActive: row.is_active,
    isSuperuser: row.is_superuser,
    lastLoginIp: row.last_login_ip,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToPermissionChange(row: PermissionChangeRow): PermissionChangeLogEntry {
  return {
    id: row.id,
    sequence: parseInt(row.sequence, 10),
    roleId: row.role_id,
    roleName: row.role_name,
    permissionId: row.permission_id,
    codename: row.codename,
    action: row.action,
    actorId: row.actor_id,
    changedAt: new Date(row.changed_at),
    previousHash: row.previous_hash,
    hash: row.hash,
  };
}

function rowToParentChange(row: ParentChangeRow): RoleParentChangeEntry {
  return {
    id: row.id,
    sequence: parseInt(row.sequence, 10),
    roleId: row.role_id,
    previousParentId: row.previous_parent_id,
    newParentId: row.new_parent_id,
    actorId: row.actor_id,
    changedAt: new Date(row.changed_at),
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

// =============================================================================
// Session
// =============================================================================

export class PostgresSession implements RbacSession {
  private auditChainLocked = false;

  constructor(
    private readonly client: PoolClient,
    private readonly schema: string,
    private readonly writable: boolean,
  ) {}

  async getRole(id: string): Promise<Role | null> {
    const result = await this.client.query<RoleRow>(`SELECT * FROM ${this.schema}.roles WHERE id = $1`, [id]);
    return result.rows.length > 0 ? rowToRole(result.rows[0]) : null;
  }

  async getRoleByName(name: string): Promise<Role | null> {
    const result = await this.client.query<RoleRow>(
      `SELECT * FROM ${this.schema}.roles WHERE lower(name) = lower($1)`,
      [name],
    );
    return result.rows.length > 0 ? rowToRole(result.rows[0]) : null;
  }

  async listRoles(query: RoleQuery): Promise<RoleListResult> {
    const params: unknown[] = [];
    let whereClause = '';

    if (query.search) {
      params.push(`%${escapeLike(query.search)}%`);
      whereClause = `WHERE name ILIKE $1 OR description ILIKE $1`;
    }

    const sortColumn = query.orderBy === 'createdAt' ? 'created_at' : 'name';
    const sortOrder = query.sortOrder === 'desc' ? 'DESC' : 'ASC';

    const countResult = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${this.schema}.roles ${whereClause}`,
      params,
    );

    const limit = query.limit ?? POSTGRES_DEFAULTS.DEFAULT_QUERY_LIMIT;
    const offset = query.offset ?? 0;
    const result = await this.client.query<RoleRow>(
      `SELECT * FROM ${this.schema}.roles ${whereClause}
       ORDER BY ${sortColumn} ${sortOrder}, id
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset],
    );

    return { roles: result.rows.map(rowToRole), total: parseInt(countResult.rows[0].count, 10) };
  }

  async childrenOf(roleId: string): Promise<Role[]> {
    const result = await this.client.query<RoleRow>(
      `SELECT * FROM ${this.schema}.roles WHERE parent_id = $1 ORDER BY name`,
      [roleId],
    );
    return result.rows.map(rowToRole);
  }

  async getPermission(id: string): Promise<Permission | null> {
    const result = await this.client.query<PermissionRow>(
      `SELECT * FROM ${this.schema}.permissions WHERE id = $1`,
      [id],
    );
    return result.rows.length > 0 ? rowToPermission(result.rows[0]) : null;
  }

  async getPermissionsByCodename(codenames: string[]): Promise<Permission[]> {
    if (codenames.length === 0) return [];
    const result = await this.client.query<PermissionRow>(
      `SELECT * FROM ${this.schema}.permissions WHERE codename = ANY($1)`,
      [Array.from(new Set(codenames))],
    );
    return result.rows.map(rowToPermission);
  }

  async listPermissions(query: PermissionQuery): Promise<Permission[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.subsystem) {
      params.push(query.subsystem);
      conditions.push(`subsystem = $${params.length}`);
    }
    if (query.search) {
      params.push(`%${escapeLike(query.search)}%`);
      conditions.push(`(codename ILIKE $${params.length} OR name ILIKE $${params.length} OR subsystem ILIKE $${params.length})`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.client.query<PermissionRow>(
      `SELECT * FROM ${this.schema}.permissions ${whereClause} ORDER BY subsystem, codename`,
      params,
    );
    return result.rows.map(rowToPermission);
  }

  async directPermissions(roleId: string): Promise<Permission[]> {
    const result = await this.client.query<PermissionRow>(
      `SELECT p.* FROM ${this.schema}.role_permissions rp
       JOIN ${this.schema}.permissions p ON p.id = rp.permission_id
       WHERE rp.role_id = $1
       ORDER BY p.codename`,
      [roleId],
    );
    return result.rows.map(rowToPermission);
  }

  async getUser(id: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(`SELECT * FROM ${this.schema}.users WHERE id = $1`, [id]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async getUserByEmail(email: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(`SELECT * FROM ${this.schema}.users WHERE email = $1`, [email]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async usersWithRole(roleId: string): Promise<User[]> {
    const result = await this.client.query<UserRow>(
      `SELECT * FROM ${this.schema}.users WHERE role_id = $1 ORDER BY email`,
      [roleId],
    );
    return result.rows.map(rowToUser);
  }

  async lastPermissionChange(): Promise<PermissionChangeLogEntry | null> {
    // Writers must hold the chain lock before reading the tail they extend
    if (this.writable && !this.auditChainLocked) {
      await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [AUDIT_CHAIN_LOCK]);
      this.auditChainLocked = true;
    }
    const result = await this.client.query<PermissionChangeRow>(
      `SELECT * FROM ${this.schema}.permission_changes ORDER BY sequence DESC LIMIT 1`,
    );
    return result.rows.length > 0 ? rowToPermissionChange(result.rows[0]) : null;
  }

  async queryPermissionChanges(query: PermissionChangeQuery): Promise<PermissionChangeListResult> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    const { filter } = query;

    if (filter.roleId) {
      params.push(filter.roleId);
      conditions.push(`role_id = $${params.length}`);
    }
    if (filter.actorId) {
      params.push(filter.actorId);
      conditions.push(`actor_id = $${params.length}`);
    }
    if (filter.action) {
      params.push(filter.action);
      conditions.push(`action = $${params.length}`);
    }
    if (filter.from) {
      params.push(filter.from);
      conditions.push(`changed_at >= $${params.length}`);
    }
    if (filter.to) {
      params.push(filter.to);
      conditions.push(`changed_at <= $${params.length}`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sortOrder = query.sortOrder === 'asc' ? 'ASC' : 'DESC';

    const countResult = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${this.schema}.permission_changes ${whereClause}`,
      params,
    );

    const result = await this.client.query<PermissionChangeRow>(
      `SELECT * FROM ${this.schema}.permission_changes ${whereClause}
       ORDER BY sequence ${sortOrder}
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, query.limit, query.offset],
    );

    return {
      entries: result.rows.map(rowToPermissionChange),
      total: parseInt(countResult.rows[0].count, 10),
    };
  }

  async scanPermissionChanges(afterSequence: number, limit: number): Promise<PermissionChangeLogEntry[]> {
    const result = await this.client.query<PermissionChangeRow>(
      `SELECT * FROM ${this.schema}.permission_changes WHERE sequence > $1 ORDER BY sequence ASC LIMIT $2`,
      [afterSequence, limit],
    );
    return result.rows.map(rowToPermissionChange);
  }

  async parentChanges(roleId: string): Promise<RoleParentChangeEntry[]> {
    const result = await this.client.query<ParentChangeRow>(
      `SELECT * FROM ${this.schema}.role_parent_changes WHERE role_id = $1 ORDER BY sequence ASC`,
      [roleId],
    );
    return result.rows.map(rowToParentChange);
  }

  async lastParentChange(): Promise<RoleParentChangeEntry | null> {
    const result = await this.client.query<ParentChangeRow>(
      `SELECT * FROM ${this.schema}.role_parent_changes ORDER BY sequence DESC LIMIT 1`,
    );
    return result.rows.length > 0 ? rowToParentChange(result.rows[0]) : null;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async insertRole(role: Role): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.schema}.roles
        (id, name, description, parent_id, created_by, updated_by, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [role.id, role.name, role.description, role.parentId, role.createdBy, role.updatedBy, role.createdAt, role.updatedAt],
    );
  }

  async updateRole(role: Role): Promise<void> {
    await this.client.query(
      `UPDATE ${this.schema}.roles
       SET name = $2, description = $3, parent_id = $4, updated_by = $5, updated_at = $6
       WHERE id = $1`,
      [role.id, role.name, role.description, role.parentId, role.updatedBy, role.updatedAt],
    );
  }

  async deleteRole(id: string): Promise<void> {
    // role_permissions rows cascade
    await this.client.query(`DELETE FROM ${this.schema}.roles WHERE id = $1`, [id]);
  }

  async upsertPermission(permission: Permission): Promise<Permission> {
    const result = await this.client.query<PermissionRow>(
      `INSERT INTO ${this.schema}.permissions (id, codename, name, subsystem)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (codename) DO UPDATE SET
         name = EXCLUDED.name,
         subsystem = EXCLUDED.subsystem
       RETURNING *`,
      [permission.id, permission.codename, permission.name, permission.subsystem],
    );
    return rowToPermission(result.rows[0]);
  }

  async addAssignment(roleId: string, permissionId: string): Promise<boolean> {
    const result = await this.client.query(
      `INSERT INTO ${this.schema}.role_permissions (role_id, permission_id)
       VALUES ($1, $2)
       ON CONFLICT DO NOTHING`,
      [roleId, permissionId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async removeAssignment(roleId: string, permissionId: string): Promise<boolean> {
    const result = await this.client.query(
      `DELETE FROM ${this.schema}.role_permissions WHERE role_id = $1 AND permission_id = $2`,
      [roleId, permissionId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async upsertUser(user: User): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.schema}.users
        (id, email, role_id, is_active, is_superuser, last_login_ip, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO UPDATE SET
         email = EXCLUDED.email,
         role_id = EXCLUDED.role_id,
         is_active = EXCLUDED.is_active,
         is_superuser = EXCLUDED.is_superuser,
         last_login_ip = EXCLUDED.last_login_ip,
         updated_at = EXCLUDED.updated_at`,
      [user.id, user.email, user.roleId, user.isActive, user.isSuperuser, user.lastLoginIp, user.createdAt, user.updatedAt],
    );
  }

  async insertPermissionChange(entry: PermissionChangeLogEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.schema}.permission_changes
        (id, sequence, role_id, role_name, permission_id, codename, action, actor_id, changed_at, previous_hash, hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        entry.id,
        entry.sequence,
        entry.roleId,
        entry.roleName,
        entry.permissionId,
        entry.codename,
        entry.action,
        entry.actorId,
        entry.changedAt,
        entry.previousHash,
        entry.hash,
      ],
    );
  }

  async insertParentChange(entry: RoleParentChangeEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.schema}.role_parent_changes
        (id, sequence, role_id, previous_parent_id, new_parent_id, actor_id, changed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [entry.id, entry.sequence, entry.roleId, entry.previousParentId, entry.newParentId, entry.actorId, entry.changedAt],
    );
  }
}

// =============================================================================
// Store
// =============================================================================

export class PostgresRbacStore implements RbacStore {
  private pool: Pool | null = null;
  private config: PostgresConfig;
  private schema: string;
  private initialized = false;
  private logger = new Logger('rolegraph').child({ component: 'postgres-store' });

  constructor(config: PostgresConfig) {
    this.config = {
      host: POSTGRES_DEFAULTS.HOST,
      port: POSTGRES_DEFAULTS.PORT,
      database: POSTGRES_DEFAULTS.DATABASE,
      user: POSTGRES_DEFAULTS.USER,
      schema: POSTGRES_DEFAULTS.SCHEMA,
      poolSize: POSTGRES_DEFAULTS.POOL_SIZE,
      connectionTimeoutMs: POSTGRES_DEFAULTS.CONNECTION_TIMEOUT_MS,
      queryTimeoutMs: POSTGRES_DEFAULTS.QUERY_TIMEOUT_MS,
      autoMigrate: true,
      ...config,
    };
    this.schema = this.config.schema ?? POSTGRES_DEFAULTS.SCHEMA;
    if (!SCHEMA_NAME.test(this.schema)) {
      throw new Error(`Invalid schema name: ${this.schema}`);
    }
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      this.pool = new pg.Pool({
        connectionString: this.config.connectionString,
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        user: this.config.user,
        password: this.config.password,
        max: this.config.poolSize,
        connectionTimeoutMillis: this.config.connectionTimeoutMs,
        idleTimeoutMillis: POSTGRES_DEFAULTS.IDLE_TIMEOUT_MS,
        ssl: this.config.ssl ? { rejectUnauthorized: false } : undefined,
      });
      // Idle clients can fail between checkouts
      this.pool.on('error', (error: Error) => {
        this.logger.error('PostgreSQL pool error', error);
      });

      // Test connection
      const client = await this.pool.connect();
      client.release();

      if (this.config.autoMigrate) {
        await this.runMigrations();
      }

      this.initialized = true;
    } catch (error) {
      throw new Error(`Failed to connect to PostgreSQL: ${error instanceof Error ? error.message : error}`);
    }
  }

  private async runMigrations(): Promise<void> {
    if (!this.pool) return;

    const migrations = `
      CREATE SCHEMA IF NOT EXISTS ${this.schema};

      CREATE TABLE IF NOT EXISTS ${this.schema}.roles (
        id TEXT PRIMARY KEY,
        name VARCHAR(50) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        parent_id TEXT REFERENCES ${this.schema}.roles(id) ON DELETE RESTRICT,
        created_by TEXT,
        updated_by TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT roles_no_self_parent CHECK (parent_id IS NULL OR parent_id <> id)
      );
      CREATE UNIQUE INDEX IF NOT EXISTS idx_roles_name ON ${this.schema}.roles (lower(name));
      CREATE INDEX IF NOT EXISTS idx_roles_parent ON ${this.schema}.roles (parent_id);

      CREATE TABLE IF NOT EXISTS ${this.schema}.permissions (
        id TEXT PRIMARY KEY,
        codename VARCHAR(100) NOT NULL UNIQUE,
        name VARCHAR(255) NOT NULL,
        subsystem VARCHAR(100) NOT NULL
      );

      CREATE TABLE IF NOT EXISTS ${this.schema}.role_permissions (
        role_id TEXT NOT NULL REFERENCES ${this.schema}.roles(id) ON DELETE CASCADE,
        permission_id TEXT NOT NULL REFERENCES ${this.schema}.permissions(id) ON DELETE CASCADE,
        PRIMARY KEY (role_id, permission_id)
      );

      CREATE TABLE IF NOT EXISTS ${this.schema}.users (
        id TEXT PRIMARY KEY,
        email VARCHAR(254) NOT NULL UNIQUE,
        role_id TEXT REFERENCES ${this.schema}.roles(id) ON DELETE RESTRICT,
        is_active BOOLEAN NOT NULL DEFAULT true,
        is_superuser BOOLEAN NOT NULL DEFAULT false,
        last_login_ip INET,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      CREATE INDEX IF NOT EXISTS idx_users_role ON ${this.schema}.users (role_id);

      -- Audit rows keep name snapshots and no foreign keys: they outlive the roles they describe
      CREATE TABLE IF NOT EXISTS ${this.schema}.permission_changes (
        id TEXT PRIMARY KEY,
        sequence BIGINT NOT NULL UNIQUE,
        role_id TEXT NOT NULL,
        role_name VARCHAR(50) NOT NULL,
        permission_id TEXT NOT NULL,
        codename VARCHAR(100) NOT NULL,
        action VARCHAR(10) NOT NULL CHECK (action IN ('GRANT', 'REVOKE')),
        actor_id TEXT NOT NULL,
        changed_at TIMESTAMPTZ NOT NULL,
        previous_hash CHAR(64),
        hash CHAR(64) NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_permission_changes_role ON ${this.schema}.permission_changes (role_id);
      CREATE INDEX IF NOT EXISTS idx_permission_changes_actor ON ${this.schema}.permission_changes (actor_id);
      CREATE INDEX IF NOT EXISTS idx_permission_changes_changed_at ON ${this.schema}.permission_changes (changed_at);

      CREATE TABLE IF NOT EXISTS ${this.schema}.role_parent_changes (
        id TEXT PRIMARY KEY,
        sequence BIGINT NOT NULL UNIQUE,
        role_id TEXT NOT NULL,
        previous_parent_id TEXT,
        new_parent_id TEXT,
        actor_id TEXT NOT NULL,
        changed_at TIMESTAMPTZ NOT NULL
      );

      -- Append-only: reject UPDATE and DELETE on audit tables
      CREATE OR REPLACE FUNCTION ${this.schema}.reject_audit_mutation()
      RETURNS TRIGGER AS $$
      BEGIN
        RAISE EXCEPTION 'audit rows are append-only';
      END;
      $$ LANGUAGE plpgsql;

      DROP TRIGGER IF EXISTS permission_changes_append_only ON ${this.schema}.permission_changes;
      CREATE TRIGGER permission_changes_append_only
        BEFORE UPDATE OR DELETE ON ${this.schema}.permission_changes
        FOR EACH ROW EXECUTE FUNCTION ${this.schema}.reject_audit_mutation();

      DROP TRIGGER IF EXISTS role_parent_changes_append_only ON ${this.schema}.role_parent_changes;
      CREATE TRIGGER role_parent_changes_append_only
        BEFORE UPDATE OR DELETE ON ${this.schema}.role_parent_changes
        FOR EACH ROW EXECUTE FUNCTION ${this.schema}.reject_audit_mutation();
    `;

    await this.pool.query(migrations);
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
    this.initialized = false;
  }

  async health(): Promise<StoreHealth> {
    if (!this.pool) {
      return { healthy: false, latencyMs: -1, details: { error: 'Not initialized' } };
    }

    const start = Date.now();
    try {
      await this.pool.query('SELECT 1');
      return {
        healthy: true,
        latencyMs: Date.now() - start,
        details: {
          type: 'postgresql',
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
        },
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        details: { error: error instanceof Error ? error.message : 'Unknown error' },
      };
    }
  }

  async read<T>(fn: (reader: RbacReader) => Promise<T>): Promise<T> {
    const client = await this.connect();

    try {
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      const result = await fn(new PostgresSession(client, this.schema, false));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async transaction<T>(fn: (session: RbacSession) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const client = await this.connect();

    try {
      await client.query('BEGIN');
      await client.query(`SET LOCAL statement_timeout = ${Number(this.config.queryTimeoutMs)}`);

      for (const lock of options.locks ?? []) {
        const fnName = lock.mode === 'shared' ? 'pg_advisory_xact_lock_shared' : 'pg_advisory_xact_lock';
        await client.query(`SELECT ${fnName}(hashtext($1))`, [lock.key]);
      }

      const result = await fn(new PostgresSession(client, this.schema, true));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async connect(): Promise<PoolClient> {
    if (!this.initialized || !this.pool) {
      throw new Error('PostgresRbacStore not initialized. Call initialize() first.');
    }
    return this.pool.connect();
  }
}
