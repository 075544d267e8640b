/**
 * Storage Layer Types
 *
 * Defines the persistence seam for roles, permissions, assignments, users
 * and the audit trail. Implementations: PostgreSQL, In-Memory.
 *
 * Components never talk to a backend directly; they are bound to a session.
 * `read()` hands out a consistent read-only snapshot, `transaction()` a
 * read/write session whose changes become visible all at once on commit.
 */

import type {
  AuditLogFilter,
  Permission,
  PermissionChangeLogEntry,
  PermissionQuery,
  Role,
  RoleParentChangeEntry,
  RoleQuery,
  User,
} from '../types/rbac.types.js';
import type { LockRequest } from '../locking/keyed-lock.js';

// =============================================================================
// Storage Configuration
// =============================================================================

export interface StorageConfig {
  /** Storage backend type */
  type: 'memory' | 'postgresql';

  /** Connection string */
  connectionString?: string;

  /** Connection pool size */
  poolSize?: number;

  /** Connection timeout in ms */
  connectionTimeoutMs?: number;

  /** Statement timeout applied to every transaction, in ms */
  queryTimeoutMs?: number;

  /** Enable SSL/TLS */
  ssl?: boolean;
}

export interface PostgresConfig extends StorageConfig {
  type: 'postgresql';
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** Schema name */
  schema?: string;
  /** Run migrations on initialize */
  autoMigrate?: boolean;
}

export interface MemoryConfig extends StorageConfig {
  type: 'memory';
}

export type AnyStorageConfig = MemoryConfig | PostgresConfig;

// =============================================================================
// Sessions
// =============================================================================

export interface RoleListResult {
  roles: Role[];
  total: number;
}

export interface PermissionChangeQuery {
  filter: AuditLogFilter;
  limit: number;
  offset: number;
  sortOrder: 'asc' | 'desc';
}

export interface PermissionChangeListResult {
  entries: PermissionChangeLogEntry[];
  total: number;
}

/**
 * Read-only view of committed state.
 */
export interface RbacReader {
  getRole(id: string): Promise<Role | null>;
  getRoleByName(name: string): Promise<Role | null>;
  listRoles(query: RoleQuery): Promise<RoleListResult>;
  /** Direct children of a role */
  childrenOf(roleId: string): Promise<Role[]>;

  getPermission(id: string): Promise<Permission | null>;
  /** Permissions for the codenames that exist; unknown codenames are omitted */
  getPermissionsByCodename(codenames: string[]): Promise<Permission[]>;
  listPermissions(query: PermissionQuery): Promise<Permission[]>;

  /** Direct (non-inherited) permissions of a role */
  directPermissions(roleId: string): Promise<Permission[]>;

  getUser(id: string): Promise<User | null>;
  getUserByEmail(email: string): Promise<User | null>;
  usersWithRole(roleId: string): Promise<User[]>;

  lastPermissionChange(): Promise<PermissionChangeLogEntry | null>;
  queryPermissionChanges(query: PermissionChangeQuery): Promise<PermissionChangeListResult>;
  /** Entries with sequence greater than `afterSequence`, ascending */
  scanPermissionChanges(afterSequence: number, limit: number): Promise<PermissionChangeLogEntry[]>;
  parentChanges(roleId: string): Promise<RoleParentChangeEntry[]>;
  lastParentChange(): Promise<RoleParentChangeEntry | null>;
}

/**
 * Read/write session bound to one transaction.
 */
export interface RbacSession extends RbacReader {
  insertRole(role: Role): Promise<void>;
  updateRole(role: Role): Promise<void>;
  deleteRole(id: string): Promise<void>;

  /** Insert or update descriptive fields; returns the stored permission */
  upsertPermission(permission: Permission): Promise<Permission>;

  /** Returns false when the pair already exists */
  addAssignment(roleId: string, permissionId: string): Promise<boolean>;
  /** Returns false when the pair does not exist */
  removeAssignment(roleId: string, permissionId: string): Promise<boolean>;

  upsertUser(user: User): Promise<void>;

  insertPermissionChange(entry: PermissionChangeLogEntry): Promise<void>;
  insertParentChange(entry: RoleParentChangeEntry): Promise<void>;
}

export interface TransactionOptions {
  /**
   * Keys locked for the lifetime of the transaction by backends that
   * coordinate across processes. The in-process KeyedLock is taken by the
   * caller.
   */
  locks?: LockRequest[];
}

export interface StoreHealth {
  healthy: boolean;
  latencyMs: number;
  details?: Record<string, unknown>;
}

// =============================================================================
// Storage Interface
// =============================================================================

export interface RbacStore {
  /**
   * Initialize the storage backend
   */
  initialize(): Promise<void>;

  /**
   * Close connections and cleanup
   */
  close(): Promise<void>;

  /**
   * Check if storage is healthy
   */
  health(): Promise<StoreHealth>;

  /**
   * Run `fn` against a consistent snapshot of committed state
   */
  read<T>(fn: (reader: RbacReader) => Promise<T>): Promise<T>;

  /**
   * Run `fn` in a transaction. Commits when `fn` resolves, rolls back
   * when it rejects.
   */
  transaction<T>(fn: (session: RbacSession) => Promise<T>, options?: TransactionOptions): Promise<T>;
}
