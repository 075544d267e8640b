/**
 * In-Memory RBAC Store
 *
 * Fast in-memory implementation for development, testing, and single-node deployments.
 * Features:
 * - O(1) lookups by id, role name, codename and email
 * - Copy-on-write transactions: a transaction works on a private copy of the
 *   state which replaces the live state on commit
 * - Snapshot reads: a read captures the state reference current at its start
 */

import type {
  Permission,
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
  RbacReader,
  RbacSession,
  RbacStore,
  RoleListResult,
  StoreHealth,
} from './types.js';
import { KeyedLock } from '../locking/keyed-lock.js';

// =============================================================================
// Constants
// =============================================================================

/** Default memory store configuration values */
const MEMORY_STORE_DEFAULTS = {
  DEFAULT_QUERY_LIMIT: 100,
  TRANSACTION_LOCK_TIMEOUT_MS: 30000,
} as const;

const TRANSACTION_LOCK_KEY = 'memory-store:tx';

export interface MemoryState {
  roles: Map<string, Role>;
  roleNames: Map<string, string>; // lower-cased name -> id
  permissions: Map<string, Permission>;
  codenames: Map<string, string>; // codename -> id
  assignments: Map<string, ReadonlySet<string>>; // roleId -> permission ids
  users: Map<string, User>;
  emails: Map<string, string>; // email -> id
  permissionChanges: PermissionChangeLogEntry[];
  parentChanges: RoleParentChangeEntry[];
}

function emptyState(): MemoryState {
  return {
    roles: new Map(),
    roleNames: new Map(),
    permissions: new Map(),
    codenames: new Map(),
    assignments: new Map(),
    users: new Map(),
    emails: new Map(),
    permissionChanges: [],
    parentChanges: [],
  };
}

/** Rows are never mutated in place, so a shallow copy of every collection isolates a transaction. */
function copyState(state: MemoryState): MemoryState {
  return {
    roles: new Map(state.roles),
    roleNames: new Map(state.roleNames),
    permissions: new Map(state.permissions),
    codenames: new Map(state.codenames),
    assignments: new Map(state.assignments),
    users: new Map(state.users),
    emails: new Map(state.emails),
    permissionChanges: [...state.permissionChanges],
    parentChanges: [...state.parentChanges],
  };
}

// =============================================================================
// Session
// =============================================================================

export class MemorySession implements RbacSession {
  constructor(private readonly state: MemoryState) {}

  async getRole(id: string): Promise<Role | null> {
    return this.state.roles.get(id) ?? null;
  }

  async getRoleByName(name: string): Promise<Role | null> {
    const id = this.state.roleNames.get(name.toLowerCase());
    return id ? this.getRole(id) : null;
  }

  async listRoles(query: RoleQuery): Promise<RoleListResult> {
    let roles = Array.from(this.state.roles.values());

    if (query.search) {
      const needle = query.search.toLowerCase();
      roles = roles.filter(
        (role) => role.name.toLowerCase().includes(needle) || role.description.toLowerCase().includes(needle),
      );
    }

    const orderBy = query.orderBy ?? 'name';
    const direction = query.sortOrder === 'desc' ? -1 : 1;
    roles.sort((a, b) => {
      const cmp = orderBy === 'createdAt'
        ? a.createdAt.getTime() - b.createdAt.getTime()
        : a.name.localeCompare(b.name);
      return cmp * direction;
    });

    const offset = query.offset ?? 0;
    const limit = query.limit ?? MEMORY_STORE_DEFAULTS.DEFAULT_QUERY_LIMIT;
    return { roles: roles.slice(offset, offset + limit), total: roles.length };
  }

  async childrenOf(roleId: string): Promise<Role[]> {
    return Array.from(this.state.roles.values()).filter((role) => role.parentId === roleId);
  }

  async getPermission(id: string): Promise<Permission | null> {
    return this.state.permissions.get(id) ?? null;
  }

  async getPermissionsByCodename(codenames: string[]): Promise<Permission[]> {
    const found: Permission[] = [];
    for (const codename of new Set(codenames)) {
      const id = this.state.codenames.get(codename);
      const permission = id ? this.state.permissions.get(id) : undefined;
      if (permission) found.push(permission);
    }
    return found;
  }

  async listPermissions(query: PermissionQuery): Promise<Permission[]> {
    const needle = query.search?.toLowerCase();
    return Array.from(this.state.permissions.values())
      .filter((p) => !query.subsystem || p.subsystem === query.subsystem)
      .filter(
        (p) =>
          !needle ||
          p.codename.toLowerCase().includes(needle) ||
          p.name.toLowerCase().includes(needle) ||
          p.subsystem.toLowerCase().includes(needle),
      )
      .sort((a, b) => a.subsystem.localeCompare(b.subsystem) || a.codename.localeCompare(b.codename));
  }

  async directPermissions(roleId: string): Promise<Permission[]> {
    const ids = this.state.assignments.get(roleId);
    if (!ids) return [];

    const permissions: Permission[] = [];
    for (const id of ids) {
      const permission = this.state.permissions.get(id);
      if (permission) permissions.push(permission);
    }
    return permissions.sort((a, b) => a.codename.localeCompare(b.codename));
  }

  async getUser(id: string): Promise<User | null> {
    return this.state.users.get(id) ?? null;
  }

  async getUserByEmail(email: string): Promise<User | null> {
    const id = this.state.emails.get(email);
    return id ? this.getUser(id) : null;
  }

  async usersWithRole(roleId: string): Promise<User[]> {
    return Array.from(this.state.users.values())
      .filter((user) => user.roleId === roleId)
      .sort((a, b) => a.email.localeCompare(b.email));
  }

  async lastPermissionChange(): Promise<PermissionChangeLogEntry | null> {
    const entries = this.state.permissionChanges;
    return entries.length > 0 ? entries[entries.length - 1] : null;
  }

  async queryPermissionChanges(query: PermissionChangeQuery): Promise<PermissionChangeListResult> {
    const { filter } = query;
    const matching = this.state.permissionChanges.filter(
      (entry) =>
        (!filter.roleId || entry.roleId === filter.roleId) &&
        (!filter.actorId || entry.actorId === filter.actorId) &&
        (!filter.action || entry.action === filter.action) &&
        (!filter.from || entry.changedAt >= filter.from) &&
        (!filter.to || entry.changedAt <= filter.to),
    );

    // Entries are stored in sequence order
    const ordered = query.sortOrder === 'desc' ? [...matching].reverse() : matching;

    return {
      entries: ordered.slice(query.offset, query.offset + query.limit),
      total: matching.length,
    };
  }

  async scanPermissionChanges(afterSequence: number, limit: number): Promise<PermissionChangeLogEntry[]> {
    return this.state.permissionChanges.filter((entry) => entry.sequence > afterSequence).slice(0, limit);
  }

  async parentChanges(roleId: string): Promise<RoleParentChangeEntry[]> {
    return this.state.parentChanges.filter((entry) => entry.roleId === roleId);
  }

  async lastParentChange(): Promise<RoleParentChangeEntry | null> {
    const entries = this.state.parentChanges;
    return entries.length > 0 ? entries[entries.length - 1] : null;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async insertRole(role: Role): Promise<void> {
    const key = role.name.toLowerCase();
    if (this.state.roles.has(role.id) || this.state.roleNames.has(key)) {
      throw new Error(`Role already exists: ${role.name}`);
    }
    this.state.roles.set(role.id, role);
    this.state.roleNames.set(key, role.id);
  }

  async updateRole(role: Role): Promise<void> {
    const existing = this.state.roles.get(role.id);
    if (!existing) {
      throw new Error(`Role does not exist: ${role.id}`);
    }
    this.state.roleNames.delete(existing.name.toLowerCase());
    this.state.roleNames.set(role.name.toLowerCase(), role.id);
    this.state.roles.set(role.id, role);
  }

  async deleteRole(id: string): Promise<void> {
    const existing = this.state.roles.get(id);
    if (!existing) return;
    this.state.roles.delete(id);
    this.state.roleNames.delete(existing.name.toLowerCase());
    this.state.assignments.delete(id);
  }

  async upsertPermission(permission: Permission): Promise<Permission> {
    const existingId = this.state.codenames.get(permission.codename);
    const existing = existingId ? this.state.permissions.get(existingId) : undefined;

    // Codename and id are immutable once created
    const stored: Permission = existing
      ? { ...existing, name: permission.name, subsystem: permission.subsystem }
      : permission;

    this.state.permissions.set(stored.id, stored);
    this.state.codenames.set(stored.codename, stored.id);
    return stored;
  }

  async addAssignment(roleId: string, permissionId: string): Promise<boolean> {
    const current = this.state.assignments.get(roleId) ?? new Set<string>();
    if (current.has(permissionId)) return false;

    const next = new Set(current);
    next.add(permissionId);
    this.state.assignments.set(roleId, next);
    return true;
  }

  async removeAssignment(roleId: string, permissionId: string): Promise<boolean> {
    const current = this.state.assignments.get(roleId);
    if (!current || !current.has(permissionId)) return false;

    const next = new Set(current);
    next.delete(permissionId);
    this.state.assignments.set(roleId, next);
    return true;
  }

  async upsertUser(user: User): Promise<void> {
    const existing = this.state.users.get(user.id);
    const ownerOfEmail = this.state.emails.get(user.email);
    if (ownerOfEmail && ownerOfEmail !== user.id) {
      throw new Error(`Email already in use: ${user.email}`);
    }
    if (existing) {
      this.state.emails.delete(existing.email);
    }
    this.state.users.set(user.id, user);
    this.state.emails.set(user.email, user.id);
  }

  async insertPermissionChange(entry: PermissionChangeLogEntry): Promise<void> {
    this.state.permissionChanges.push(entry);
  }

  async insertParentChange(entry: RoleParentChangeEntry): Promise<void> {
    this.state.parentChanges.push(entry);
  }
}

// =============================================================================
// Store
// =============================================================================

export class MemoryRbacStore implements RbacStore {
  private state: MemoryState = emptyState();
  private txLock = new KeyedLock(MEMORY_STORE_DEFAULTS.TRANSACTION_LOCK_TIMEOUT_MS);
  private initialized = false;

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async close(): Promise<void> {
    this.state = emptyState();
    this.initialized = false;
  }

  async health(): Promise<StoreHealth> {
    const start = Date.now();
    return {
      healthy: this.initialized,
      latencyMs: Date.now() - start,
      details: {
        type: 'memory',
        roleCount: this.state.roles.size,
        permissionCount: this.state.permissions.size,
        auditEntryCount: this.state.permissionChanges.length,
      },
    };
  }

  async read<T>(fn: (reader: RbacReader) => Promise<T>): Promise<T> {
    this.ensureInitialized();
    return fn(new MemorySession(this.state));
  }

  async transaction<T>(fn: (session: RbacSession) => Promise<T>): Promise<T> {
    this.ensureInitialized();

    return this.txLock.withLocks([{ key: TRANSACTION_LOCK_KEY, mode: 'exclusive' }], async () => {
      const draft = copyState(this.state);
      const result = await fn(new MemorySession(draft));
      // Commit: swap in the draft. A rejected fn leaves the live state untouched.
      this.state = draft;
      return result;
    });
  }

  // ==========================================================================
  // Additional Memory-Store Specific Methods
  // ==========================================================================

  /** Direct access to committed audit rows (useful for testing tamper detection) */
  get permissionChangeRows(): PermissionChangeLogEntry[] {
    return this.state.permissionChanges;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('MemoryRbacStore not initialized. Call initialize() first.');
    }
  }
}
