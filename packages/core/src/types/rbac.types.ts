/**
 * Core RBAC Types
 *
 * Roles form a single-parent hierarchy. Each role carries a set of direct
 * permissions; its effective set is the union of its own and every
 * ancestor's direct permissions.
 */

// =============================================================================
// Roles
// =============================================================================

export interface Role {
  /** Unique role identifier */
  id: string;
  /** Unique human-readable name */
  name: string;
  description: string;
  /** Parent role whose permissions are inherited, null for a root role */
  parentId: string | null;
  createdBy: string | null;
  updatedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateRoleInput {
  name: string;
  description?: string;
  parentId?: string | null;
}

export interface UpdateRoleInput {
  name?: string;
  description?: string;
}

export interface RoleQuery {
  /** Case-insensitive substring match on name and description */
  search?: string;
  orderBy?: 'name' | 'createdAt';
  sortOrder?: 'asc' | 'desc';
  offset?: number;
  limit?: number;
}

export interface RoleQueryResult {
  roles: Role[];
  total: number;
  hasMore: boolean;
}

export type RoleDeletionPolicy = 'restrict' | 'orphan';

// =============================================================================
// Permissions
// =============================================================================

export interface Permission {
  id: string;
  /** Stable machine name, e.g. `post.edit` */
  codename: string;
  /** Human-readable name */
  name: string;
  /** Owning subsystem label */
  subsystem: string;
}

/** Catalog entry used to seed or sync permissions */
export interface PermissionDefinition {
  codename: string;
  name: string;
  subsystem: string;
}

export interface PermissionQuery {
  search?: string;
  subsystem?: string;
}

/** Wire shape handed to the authorization-check layer */
export interface EffectivePermission {
  codename: string;
  name: string;
  subsystem: string;
}

export interface EffectivePermissionSet {
  roleId: string;
  /** Unique by codename, sorted by codename */
  permissions: Permission[];
  computedAt: Date;
}

// =============================================================================
// Audit
// =============================================================================

export type PermissionChangeAction = 'GRANT' | 'REVOKE';

export interface PermissionChangeLogEntry {
  id: string;
  /** Position in the hash chain, starting at 1 */
  sequence: number;
  roleId: string;
  /** Role name at the time of the change */
  roleName: string;
  permissionId: string;
  /** Permission codename at the time of the change */
  codename: string;
  action: PermissionChangeAction;
  actorId: string;
  changedAt: Date;
  previousHash: string | null;
  hash: string;
}

export interface RoleParentChangeEntry {
  id: string;
  sequence: number;
  roleId: string;
  previousParentId: string | null;
  newParentId: string | null;
  actorId: string;
  changedAt: Date;
}

export interface AuditLogFilter {
  roleId?: string;
  actorId?: string;
  action?: PermissionChangeAction;
  /** Inclusive lower bound on changedAt */
  from?: Date;
  /** Inclusive upper bound on changedAt */
  to?: Date;
}

export interface AuditLogOptions {
  limit?: number;
  offset?: number;
  sortOrder?: 'asc' | 'desc';
}

export interface AuditLogResult {
  entries: PermissionChangeLogEntry[];
  total: number;
  hasMore: boolean;
}

export interface AuditChainVerification {
  valid: boolean;
  checked: number;
  /** Sequence of the first entry whose hash does not match */
  brokenAt?: number;
}

// =============================================================================
// Users
// =============================================================================

export interface User {
  id: string;
  /** Trimmed and lower-cased */
  email: string;
  roleId: string | null;
  isActive: boolean;
  isSuperuser: boolean;
  lastLoginIp: string | null;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// Mutations
// =============================================================================

export interface BulkPermissionChange {
  roleId: string;
  grants: string[];
  revokes: string[];
  actorId: string;
}

export interface BulkMutationSummary {
  roleId: string;
  /** Codenames newly granted */
  granted: string[];
  /** Codenames actually revoked */
  revoked: string[];
  /** Codenames already in the requested state */
  noOps: string[];
}

export interface DeleteRoleSummary {
  roleId: string;
  /** Children re-rooted by the orphan policy */
  detachedChildren: string[];
  /** Users whose role was cleared by the orphan policy */
  unassignedUsers: string[];
  /** Codenames revoked before deletion */
  revoked: string[];
}
