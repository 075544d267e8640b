import { EventEmitter } from 'eventemitter3';
import type {
  AuditChainVerification,
  AuditLogFilter,
  AuditLogOptions,
  AuditLogResult,
  BulkMutationSummary,
  CreateRoleInput,
  DeleteRoleSummary,
  EffectivePermission,
  EffectivePermissionSet,
  Permission,
  PermissionDefinition,
  PermissionQuery,
  Role,
  RoleDeletionPolicy,
  RoleParentChangeEntry,
  RoleQuery,
  RoleQueryResult,
  UpdateRoleInput,
  User,
} from '../types/rbac.types.js';
import type { RbacEvents } from '../types/events.types.js';
import type { RbacReader, RbacStore, StoreHealth } from '../storage/types.js';
import type { PermissionCache } from '../cache/types.js';
import { CacheInvalidationCoordinator, type CoordinatorStats } from '../cache/invalidation-coordinator.js';
import { KeyedLock } from '../locking/keyed-lock.js';
import { PermissionResolver } from '../resolver/permission-resolver.js';
import { RoleHierarchyReader, HIERARCHY_DEFAULTS } from '../hierarchy/role-hierarchy-store.js';
import { PermissionAssignmentReader } from '../assignments/permission-assignment-store.js';
import { AuditReader, AUDIT_DEFAULTS } from '../audit/audit-recorder.js';
import { MutationRunner } from '../mutation/mutation-runner.js';
import { MutationCoordinator } from '../mutation/mutation-coordinator.js';
import { PermissionCatalog, type CatalogSyncResult } from '../catalog/permission-catalog.js';
import { UserDirectory } from '../users/user-directory.js';
import type { UserInput } from '../validation/schemas.js';
import { NotFoundError, toStoreError } from '../errors/index.js';
import { Logger } from '../utils/logger.js';

/**
 * Role Engine
 *
 * Single entry point for role administration and permission checks. Wires
 * the store, the permission cache and its coordinator, the resolver and
 * the mutation paths together, and re-emits their events.
 */
export interface RbacEngineConfig {
  store: RbacStore;
  cache: PermissionCache;
  /** Maximum ancestor chain length (default: 32) */
  maxDepth?: number;
  /** How long a mutation waits for its locks, in ms (default: 5000) */
  lockTimeoutMs?: number;
  /** What deleteRole does with children and users (default: restrict) */
  deletionPolicy?: RoleDeletionPolicy;
  /** Recompute on every cache hit and compare (default: false) */
  verifyOnRead?: boolean;
  auditDefaultLimit?: number;
  auditMaxLimit?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface EngineHealth {
  healthy: boolean;
  store: StoreHealth;
  cache: CoordinatorStats;
}

export class RbacEngine extends EventEmitter<RbacEvents> {
  private readonly store: RbacStore;
  private readonly coordinator: CacheInvalidationCoordinator;
  private readonly resolver: PermissionResolver;
  private readonly mutations: MutationCoordinator;
  private readonly catalog: PermissionCatalog;
  private readonly users: UserDirectory;
  private readonly maxDepth: number;
  private readonly auditOptions: { defaultLimit: number; maxLimit: number };
  private readonly unsubscribe: () => void;
  private logger: Logger;
  private closed = false;

  constructor(config: RbacEngineConfig) {
    super();
    const logger = config.logger ?? new Logger('rolegraph');
    const now = config.now ?? (() => new Date());

    this.logger = logger.child({ component: 'engine' });
    this.store = config.store;
    this.maxDepth = config.maxDepth ?? HIERARCHY_DEFAULTS.MAX_DEPTH;
    this.auditOptions = {
      defaultLimit: config.auditDefaultLimit ?? AUDIT_DEFAULTS.DEFAULT_LIMIT,
      maxLimit: config.auditMaxLimit ?? AUDIT_DEFAULTS.MAX_LIMIT,
    };

    const lockTimeoutMs = config.lockTimeoutMs ?? 5000;
    const hierarchy = { maxDepth: this.maxDepth };

    this.coordinator = new CacheInvalidationCoordinator(config.cache, hierarchy, logger);
    this.unsubscribe = this.coordinator.onInvalidate((roleIds) => {
      this.emit('cache:invalidated', { roleIds });
    });

    this.resolver = new PermissionResolver(
      this.store,
      this.coordinator,
      { maxDepth: this.maxDepth, verifyOnRead: config.verifyOnRead ?? false, now },
      logger,
    );

    const runner = new MutationRunner(
      this.store,
      new KeyedLock(lockTimeoutMs),
      this.coordinator,
      lockTimeoutMs,
      logger,
    );

    this.mutations = new MutationCoordinator(
      runner,
      this.coordinator,
      this,
      {
        hierarchy,
        audit: this.auditOptions,
        deletionPolicy: config.deletionPolicy ?? 'restrict',
        now,
      },
      logger,
    );
    this.catalog = new PermissionCatalog(this.store, runner, this.coordinator, logger);
    this.users = new UserDirectory(this.store, this.resolver, this.coordinator, runner, now, logger);
  }

  // ===========================================================================
  // Permission resolution
  // ===========================================================================

  /**
   * Effective permissions of a role in the shape the authorization-check
   * layer consumes, sorted by codename.
   *
   * @throws NotFoundError for an unknown role
   */
  async effectivePermissions(roleId: string): Promise<EffectivePermission[]> {
    const set = await this.resolver.effectivePermissions(roleId);
    return set.permissions.map(({ codename, name, subsystem }) => ({ codename, name, subsystem }));
  }

  /** Full resolved set, including permission ids and the computation time */
  async resolveRole(roleId: string): Promise<EffectivePermissionSet> {
    return this.resolver.effectivePermissions(roleId);
  }

  /**
   * Permissions assigned to the role itself, without inheritance.
   *
   * @throws NotFoundError for an unknown role
   */
  async directPermissions(roleId: string): Promise<Permission[]> {
    return this.read('directPermissions', async (reader) => {
      await new RoleHierarchyReader(reader, { maxDepth: this.maxDepth }).require(roleId);
      return new PermissionAssignmentReader(reader).directPermissions(roleId);
    });
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async applyBulk(roleId: string, grants: string[], revokes: string[], actorId: string): Promise<BulkMutationSummary> {
    return this.mutations.applyBulk(roleId, grants, revokes, actorId);
  }

  /** Pass `null` to make the role a root */
  async setParent(roleId: string, newParentId: string | null, actorId: string): Promise<Role> {
    return this.mutations.setParent(roleId, newParentId, actorId);
  }

  async createRole(input: CreateRoleInput, actorId: string | null = null): Promise<Role> {
    return this.mutations.createRole(input, actorId);
  }

  async updateRole(roleId: string, input: UpdateRoleInput, actorId: string | null = null): Promise<Role> {
    return this.mutations.updateRole(roleId, input, actorId);
  }

  async deleteRole(roleId: string, actorId: string): Promise<DeleteRoleSummary> {
    return this.mutations.deleteRole(roleId, actorId);
  }

  // ===========================================================================
  // Hierarchy queries
  // ===========================================================================

  /**
   * @throws NotFoundError for an unknown role
   */
  async getRole(roleId: string): Promise<Role> {
    return this.read('getRole', (reader) => this.hierarchy(reader).require(roleId));
  }

  /**
   * @throws NotFoundError for an unknown name
   */
  async getRoleByName(name: string): Promise<Role> {
    const role = await this.read('getRoleByName', (reader) => this.hierarchy(reader).getByName(name));
    if (!role) {
      throw new NotFoundError('role', [name]);
    }
    return role;
  }

  async listRoles(query: RoleQuery = {}): Promise<RoleQueryResult> {
    return this.read('listRoles', (reader) => this.hierarchy(reader).list(query));
  }

  async children(roleId: string): Promise<Role[]> {
    return this.read('children', async (reader) => {
      const hierarchy = this.hierarchy(reader);
      await hierarchy.require(roleId);
      return hierarchy.children(roleId);
    });
  }

  /** Nearest first */
  async ancestors(roleId: string): Promise<Role[]> {
    return this.read('ancestors', (reader) => this.hierarchy(reader).ancestors(roleId));
  }

  async descendants(roleId: string): Promise<Role[]> {
    return this.read('descendants', (reader) => this.hierarchy(reader).descendants(roleId));
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  async registerUser(input: UserInput): Promise<User> {
    return this.users.registerUser(input);
  }

  async getUser(userId: string): Promise<User> {
    return this.users.getUser(userId);
  }

  async findUserByEmail(email: string): Promise<User | null> {
    return this.users.findByEmail(email);
  }

  async assignUserRole(userId: string, roleId: string | null, actorId: string): Promise<User> {
    return this.mutations.assignUserRole(userId, roleId, actorId);
  }

  async userPermissions(userId: string): Promise<Permission[]> {
    return this.users.userPermissions(userId);
  }

  async hasPermission(userId: string, codename: string): Promise<boolean> {
    return this.users.hasPermission(userId, codename);
  }

  async hasAllPermissions(userId: string, codenames: string[]): Promise<boolean> {
    return this.users.hasAllPermissions(userId, codenames);
  }

  async usersWithRole(roleId: string): Promise<User[]> {
    return this.users.usersWithRole(roleId);
  }

  // ===========================================================================
  // Permission catalog
  // ===========================================================================

  async syncPermissions(definitions: PermissionDefinition[]): Promise<CatalogSyncResult> {
    return this.catalog.syncPermissions(definitions);
  }

  async getPermission(codename: string): Promise<Permission> {
    return this.catalog.getPermission(codename);
  }

  async listPermissions(query: PermissionQuery = {}): Promise<Permission[]> {
    return this.catalog.listPermissions(query);
  }

  async permissionsBySubsystem(): Promise<Record<string, Permission[]>> {
    return this.catalog.permissionsBySubsystem();
  }

  // ===========================================================================
  // Audit
  // ===========================================================================

  async auditLog(filter: AuditLogFilter = {}, options: AuditLogOptions = {}): Promise<AuditLogResult> {
    return this.read('auditLog', (reader) => new AuditReader(reader, this.auditOptions).query(filter, options));
  }

  async parentChanges(roleId: string): Promise<RoleParentChangeEntry[]> {
    return this.read('parentChanges', (reader) => new AuditReader(reader, this.auditOptions).parentChanges(roleId));
  }

  /**
   * Recompute every hash in the permission change log.
   */
  async verifyAuditChain(): Promise<AuditChainVerification> {
    const result = await this.read('verifyAuditChain', (reader) =>
      new AuditReader(reader, this.auditOptions).verifyChain(),
    );
    if (!result.valid) {
      this.logger.error('Audit chain broken', undefined, { brokenAt: result.brokenAt, checked: result.checked });
    }
    return result;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  async cacheStats(): Promise<CoordinatorStats> {
    return this.coordinator.stats();
  }

  /** Drop every cached set */
  async invalidateAll(): Promise<void> {
    await this.coordinator.invalidateAll();
  }

  async health(): Promise<EngineHealth> {
    const [store, cache] = await Promise.all([this.store.health(), this.coordinator.stats()]);
    return { healthy: store.healthy && !this.closed, store, cache };
  }

  /**
   * Close the cache and the store. Listeners are removed.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.unsubscribe();
    this.removeAllListeners();
    await this.coordinator.close();
    await this.store.close();
    this.logger.info('Engine closed');
  }

  private hierarchy(reader: RbacReader): RoleHierarchyReader {
    return new RoleHierarchyReader(reader, { maxDepth: this.maxDepth });
  }

  private async read<T>(operation: string, fn: (reader: RbacReader) => Promise<T>): Promise<T> {
    try {
      return await this.store.read(fn);
    } catch (error) {
      throw toStoreError(operation, error);
    }
  }
}
