/**
 * Mutation Coordinator
 *
 * Every change to roles, their parent links or their direct permissions goes
 * through here. Each operation follows the same shape:
 *
 *   lock → transaction { validate; apply; audit; evict closure } → commit
 *        → fence + evict closure → unlock
 *
 * Any failure before commit discards the whole operation, audit entries
 * included.
 */

import { EventEmitter } from 'eventemitter3';
import type {
  BulkMutationSummary,
  CreateRoleInput,
  DeleteRoleSummary,
  Permission,
  Role,
  RoleDeletionPolicy,
  UpdateRoleInput,
  User,
} from '../types/rbac.types.js';
import type { RbacEvents } from '../types/events.types.js';
import type { RbacSession } from '../storage/types.js';
import type { CacheInvalidationCoordinator } from '../cache/invalidation-coordinator.js';
import { RoleHierarchyStore, type HierarchyOptions } from '../hierarchy/role-hierarchy-store.js';
import { PermissionAssignmentStore } from '../assignments/permission-assignment-store.js';
import { AuditRecorder, type AuditOptions } from '../audit/audit-recorder.js';
import { NotFoundError, RoleInUseError } from '../errors/index.js';
import { BulkPermissionChangeSchema, parseInput } from '../validation/schemas.js';
import { Logger } from '../utils/logger.js';
import { withSpan, SPAN_NAMES, roleAttributes, bulkAttributes } from '../telemetry/index.js';
import { LOCK_KEYS, MutationRunner } from './mutation-runner.js';

export interface MutationOptions {
  hierarchy?: HierarchyOptions;
  audit?: AuditOptions;
  deletionPolicy?: RoleDeletionPolicy;
  now?: () => Date;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export class MutationCoordinator {
  private readonly deletionPolicy: RoleDeletionPolicy;
  private readonly now: () => Date;
  private logger: Logger;

  constructor(
    private readonly runner: MutationRunner,
    private readonly coordinator: CacheInvalidationCoordinator,
    private readonly events: EventEmitter<RbacEvents> = new EventEmitter<RbacEvents>(),
    private readonly options: MutationOptions = {},
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.deletionPolicy = options.deletionPolicy ?? 'restrict';
    this.now = options.now ?? (() => new Date());
    this.logger = logger.child({ component: 'mutation-coordinator' });
  }

  // ===========================================================================
  // Permission assignments
  // ===========================================================================

  /**
   * Grant and revoke permissions on one role atomically.
   *
   * @throws ValidationError on an empty request or a codename in both lists
   * @throws NotFoundError for an unknown role, or naming every unknown codename
   * @throws AuditWriteFailedError if an audit entry cannot be written
   */
  async applyBulk(
    roleId: string,
    grants: string[],
    revokes: string[],
    actorId: string,
  ): Promise<BulkMutationSummary> {
    const request = parseInput(
      BulkPermissionChangeSchema,
      { roleId, grants, revokes, actorId },
      'bulk permission change',
    );
    const grantCodenames = unique(request.grants);
    const revokeCodenames = unique(request.revokes);

    return withSpan(
      SPAN_NAMES.APPLY_BULK,
      async () => {
        const summary = await this.runner.run(
          'applyBulk',
          [
            { key: LOCK_KEYS.HIERARCHY, mode: 'shared' },
            { key: LOCK_KEYS.role(request.roleId), mode: 'exclusive' },
          ],
          async (session) => {
            const role = await this.requireRole(session, request.roleId);
            const byCodename = await this.requirePermissions(session, [...grantCodenames, ...revokeCodenames]);

            const assignments = new PermissionAssignmentStore(session);
            const audit = this.auditFor(session);
            const result: BulkMutationSummary = { roleId: role.id, granted: [], revoked: [], noOps: [] };

            for (const codename of grantCodenames) {
              const permission = this.pick(byCodename, codename);
              if (await assignments.grant(role.id, permission.id)) {
                await audit.record(role, permission, 'GRANT', request.actorId);
                result.granted.push(codename);
              } else {
                result.noOps.push(codename);
              }
            }

            for (const codename of revokeCodenames) {
              const permission = this.pick(byCodename, codename);
              if (await assignments.revoke(role.id, permission.id)) {
                await audit.record(role, permission, 'REVOKE', request.actorId);
                result.revoked.push(codename);
              } else {
                result.noOps.push(codename);
              }
            }

            const changed = result.granted.length + result.revoked.length > 0;
            const evicted = changed ? await this.coordinator.invalidate(role.id, session) : [];
            return { result: { summary: result, affected: evicted }, evicted };
          },
        );

        this.logger.info('Permissions updated', {
          roleId: request.roleId,
          actorId: request.actorId,
          granted: summary.summary.granted.length,
          revoked: summary.summary.revoked.length,
          noOps: summary.summary.noOps.length,
        });

        if (summary.affected.length > 0) {
          this.events.emit('permissions:changed', {
            roleId: request.roleId,
            actorId: request.actorId,
            granted: summary.summary.granted,
            revoked: summary.summary.revoked,
            affectedRoleIds: summary.affected,
          });
        }

        return summary.summary;
      },
      bulkAttributes(request.roleId, request.actorId, grantCodenames.length, revokeCodenames.length),
    );
  }

  // ===========================================================================
  // Hierarchy
  // ===========================================================================

  /**
   * Move a role under `newParentId`, or to the root with `null`.
   *
   * @throws CycleDetectedError (or SelfParentError) if the move closes a loop
   * @throws NotFoundError if either role does not exist
   */
  async setParent(roleId: string, newParentId: string | null, actorId: string): Promise<Role> {
    return withSpan(
      SPAN_NAMES.SET_PARENT,
      async () => {
        const { role, previousParentId } = await this.runner.run(
          'setParent',
          [{ key: LOCK_KEYS.HIERARCHY, mode: 'exclusive' }],
          async (session) => {
            const hierarchy = this.hierarchyFor(session);
            const { before, after } = await hierarchy.setParent(roleId, newParentId, actorId);

            if (before.parentId === after.parentId) {
              return { result: { role: after, previousParentId: before.parentId }, evicted: [] };
            }

            await this.auditFor(session).recordParentChange(roleId, before.parentId, after.parentId, actorId);
            const evicted = await this.coordinator.invalidate(roleId, session);
            return { result: { role: after, previousParentId: before.parentId }, evicted };
          },
        );

        if (previousParentId !== role.parentId) {
          this.logger.info('Role moved', { roleId, previousParentId, newParentId: role.parentId, actorId });
          this.events.emit('hierarchy:changed', {
            type: 'moved',
            roleId,
            actorId,
            previousParentId,
            newParentId: role.parentId,
          });
        }

        return role;
      },
      roleAttributes(roleId, actorId),
    );
  }

  /**
   * @throws DuplicateNameError, InvalidParentError, ValidationError
   */
  async createRole(input: CreateRoleInput, actorId: string | null = null): Promise<Role> {
    return withSpan(SPAN_NAMES.CREATE_ROLE, async () => {
      const role = await this.runner.run(
        'createRole',
        [
          { key: LOCK_KEYS.HIERARCHY, mode: 'shared' },
          { key: LOCK_KEYS.ROLE_NAMES, mode: 'exclusive' },
        ],
        async (session) => ({ result: await this.hierarchyFor(session).create(input, actorId), evicted: [] }),
      );

      this.logger.info('Role created', { roleId: role.id, name: role.name, parentId: role.parentId, actorId });
      this.events.emit('hierarchy:changed', {
        type: 'created',
        roleId: role.id,
        actorId,
        newParentId: role.parentId,
      });
      return role;
    });
  }

  /**
   * Rename or re-describe a role. Effective sets carry no role fields, so no
   * cache entry changes.
   */
  async updateRole(roleId: string, input: UpdateRoleInput, actorId: string | null = null): Promise<Role> {
    return withSpan(
      SPAN_NAMES.UPDATE_ROLE,
      async () => {
        const role = await this.runner.run(
          'updateRole',
          [
            { key: LOCK_KEYS.HIERARCHY, mode: 'shared' },
            { key: LOCK_KEYS.ROLE_NAMES, mode: 'exclusive' },
          ],
          async (session) => ({
            result: await this.hierarchyFor(session).update(roleId, input, actorId),
            evicted: [],
          }),
        );

        this.logger.info('Role updated', { roleId, actorId });
        this.events.emit('hierarchy:changed', { type: 'updated', roleId, actorId });
        return role;
      },
      roleAttributes(roleId, actorId ?? undefined),
    );
  }

  /**
   * Delete a role according to the configured policy.
   *
   * - `restrict`: fails with RoleInUseError while children or users reference it
   * - `orphan`: re-roots children and unassigns users first
   *
   * Direct permissions are revoked (and audited) before the row is removed.
   * Audit history of the role is kept.
   */
  async deleteRole(roleId: string, actorId: string): Promise<DeleteRoleSummary> {
    return withSpan(
      SPAN_NAMES.DELETE_ROLE,
      async () => {
        const summary = await this.runner.run(
          'deleteRole',
          [{ key: LOCK_KEYS.HIERARCHY, mode: 'exclusive' }],
          async (session) => {
            const hierarchy = this.hierarchyFor(session);
            const role = await hierarchy.require(roleId);
            const children = await session.childrenOf(roleId);
            const users = await session.usersWithRole(roleId);

            if (this.deletionPolicy === 'restrict' && (children.length > 0 || users.length > 0)) {
              throw new RoleInUseError(roleId, children.length, users.length);
            }

            // Closure must be taken before children are detached
            const evicted = await this.coordinator.invalidate(roleId, session);
            const audit = this.auditFor(session);

            const detached = await hierarchy.detachChildren(roleId, actorId);
            for (const child of detached) {
              await audit.recordParentChange(child.id, roleId, null, actorId);
            }

            for (const user of users) {
              await session.upsertUser({ ...user, roleId: null, updatedAt: this.now() });
            }

            const assignments = new PermissionAssignmentStore(session);
            const revoked: string[] = [];
            for (const permission of await assignments.directPermissions(roleId)) {
              if (await assignments.revoke(roleId, permission.id)) {
                await audit.record(role, permission, 'REVOKE', actorId);
                revoked.push(permission.codename);
              }
            }

            await hierarchy.delete(roleId);

            const result: DeleteRoleSummary = {
              roleId,
              detachedChildren: detached.map((child) => child.id),
              unassignedUsers: users.map((user) => user.id),
              revoked,
            };
            return { result, evicted };
          },
        );

        this.logger.info('Role deleted', {
          roleId,
          actorId,
          policy: this.deletionPolicy,
          detachedChildren: summary.detachedChildren.length,
          unassignedUsers: summary.unassignedUsers.length,
        });
        this.events.emit('hierarchy:changed', { type: 'deleted', roleId, actorId });
        for (const userId of summary.unassignedUsers) {
          this.events.emit('user:role-changed', { userId, previousRoleId: roleId, roleId: null, actorId });
        }
        return summary;
      },
      roleAttributes(roleId, actorId),
    );
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  /**
   * Give a user a role, or clear it with `null`.
   *
   * @throws NotFoundError for an unknown user or role
   */
  async assignUserRole(userId: string, roleId: string | null, actorId: string): Promise<User> {
    return withSpan(SPAN_NAMES.ASSIGN_USER_ROLE, async () => {
      const { user, previousRoleId } = await this.runner.run(
        'assignUserRole',
        [
          { key: LOCK_KEYS.HIERARCHY, mode: 'shared' },
          { key: LOCK_KEYS.user(userId), mode: 'exclusive' },
        ],
        async (session) => {
          const existing = await session.getUser(userId);
          if (!existing) {
            throw new NotFoundError('user', [userId]);
          }
          if (roleId !== null) {
            await this.requireRole(session, roleId);
          }
          if (existing.roleId === roleId) {
            return { result: { user: existing, previousRoleId: existing.roleId }, evicted: [] };
          }

          const updated: User = { ...existing, roleId, updatedAt: this.now() };
          await session.upsertUser(updated);
          return { result: { user: updated, previousRoleId: existing.roleId }, evicted: [] };
        },
      );

      if (previousRoleId !== roleId) {
        this.logger.info('User role changed', { userId, previousRoleId, roleId, actorId });
        this.events.emit('user:role-changed', { userId, previousRoleId, roleId, actorId });
      }
      return user;
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private hierarchyFor(session: RbacSession): RoleHierarchyStore {
    return new RoleHierarchyStore(session, this.options.hierarchy, this.now);
  }

  private auditFor(session: RbacSession): AuditRecorder {
    return new AuditRecorder(session, this.options.audit, this.now);
  }

  private async requireRole(session: RbacSession, roleId: string): Promise<Role> {
    const role = await session.getRole(roleId);
    if (!role) {
      throw new NotFoundError('role', [roleId]);
    }
    return role;
  }

  /**
   * Look up every codename, failing with one error that names all unknown ones.
   */
  private async requirePermissions(session: RbacSession, codenames: string[]): Promise<Map<string, Permission>> {
    const found = await session.getPermissionsByCodename(codenames);
    const byCodename = new Map(found.map((permission) => [permission.codename, permission]));
    const missing = unique(codenames).filter((codename) => !byCodename.has(codename));
    if (missing.length > 0) {
      throw new NotFoundError('permission', missing);
    }
    return byCodename;
  }

  private pick(byCodename: Map<string, Permission>, codename: string): Permission {
    const permission = byCodename.get(codename);
    if (!permission) {
      throw new NotFoundError('permission', [codename]);
    }
    return permission;
  }
}
