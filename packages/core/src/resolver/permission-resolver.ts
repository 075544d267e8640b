/**
 * Permission Resolver
 *
 * Computes a role's effective permission set: its direct permissions united
 * with those of every ancestor. Reads through the cache coordinator; on a
 * miss it walks upward until a cached ancestor or the root, then computes
 * top-down and hands every visited role's set back to the coordinator, so
 * one resolution warms the whole chain.
 */

import type { EffectivePermissionSet, Permission, Role } from '../types/rbac.types.js';
import type { RbacReader, RbacStore } from '../storage/types.js';
import type { CacheInvalidationCoordinator } from '../cache/invalidation-coordinator.js';
import { HIERARCHY_DEFAULTS } from '../hierarchy/role-hierarchy-store.js';
import {
  CacheInconsistentError,
  HierarchyDepthExceededError,
  NotFoundError,
  toStoreError,
} from '../errors/index.js';
import { Logger } from '../utils/logger.js';
import { withSpan, SPAN_NAMES, roleAttributes } from '../telemetry/index.js';

export interface ResolverOptions {
  maxDepth?: number;
  /** Recompute on every cache hit and compare (diagnostic) */
  verifyOnRead?: boolean;
  now?: () => Date;
}

/**
 * Union of `inherited` and `direct`, unique by codename, sorted by codename.
 */
export function mergePermissions(inherited: Permission[], direct: Permission[]): Permission[] {
  const byCodename = new Map<string, Permission>();
  for (const permission of inherited) byCodename.set(permission.codename, permission);
  for (const permission of direct) byCodename.set(permission.codename, permission);
  return Array.from(byCodename.values()).sort((a, b) => a.codename.localeCompare(b.codename));
}

function codenamesOf(set: EffectivePermissionSet): string[] {
  return set.permissions.map((permission) => permission.codename);
}

function sameCodenames(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((codename, i) => codename === b[i]);
}

export class PermissionResolver {
  private readonly maxDepth: number;
  private readonly verifyOnRead: boolean;
  private readonly now: () => Date;
  private logger: Logger;

  constructor(
    private readonly store: RbacStore,
    private readonly coordinator: CacheInvalidationCoordinator,
    options: ResolverOptions = {},
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.maxDepth = options.maxDepth ?? HIERARCHY_DEFAULTS.MAX_DEPTH;
    this.verifyOnRead = options.verifyOnRead ?? false;
    this.now = options.now ?? (() => new Date());
    this.logger = logger.child({ component: 'resolver' });
  }

  /**
   * @throws NotFoundError for an unknown role
   * @throws HierarchyDepthExceededError when the ancestor chain is too deep
   * @throws StoreUnavailableError when the store fails (retryable)
   */
  async effectivePermissions(roleId: string): Promise<EffectivePermissionSet> {
    return withSpan(
      SPAN_NAMES.RESOLVE,
      async (span) => {
        const readEpoch = this.coordinator.beginRead();
        try {
          const result = await this.store.read((reader) => this.resolve(roleId, reader, readEpoch));
          span.setAttribute('rbac.num_permissions', result.permissions.length);
          return result;
        } catch (error) {
          throw toStoreError('effectivePermissions', error);
        }
      },
      roleAttributes(roleId),
    );
  }

  /**
   * Resolve against an already-open snapshot. Used by the user directory to
   * read the user row and the role chain from the same snapshot.
   */
  async resolve(roleId: string, reader: RbacReader, readEpoch: number): Promise<EffectivePermissionSet> {
    const cached = await this.coordinator.lookup(roleId);
    if (cached) {
      return this.verifyOnRead ? this.verify(cached, reader, readEpoch) : cached;
    }

    const role = await reader.getRole(roleId);
    if (!role) {
      throw new NotFoundError('role', [roleId]);
    }

    // Walk up until a cached ancestor or the root
    const chain: Role[] = [role];
    let inherited: Permission[] = [];
    let current = role;

    while (current.parentId !== null) {
      if (chain.length - 1 >= this.maxDepth) {
        throw new HierarchyDepthExceededError(roleId, this.maxDepth);
      }

      const cachedParent = await this.coordinator.lookup(current.parentId, { notAfter: readEpoch });
      if (cachedParent) {
        inherited = cachedParent.permissions;
        break;
      }

      const parent = await reader.getRole(current.parentId);
      if (!parent) break;

      chain.push(parent);
      current = parent;
    }

    // Compute top-down, memoizing every role on the chain
    let result: EffectivePermissionSet | null = null;
    for (const member of chain.reverse()) {
      const direct = await reader.directPermissions(member.id);
      result = {
        roleId: member.id,
        permissions: mergePermissions(inherited, direct),
        computedAt: this.now(),
      };
      await this.coordinator.populate(member.id, result, readEpoch);
      inherited = result.permissions;
    }

    // chain always holds the requested role
    return result ?? { roleId, permissions: [], computedAt: this.now() };
  }

  /**
   * Recompute from the snapshot without consulting the cache.
   */
  async computeFresh(roleId: string, reader: RbacReader): Promise<EffectivePermissionSet> {
    const role = await reader.getRole(roleId);
    if (!role) {
      throw new NotFoundError('role', [roleId]);
    }

    let permissions = await reader.directPermissions(role.id);
    let parentId = role.parentId;
    let depth = 0;

    while (parentId !== null) {
      if (depth >= this.maxDepth) {
        throw new HierarchyDepthExceededError(roleId, this.maxDepth);
      }
      const parent = await reader.getRole(parentId);
      if (!parent) break;
      permissions = mergePermissions(await reader.directPermissions(parent.id), permissions);
      parentId = parent.parentId;
      depth++;
    }

    return { roleId, permissions: mergePermissions([], permissions), computedAt: this.now() };
  }

  private async verify(
    cached: EffectivePermissionSet,
    reader: RbacReader,
    readEpoch: number,
  ): Promise<EffectivePermissionSet> {
    const fresh = await this.computeFresh(cached.roleId, reader);
    const cachedCodenames = codenamesOf(cached);
    const freshCodenames = codenamesOf(fresh);

    if (sameCodenames(cachedCodenames, freshCodenames)) {
      return cached;
    }

    // A mutation fenced this role after the read began: the difference is a race, not a bug
    if (this.coordinator.changedSince(cached.roleId, readEpoch)) {
      this.logger.debug('Cache differs from snapshot after a concurrent invalidation', { roleId: cached.roleId });
      return fresh;
    }

    this.logger.error('Cached permissions disagree with the store', undefined, {
      roleId: cached.roleId,
      cached: cachedCodenames,
      fresh: freshCodenames,
    });
    throw new CacheInconsistentError(cached.roleId, cachedCodenames, freshCodenames);
  }
}
