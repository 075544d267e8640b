/**
 * Role Hierarchy Store
 *
 * Owns roles and their single-parent links. The graph is kept as parent ids
 * plus child-lookup queries; ancestor and descendant closures are computed
 * on demand against whatever session the store is bound to.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Role, CreateRoleInput, RoleQuery, RoleQueryResult, UpdateRoleInput } from '../types/rbac.types.js';
import type { RbacReader, RbacSession } from '../storage/types.js';
import {
  CycleDetectedError,
  DuplicateNameError,
  HierarchyDepthExceededError,
  InvalidParentError,
  NotFoundError,
  SelfParentError,
} from '../errors/index.js';
import {
  CreateRoleInputSchema,
  RoleQuerySchema,
  UpdateRoleInputSchema,
  parseInput,
} from '../validation/schemas.js';

export const HIERARCHY_DEFAULTS = {
  MAX_DEPTH: 32,
} as const;

export interface HierarchyOptions {
  /** Maximum number of ancestors a walk may visit */
  maxDepth?: number;
}

/**
 * Read-side hierarchy queries.
 */
export class RoleHierarchyReader {
  protected readonly maxDepth: number;

  constructor(
    protected readonly reader: RbacReader,
    options: HierarchyOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? HIERARCHY_DEFAULTS.MAX_DEPTH;
  }

  async get(roleId: string): Promise<Role | null> {
    return this.reader.getRole(roleId);
  }

  async getByName(name: string): Promise<Role | null> {
    return this.reader.getRoleByName(name.trim());
  }

  /**
   * @throws NotFoundError if the role does not exist
   */
  async require(roleId: string): Promise<Role> {
    const role = await this.reader.getRole(roleId);
    if (!role) {
      throw new NotFoundError('role', [roleId]);
    }
    return role;
  }

  async list(query: RoleQuery = {}): Promise<RoleQueryResult> {
    const parsed = parseInput(RoleQuerySchema, query, 'role query');
    const { roles, total } = await this.reader.listRoles(parsed);
    return { roles, total, hasMore: parsed.offset + roles.length < total };
  }

  async children(roleId: string): Promise<Role[]> {
    return this.reader.childrenOf(roleId);
  }

  /**
   * Ancestors from the nearest parent to the root.
   *
   * @throws NotFoundError if the role does not exist
   * @throws HierarchyDepthExceededError if the chain is longer than maxDepth
   */
  async ancestors(roleId: string): Promise<Role[]> {
    const role = await this.require(roleId);
    const chain: Role[] = [];
    const seen = new Set<string>([role.id]);

    let parentId = role.parentId;
    while (parentId !== null) {
      if (chain.length >= this.maxDepth) {
        throw new HierarchyDepthExceededError(roleId, this.maxDepth);
      }
      // A parent row may vanish under a concurrent delete; stop at the gap
      const parent = await this.reader.getRole(parentId);
      if (!parent || seen.has(parent.id)) break;

      seen.add(parent.id);
      chain.push(parent);
      parentId = parent.parentId;
    }

    return chain;
  }

  /**
   * All transitive children, breadth-first.
   *
   * @throws NotFoundError if the role does not exist
   */
  async descendants(roleId: string): Promise<Role[]> {
    await this.require(roleId);
    const result: Role[] = [];
    const seen = new Set<string>([roleId]);
    let frontier = [roleId];
    let level = 0;

    while (frontier.length > 0) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const child of await this.reader.childrenOf(id)) {
          if (seen.has(child.id)) continue;
          seen.add(child.id);
          result.push(child);
          next.push(child.id);
        }
      }
      level++;
      // A leaf may sit exactly maxDepth levels below the role
      if (next.length > 0 && level > this.maxDepth) {
        throw new HierarchyDepthExceededError(roleId, this.maxDepth);
      }
      frontier = next;
    }

    return result;
  }

  /**
   * The role itself followed by all of its descendants.
   */
  async closure(roleId: string): Promise<string[]> {
    const descendants = await this.descendants(roleId);
    return [roleId, ...descendants.map((role) => role.id)];
  }
}

/**
 * Hierarchy store bound to a read/write session. Callers hold the hierarchy
 * lock exclusively around `setParent` so the cycle check and the write see
 * the same graph.
 */
export class RoleHierarchyStore extends RoleHierarchyReader {
  constructor(
    private readonly session: RbacSession,
    options: HierarchyOptions = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    super(session, options);
  }

  /**
   * @throws ValidationError on a malformed name
   * @throws DuplicateNameError if the name is taken (case-insensitive)
   * @throws InvalidParentError if the parent does not exist
   */
  async create(input: CreateRoleInput, actorId: string | null = null): Promise<Role> {
    const parsed = parseInput(CreateRoleInputSchema, input, 'role');

    if (await this.session.getRoleByName(parsed.name)) {
      throw new DuplicateNameError(parsed.name);
    }

    const parentId = parsed.parentId ?? null;
    if (parentId !== null) {
      const parent = await this.session.getRole(parentId);
      if (!parent) {
        throw new InvalidParentError(parentId);
      }
      // The new role sits one level below the parent's chain
      const chain = await this.ancestors(parentId);
      if (chain.length + 1 > this.maxDepth) {
        throw new HierarchyDepthExceededError(parentId, this.maxDepth);
      }
    }

    const timestamp = this.now();
    const role: Role = {
      id: uuidv4(),
      name: parsed.name,
      description: parsed.description,
      parentId,
      createdBy: actorId,
      updatedBy: actorId,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.session.insertRole(role);
    return role;
  }

  /**
   * Rename or re-describe a role. Parent links change only through setParent.
   */
  async update(roleId: string, input: UpdateRoleInput, actorId: string | null = null): Promise<Role> {
    const parsed = parseInput(UpdateRoleInputSchema, input, 'role update');
    const role = await this.require(roleId);

    if (parsed.name !== undefined && parsed.name.toLowerCase() !== role.name.toLowerCase()) {
      const clash = await this.session.getRoleByName(parsed.name);
      if (clash && clash.id !== roleId) {
        throw new DuplicateNameError(parsed.name);
      }
    }

    const updated: Role = {
      ...role,
      name: parsed.name ?? role.name,
      description: parsed.description ?? role.description,
      updatedBy: actorId,
      updatedAt: this.now(),
    };
    await this.session.updateRole(updated);
    return updated;
  }

  /**
   * Move a role under a new parent, or make it a root with `null`.
   *
   * Walks upward from the proposed parent; reaching the moved role means the
   * move would close a loop.
   *
   * @returns the role before and after the move; identical when the parent
   * is unchanged
   * @throws SelfParentError if the role is its own proposed parent
   * @throws CycleDetectedError if the proposed parent is a descendant
   * @throws NotFoundError if either role does not exist
   */
  async setParent(
    roleId: string,
    newParentId: string | null,
    actorId: string | null = null,
  ): Promise<{ before: Role; after: Role }> {
    if (newParentId === roleId) {
      throw new SelfParentError(roleId);
    }

    const role = await this.require(roleId);

    if (newParentId !== null) {
      const parent = await this.session.getRole(newParentId);
      if (!parent) {
        throw new NotFoundError('role', [newParentId]);
      }
      await this.assertNoCycle(role, parent);
    }

    if (role.parentId === newParentId) {
      return { before: role, after: role };
    }

    const moved: Role = {
      ...role,
      parentId: newParentId,
      updatedBy: actorId,
      updatedAt: this.now(),
    };
    await this.session.updateRole(moved);
    return { before: role, after: moved };
  }

  /**
   * Re-root every direct child of `roleId`. Returns the detached children.
   */
  async detachChildren(roleId: string, actorId: string | null = null): Promise<Role[]> {
    const detached: Role[] = [];
    for (const child of await this.session.childrenOf(roleId)) {
      const rerooted: Role = { ...child, parentId: null, updatedBy: actorId, updatedAt: this.now() };
      await this.session.updateRole(rerooted);
      detached.push(rerooted);
    }
    return detached;
  }

  async delete(roleId: string): Promise<void> {
    await this.session.deleteRole(roleId);
  }

  private async assertNoCycle(role: Role, proposedParent: Role): Promise<void> {
    // path: the proposed parent's chain up to (and including) the moved role
    const path: string[] = [proposedParent.id];
    let current: Role | null = proposedParent;
    let depth = 0;

    while (current && current.parentId !== null) {
      if (current.parentId === role.id) {
        path.push(role.id);
        throw new CycleDetectedError(role.id, proposedParent.id, [role.id, ...path]);
      }
      if (++depth > this.maxDepth) {
        throw new HierarchyDepthExceededError(proposedParent.id, this.maxDepth);
      }
      path.push(current.parentId);
      current = await this.session.getRole(current.parentId);
    }

    // The moved subtree hangs below the new parent; both chains together must fit
    const subtreeHeight = await this.subtreeHeight(role.id);
    if (depth + 1 + subtreeHeight > this.maxDepth) {
      throw new HierarchyDepthExceededError(role.id, this.maxDepth);
    }
  }

  private async subtreeHeight(roleId: string): Promise<number> {
    let frontier = [roleId];
    let height = 0;
    while (frontier.length > 0) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const child of await this.session.childrenOf(id)) {
          next.push(child.id);
        }
      }
      if (next.length === 0) break;
      height++;
      if (height > this.maxDepth) {
        throw new HierarchyDepthExceededError(roleId, this.maxDepth);
      }
      frontier = next;
    }
    return height;
  }
}
