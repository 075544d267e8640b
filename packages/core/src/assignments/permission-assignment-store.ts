/**
 * Permission Assignment Store
 *
 * Owns (role, permission) direct-assignment rows. Grant and revoke are
 * idempotent here; batching and atomicity belong to the mutation coordinator.
 */

import type { Permission } from '../types/rbac.types.js';
import type { RbacReader, RbacSession } from '../storage/types.js';

export class PermissionAssignmentReader {
  constructor(protected readonly reader: RbacReader) {}

  /** Direct permissions of a role, sorted by codename */
  async directPermissions(roleId: string): Promise<Permission[]> {
    return this.reader.directPermissions(roleId);
  }

  async has(roleId: string, permissionId: string): Promise<boolean> {
    const direct = await this.reader.directPermissions(roleId);
    return direct.some((permission) => permission.id === permissionId);
  }
}

export class PermissionAssignmentStore extends PermissionAssignmentReader {
  constructor(private readonly session: RbacSession) {
    super(session);
  }

  /**
   * @returns false when the role already holds the permission
   */
  async grant(roleId: string, permissionId: string): Promise<boolean> {
    return this.session.addAssignment(roleId, permissionId);
  }

  /**
   * @returns false when the role did not hold the permission
   */
  async revoke(roleId: string, permissionId: string): Promise<boolean> {
    return this.session.removeAssignment(roleId, permissionId);
  }
}
