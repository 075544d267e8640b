/**
 * Standard span names and attributes for RBAC operations
 */

import type { Attributes } from '@opentelemetry/api';

export const SPAN_NAMES = {
  RESOLVE: 'rbac.resolve',
  USER_PERMISSIONS: 'rbac.user_permissions',
  APPLY_BULK: 'rbac.apply_bulk',
  SET_PARENT: 'rbac.set_parent',
  CREATE_ROLE: 'rbac.create_role',
  UPDATE_ROLE: 'rbac.update_role',
  DELETE_ROLE: 'rbac.delete_role',
  ASSIGN_USER_ROLE: 'rbac.assign_user_role',
  SYNC_PERMISSIONS: 'rbac.sync_permissions',
} as const;

/**
 * Attributes:
 * - rbac.role_id
 * - rbac.actor_id (mutations only)
 */
export function roleAttributes(roleId: string, actorId?: string): Attributes {
  return {
    'rbac.role_id': roleId,
    ...(actorId && { 'rbac.actor_id': actorId }),
    'span.kind': 'internal',
  };
}

export function bulkAttributes(roleId: string, actorId: string, grants: number, revokes: number): Attributes {
  return {
    ...roleAttributes(roleId, actorId),
    'rbac.num_grants': grants,
    'rbac.num_revokes': revokes,
  };
}
