/**
 * Events emitted by the engine after a mutation commits.
 */

export interface PermissionsChangedEvent {
  roleId: string;
  actorId: string;
  granted: string[];
  revoked: string[];
  /** The role and every descendant whose effective set changed */
  affectedRoleIds: string[];
}

export type HierarchyChangeType = 'created' | 'updated' | 'moved' | 'deleted';

export interface HierarchyChangedEvent {
  type: HierarchyChangeType;
  roleId: string;
  actorId: string | null;
  previousParentId?: string | null;
  newParentId?: string | null;
}

export interface UserRoleChangedEvent {
  userId: string;
  previousRoleId: string | null;
  roleId: string | null;
  actorId: string;
}

export interface CacheInvalidatedEvent {
  roleIds: string[];
}

export interface RbacEvents {
  'permissions:changed': (event: PermissionsChangedEvent) => void;
  'hierarchy:changed': (event: HierarchyChangedEvent) => void;
  'user:role-changed': (event: UserRoleChangedEvent) => void;
  'cache:invalidated': (event: CacheInvalidatedEvent) => void;
}
