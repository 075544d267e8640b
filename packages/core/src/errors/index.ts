/**
 * RBAC Error Classes
 *
 * Every error carries a stable `code` so callers can tell a rejected
 * mutation apart from a no-op, and a `retryable` flag for the read path.
 */

import type { ZodIssue } from 'zod';

export type RbacErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_NAME'
  | 'INVALID_PARENT'
  | 'CYCLE_DETECTED'
  | 'ROLE_IN_USE'
  | 'VALIDATION_FAILED'
  | 'CONCURRENT_MODIFICATION'
  | 'AUDIT_WRITE_FAILED'
  | 'CACHE_INCONSISTENT'
  | 'STORE_UNAVAILABLE'
  | 'HIERARCHY_DEPTH_EXCEEDED';

export class RbacError extends Error {
  constructor(
    message: string,
    public readonly code: RbacErrorCode,
    public readonly retryable: boolean = false,
    public readonly details: Record<string, unknown> = {},
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RbacError';
    Object.setPrototypeOf(this, RbacError.prototype);
  }
}

export type RbacEntity = 'role' | 'permission' | 'user';

export class NotFoundError extends RbacError {
  constructor(
    public readonly entity: RbacEntity,
    public readonly ids: string[],
  ) {
    super(`Unknown ${entity}${ids.length > 1 ? 's' : ''}: ${ids.join(', ')}`, 'NOT_FOUND', false, { entity, ids });
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class DuplicateNameError extends RbacError {
  constructor(public readonly roleName: string) {
    super(`Role name already in use: ${roleName}`, 'DUPLICATE_NAME', false, { name: roleName });
    this.name = 'DuplicateNameError';
    Object.setPrototypeOf(this, DuplicateNameError.prototype);
  }
}

export class InvalidParentError extends RbacError {
  constructor(public readonly parentId: string) {
    super(`Parent role does not exist: ${parentId}`, 'INVALID_PARENT', false, { parentId });
    this.name = 'InvalidParentError';
    Object.setPrototypeOf(this, InvalidParentError.prototype);
  }
}

export class CycleDetectedError extends RbacError {
  /**
   * @param path - role ids from the moved role up through the proposed
   * parent chain back to the moved role
   */
  constructor(
    public readonly roleId: string,
    public readonly proposedParentId: string,
    public readonly path: string[],
    message?: string,
  ) {
    super(
      message ?? `Setting parent of ${roleId} to ${proposedParentId} creates a cycle: ${path.join(' -> ')}`,
      'CYCLE_DETECTED',
      false,
      { roleId, proposedParentId, path },
    );
    this.name = 'CycleDetectedError';
    Object.setPrototypeOf(this, CycleDetectedError.prototype);
  }
}

export class SelfParentError extends CycleDetectedError {
  constructor(roleId: string) {
    super(roleId, roleId, [roleId, roleId], `Role ${roleId} cannot be its own parent`);
    this.name = 'SelfParentError';
    Object.setPrototypeOf(this, SelfParentError.prototype);
  }
}

export class RoleInUseError extends RbacError {
  constructor(
    public readonly roleId: string,
    public readonly childCount: number,
    public readonly userCount: number,
  ) {
    super(
      `Role ${roleId} is still referenced by ${childCount} child role(s) and ${userCount} user(s)`,
      'ROLE_IN_USE',
      false,
      { roleId, childCount, userCount },
    );
    this.name = 'RoleInUseError';
    Object.setPrototypeOf(this, RoleInUseError.prototype);
  }
}

export class ValidationError extends RbacError {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(message, 'VALIDATION_FAILED', false, {
      issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ConcurrentModificationError extends RbacError {
  constructor(public readonly lockKey: string, public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockKey}`, 'CONCURRENT_MODIFICATION', true, {
      lockKey,
      timeoutMs,
    });
    this.name = 'ConcurrentModificationError';
    Object.setPrototypeOf(this, ConcurrentModificationError.prototype);
  }
}

export class AuditWriteFailedError extends RbacError {
  constructor(roleId: string, permissionId: string, cause?: Error) {
    super(
      `Failed to record audit entry for role ${roleId}, permission ${permissionId}: ${cause?.message ?? 'unknown error'}`,
      'AUDIT_WRITE_FAILED',
      false,
      { roleId, permissionId },
      cause,
    );
    this.name = 'AuditWriteFailedError';
    Object.setPrototypeOf(this, AuditWriteFailedError.prototype);
  }
}

export class CacheInconsistentError extends RbacError {
  constructor(
    public readonly roleId: string,
    public readonly cached: string[],
    public readonly fresh: string[],
  ) {
    super(`Cached permissions for role ${roleId} disagree with the store`, 'CACHE_INCONSISTENT', false, {
      roleId,
      cached,
      fresh,
    });
    this.name = 'CacheInconsistentError';
    Object.setPrototypeOf(this, CacheInconsistentError.prototype);
  }
}

export class StoreUnavailableError extends RbacError {
  constructor(operation: string, cause?: Error) {
    super(`Store unavailable during ${operation}: ${cause?.message ?? 'unknown error'}`, 'STORE_UNAVAILABLE', true, {
      operation,
    }, cause);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

export class HierarchyDepthExceededError extends RbacError {
  constructor(public readonly roleId: string, public readonly maxDepth: number) {
    super(
      `Hierarchy above role ${roleId} is deeper than the configured maximum of ${maxDepth}`,
      'HIERARCHY_DEPTH_EXCEEDED',
      false,
      { roleId, maxDepth },
    );
    this.name = 'HierarchyDepthExceededError';
    Object.setPrototypeOf(this, HierarchyDepthExceededError.prototype);
  }
}

export function isRbacError(error: unknown): error is RbacError {
  return error instanceof RbacError;
}

/**
 * Wrap an unexpected storage failure. Domain errors pass through untouched.
 */
export function toStoreError(operation: string, error: unknown): RbacError {
  if (error instanceof RbacError) {
    return error;
  }
  return new StoreUnavailableError(operation, error instanceof Error ? error : new Error(String(error)));
}
