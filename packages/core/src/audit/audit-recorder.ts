/**
 * Audit Recorder
 *
 * Append-only permission change log with attribution. Entries are written
 * inside the caller's transaction, so an entry exists exactly when the
 * change it describes committed.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AuditChainVerification,
  AuditLogFilter,
  AuditLogOptions,
  AuditLogResult,
  Permission,
  PermissionChangeAction,
  PermissionChangeLogEntry,
  Role,
  RoleParentChangeEntry,
} from '../types/rbac.types.js';
import type { RbacReader, RbacSession } from '../storage/types.js';
import { AuditWriteFailedError } from '../errors/index.js';
import { AuditLogFilterSchema, AuditLogOptionsSchema, parseInput } from '../validation/schemas.js';
import { computeEntryHash, isValidLink } from './hash-chain.js';

export const AUDIT_DEFAULTS = {
  DEFAULT_LIMIT: 10,
  MAX_LIMIT: 100,
  VERIFY_BATCH_SIZE: 500,
} as const;

export interface AuditOptions {
  defaultLimit?: number;
  maxLimit?: number;
}

export class AuditReader {
  protected readonly defaultLimit: number;
  protected readonly maxLimit: number;

  constructor(
    protected readonly reader: RbacReader,
    options: AuditOptions = {},
  ) {
    this.maxLimit = options.maxLimit ?? AUDIT_DEFAULTS.MAX_LIMIT;
    this.defaultLimit = Math.min(options.defaultLimit ?? AUDIT_DEFAULTS.DEFAULT_LIMIT, this.maxLimit);
  }

  /**
   * Query the permission change log. Newest first unless `sortOrder` is
   * `asc`; `limit` is capped at the configured maximum.
   */
  async query(filter: AuditLogFilter = {}, options: AuditLogOptions = {}): Promise<AuditLogResult> {
    const parsedFilter = parseInput(AuditLogFilterSchema, filter, 'audit filter');
    const parsedOptions = parseInput(AuditLogOptionsSchema, options, 'audit options');
    const limit = Math.min(parsedOptions.limit ?? this.defaultLimit, this.maxLimit);

    const { entries, total } = await this.reader.queryPermissionChanges({
      filter: parsedFilter,
      limit,
      offset: parsedOptions.offset,
      sortOrder: parsedOptions.sortOrder,
    });

    return {
      entries,
      total,
      hasMore: parsedOptions.offset + entries.length < total,
    };
  }

  /** Parent moves of a role, oldest first */
  async parentChanges(roleId: string): Promise<RoleParentChangeEntry[]> {
    return this.reader.parentChanges(roleId);
  }

  /**
   * Walk the whole log in sequence order and check every link.
   */
  async verifyChain(): Promise<AuditChainVerification> {
    let previous: PermissionChangeLogEntry | null = null;
    let checked = 0;

    for (;;) {
      const batch = await this.reader.scanPermissionChanges(
        previous?.sequence ?? 0,
        AUDIT_DEFAULTS.VERIFY_BATCH_SIZE,
      );
      if (batch.length === 0) break;

      for (const entry of batch) {
        checked++;
        if (!isValidLink(entry, previous)) {
          return { valid: false, checked, brokenAt: entry.sequence };
        }
        previous = entry;
      }
    }

    return { valid: true, checked };
  }
}

export class AuditRecorder extends AuditReader {
  constructor(
    private readonly session: RbacSession,
    options: AuditOptions = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    super(session, options);
  }

  /**
   * Append one GRANT/REVOKE entry.
   *
   * @throws AuditWriteFailedError if the entry cannot be written; the caller
   * must let it abort the enclosing transaction
   */
  async record(
    role: Role,
    permission: Permission,
    action: PermissionChangeAction,
    actorId: string,
  ): Promise<PermissionChangeLogEntry> {
    try {
      const last = await this.session.lastPermissionChange();
      const unhashed = {
        id: uuidv4(),
        sequence: (last?.sequence ?? 0) + 1,
        roleId: role.id,
        roleName: role.name,
        permissionId: permission.id,
        codename: permission.codename,
        action,
        actorId,
        changedAt: this.now(),
        previousHash: last?.hash ?? null,
      };
      const entry: PermissionChangeLogEntry = { ...unhashed, hash: computeEntryHash(unhashed) };

      await this.session.insertPermissionChange(entry);
      return entry;
    } catch (error) {
      throw new AuditWriteFailedError(role.id, permission.id, error instanceof Error ? error : new Error(String(error)));
    }
  }

  async recordParentChange(
    roleId: string,
    previousParentId: string | null,
    newParentId: string | null,
    actorId: string,
  ): Promise<RoleParentChangeEntry> {
    const last = await this.session.lastParentChange();
    const entry: RoleParentChangeEntry = {
      id: uuidv4(),
      sequence: (last?.sequence ?? 0) + 1,
      roleId,
      previousParentId,
      newParentId,
      actorId,
      changedAt: this.now(),
    };
    await this.session.insertParentChange(entry);
    return entry;
  }
}
