/**
 * Hash chain over permission change log entries.
 *
 * Each entry's hash covers its own fields and the previous entry's hash, so
 * editing, removing or reordering any committed row breaks verification from
 * that row onward.
 */

import { createHash } from 'crypto';
import type { PermissionChangeLogEntry } from '../types/rbac.types.js';

export type UnhashedEntry = Omit<PermissionChangeLogEntry, 'hash'>;

export function computeEntryHash(entry: UnhashedEntry): string {
  const payload = JSON.stringify([
    entry.sequence,
    entry.id,
    entry.roleId,
    entry.roleName,
    entry.permissionId,
    entry.codename,
    entry.action,
    entry.actorId,
    entry.changedAt.toISOString(),
    entry.previousHash,
  ]);
  return createHash('sha256').update(payload).digest('hex');
}

/**
 * Check one link. `previous` is null for the first entry in the log.
 */
export function isValidLink(entry: PermissionChangeLogEntry, previous: PermissionChangeLogEntry | null): boolean {
  const expectedSequence = previous ? previous.sequence + 1 : 1;
  const expectedPreviousHash = previous ? previous.hash : null;

  return (
    entry.sequence === expectedSequence &&
    entry.previousHash === expectedPreviousHash &&
    entry.hash === computeEntryHash(entry)
  );
}
