/**
 * Permission Catalog
 *
 * Permissions are seeded from the application's list of protectable
 * operations, never created by end users. Syncing is additive: unknown
 * codenames are created, known ones get their descriptive fields refreshed,
 * and nothing is removed.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Permission, PermissionDefinition, PermissionQuery } from '../types/rbac.types.js';
import type { RbacReader, RbacStore } from '../storage/types.js';
import type { CacheInvalidationCoordinator } from '../cache/invalidation-coordinator.js';
import { NotFoundError, toStoreError } from '../errors/index.js';
import { PermissionDefinitionListSchema, parseInput } from '../validation/schemas.js';
import { Logger } from '../utils/logger.js';
import { withSpan, SPAN_NAMES } from '../telemetry/index.js';
import { LOCK_KEYS, type MutationRunner } from '../mutation/mutation-runner.js';

export interface CatalogSyncResult {
  /** Codenames created by this sync */
  created: string[];
  /** Codenames whose name or subsystem changed */
  updated: string[];
  unchanged: number;
}

export class PermissionCatalog {
  private logger: Logger;

  constructor(
    private readonly store: RbacStore,
    private readonly runner: MutationRunner,
    private readonly coordinator: CacheInvalidationCoordinator,
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.logger = logger.child({ component: 'catalog' });
  }

  /**
   * Create or refresh permissions from their definitions.
   *
   * @throws ValidationError on a malformed definition
   */
  async syncPermissions(definitions: PermissionDefinition[]): Promise<CatalogSyncResult> {
    const parsed = parseInput(PermissionDefinitionListSchema, definitions, 'permission catalog');

    return withSpan(SPAN_NAMES.SYNC_PERMISSIONS, async (span) => {
      const result = await this.runner.run(
        'syncPermissions',
        [{ key: LOCK_KEYS.CATALOG, mode: 'exclusive' }],
        async (session) => {
          const outcome: CatalogSyncResult = { created: [], updated: [], unchanged: 0 };
          const seen = new Set<string>();

          for (const definition of parsed) {
            if (seen.has(definition.codename)) continue;
            seen.add(definition.codename);

            const [existing] = await session.getPermissionsByCodename([definition.codename]);
            if (!existing) {
              await session.upsertPermission({ id: uuidv4(), ...definition });
              outcome.created.push(definition.codename);
            } else if (existing.name !== definition.name || existing.subsystem !== definition.subsystem) {
              await session.upsertPermission({ ...existing, name: definition.name, subsystem: definition.subsystem });
              outcome.updated.push(definition.codename);
            } else {
              outcome.unchanged++;
            }
          }

          // Cached sets embed descriptive fields
          const clearAll = outcome.updated.length > 0;
          if (clearAll) {
            await this.coordinator.evictAll();
          }
          return { result: outcome, evicted: [], clearAll };
        },
      );

      span.setAttributes({
        'rbac.num_created': result.created.length,
        'rbac.num_updated': result.updated.length,
      });
      this.logger.info('Permission catalog synced', {
        created: result.created.length,
        updated: result.updated.length,
        unchanged: result.unchanged,
      });
      return result;
    });
  }

  /**
   * @throws NotFoundError for an unknown codename
   */
  async getPermission(codename: string): Promise<Permission> {
    const [permission] = await this.read('getPermission', (reader) => reader.getPermissionsByCodename([codename]));
    if (!permission) {
      throw new NotFoundError('permission', [codename]);
    }
    return permission;
  }

  /** Sorted by subsystem, then codename */
  async listPermissions(query: PermissionQuery = {}): Promise<Permission[]> {
    return this.read('listPermissions', (reader) => reader.listPermissions(query));
  }

  /**
   * All permissions grouped by subsystem, in subsystem order.
   */
  async permissionsBySubsystem(): Promise<Record<string, Permission[]>> {
    const permissions = await this.listPermissions();
    const grouped: Record<string, Permission[]> = {};
    for (const permission of permissions) {
      (grouped[permission.subsystem] ??= []).push(permission);
    }
    return grouped;
  }

  private async read<T>(operation: string, fn: (reader: RbacReader) => Promise<T>): Promise<T> {
    try {
      return await this.store.read(fn);
    } catch (error) {
      throw toStoreError(operation, error);
    }
  }
}
