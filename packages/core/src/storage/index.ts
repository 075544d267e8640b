/**
 * Storage Layer
 *
 * Provides role, permission and audit persistence with two backends:
 * - Memory: Fast, for development, testing and single-node deployments
 * - PostgreSQL: Durable relational storage
 *
 * Usage:
 * ```typescript
 * import { createRbacStore, MemoryRbacStore } from '@rolegraph/core';
 *
 * // Quick memory store
 * const store = new MemoryRbacStore();
 * await store.initialize();
 *
 * // Or use factory for config-driven setup
 * const store = await createRbacStore({ type: 'postgresql', connectionString: process.env.DATABASE_URL });
 * ```
 */

export type {
  StorageConfig,
  PostgresConfig,
  MemoryConfig,
  AnyStorageConfig,
  RoleListResult,
  PermissionChangeQuery,
  PermissionChangeListResult,
  RbacReader,
  RbacSession,
  RbacStore,
  StoreHealth,
  TransactionOptions,
} from './types.js';

export { MemoryRbacStore, MemorySession, type MemoryState } from './memory-store.js';
export { PostgresRbacStore, PostgresSession } from './postgres-store.js';

import type { AnyStorageConfig, RbacStore } from './types.js';
import { MemoryRbacStore } from './memory-store.js';
import { PostgresRbacStore } from './postgres-store.js';

/**
 * Factory function to create an RBAC store based on configuration.
 *
 * @returns Initialized store
 */
export async function createRbacStore(config: AnyStorageConfig): Promise<RbacStore> {
  const store: RbacStore = config.type === 'postgresql'
    ? new PostgresRbacStore(config)
    : new MemoryRbacStore();

  await store.initialize();
  return store;
}

/**
 * Create an RBAC store from environment variables.
 *
 * Environment variables:
 * - ROLEGRAPH_STORAGE_TYPE: 'memory' | 'postgresql'
 * - ROLEGRAPH_DATABASE_URL, ROLEGRAPH_DATABASE_HOST, etc.
 */
export async function createRbacStoreFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<RbacStore> {
  const type = env.ROLEGRAPH_STORAGE_TYPE || 'memory';

  switch (type) {
    case 'memory':
      return createRbacStore({ type: 'memory' });

    case 'postgresql':
      return createRbacStore({
        type: 'postgresql',
        connectionString: env.ROLEGRAPH_DATABASE_URL,
        host: env.ROLEGRAPH_DATABASE_HOST || 'localhost',
        port: parseInt(env.ROLEGRAPH_DATABASE_PORT || '5432', 10),
        database: env.ROLEGRAPH_DATABASE_NAME || 'rolegraph',
        user: env.ROLEGRAPH_DATABASE_USER || 'postgres',
        password: env.ROLEGRAPH_DATABASE_PASSWORD,
        schema: env.ROLEGRAPH_DATABASE_SCHEMA || 'rbac',
        autoMigrate: env.ROLEGRAPH_DATABASE_MIGRATE !== 'false',
        ssl: env.ROLEGRAPH_DATABASE_SSL === 'true',
        poolSize: parseInt(env.ROLEGRAPH_DATABASE_POOL_SIZE || '10', 10),
      });

    default:
      throw new Error(`Unknown storage type from environment: ${type}`);
  }
}
