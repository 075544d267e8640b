import type { Tracer } from '@opentelemetry/api';
import type { AnyStorageConfig, RbacStore } from '../storage/types.js';
import type { AnyCacheConfig, PermissionCache } from '../cache/types.js';
import { createRbacStore } from '../storage/index.js';
import { createPermissionCache } from '../cache/index.js';
import { loadConfig, validateConfig, type ConfigManagerOptions } from '../config/manager.js';
import type { RbacConfig, RbacConfigInput } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { initializeTracer } from '../telemetry/index.js';
import { RbacEngine } from './rbac-engine.js';

export interface EngineOverrides {
  /** Use this store instead of building one from `storage` */
  store?: RbacStore;
  /** Use this cache instead of building one from `cache` */
  cache?: PermissionCache;
  logger?: Logger;
  /** Tracer for every span the engine opens; defaults to the global provider's */
  tracer?: Tracer;
  now?: () => Date;
}

export function storageConfigFrom(config: RbacConfig): AnyStorageConfig {
  const { storage } = config;
  if (storage.type === 'memory') {
    return { type: 'memory' };
  }
  return {
    type: 'postgresql',
    connectionString: storage.connectionString,
    host: storage.host,
    port: storage.port,
    database: storage.database,
    user: storage.user,
    password: storage.password,
    schema: storage.schema,
    poolSize: storage.poolSize,
    connectionTimeoutMs: storage.connectionTimeoutMs,
    queryTimeoutMs: storage.queryTimeoutMs,
    ssl: storage.ssl,
    autoMigrate: storage.autoMigrate,
  };
}

export function cacheConfigFrom(config: RbacConfig): AnyCacheConfig {
  const { cache } = config;
  if (cache.type === 'memory') {
    return { type: 'memory', maxSize: cache.maxSize, ttlMs: cache.ttlMs };
  }
  return { type: 'redis', maxSize: cache.maxSize, ttlMs: cache.ttlMs, ...cache.redis };
}

/**
 * Build an engine from configuration. The store is initialized and a Redis
 * cache connected before the engine is returned.
 *
 * @example
 * ```typescript
 * const engine = await createRbacEngine({ hierarchy: { maxDepth: 16 } });
 * const editor = await engine.createRole({ name: 'Editor' });
 * ```
 */
export async function createRbacEngine(
  input: RbacConfigInput = {},
  overrides: EngineOverrides = {},
): Promise<RbacEngine> {
  const config = validateConfig(input);
  const logger = overrides.logger ?? new Logger('rolegraph', config.logging.level);
  if (overrides.tracer) {
    initializeTracer(overrides.tracer);
  }

  const store = overrides.store ?? (await createRbacStore(storageConfigFrom(config)));
  let cache: PermissionCache;
  try {
    cache = overrides.cache ?? (await createPermissionCache(cacheConfigFrom(config)));
  } catch (error) {
    // The store is already open; don't leak its pool
    await store.close();
    throw error;
  }

  logger.info('Engine created', { storage: config.storage.type, cache: config.cache.type });
  return new RbacEngine({
    store,
    cache,
    maxDepth: config.hierarchy.maxDepth,
    lockTimeoutMs: config.locking.timeoutMs,
    deletionPolicy: config.roles.deletionPolicy,
    verifyOnRead: config.cache.verifyOnRead,
    auditDefaultLimit: config.audit.defaultLimit,
    auditMaxLimit: config.audit.maxLimit,
    logger,
    now: overrides.now,
  });
}

/**
 * Load a YAML configuration file (plus ROLEGRAPH_* overrides) and build an
 * engine from it.
 */
export async function createRbacEngineFromConfigFile(
  options: ConfigManagerOptions = {},
  overrides: EngineOverrides = {},
): Promise<RbacEngine> {
  const config = await loadConfig(options);
  return createRbacEngine(config, overrides);
}
