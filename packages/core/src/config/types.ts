/**
 * Engine Configuration Types
 *
 * Every field has a default, so an empty file (or no file) yields a working
 * in-memory engine.
 */

import { z } from 'zod';

const PortSchema = z.number().int().min(1).max(65535);

export const StorageConfigSchema = z
  .object({
    type: z.enum(['memory', 'postgresql']).default('memory'),
    connectionString: z.string().optional(),
    host: z.string().optional(),
    port: PortSchema.optional(),
    database: z.string().optional(),
    user: z.string().optional(),
    password: z.string().optional(),
    schema: z.string().regex(/^[a-z_][a-z0-9_]*$/, 'Schema must be a lower-case SQL identifier').optional(),
    poolSize: z.number().int().positive().optional(),
    connectionTimeoutMs: z.number().int().positive().optional(),
    queryTimeoutMs: z.number().int().positive().optional(),
    ssl: z.boolean().optional(),
    autoMigrate: z.boolean().default(true),
  })
  .strict();

export const RedisSettingsSchema = z
  .object({
    url: z.string().optional(),
    host: z.string().optional(),
    port: PortSchema.optional(),
    password: z.string().optional(),
    db: z.number().int().nonnegative().optional(),
    keyPrefix: z.string().optional(),
  })
  .strict();

export const CacheSettingsSchema = z
  .object({
    type: z.enum(['memory', 'redis']).default('memory'),
    maxSize: z.number().int().positive().default(10000),
    ttlMs: z.number().int().nonnegative().default(3600000),
    verifyOnRead: z.boolean().default(false),
    redis: RedisSettingsSchema.optional(),
  })
  .strict();

export const RbacConfigSchema = z
  .object({
    storage: StorageConfigSchema.default({}),
    cache: CacheSettingsSchema.default({}),
    hierarchy: z
      .object({
        maxDepth: z.number().int().min(1).max(1000).default(32),
      })
      .strict()
      .default({}),
    locking: z
      .object({
        timeoutMs: z.number().int().positive().default(5000),
      })
      .strict()
      .default({}),
    roles: z
      .object({
        deletionPolicy: z.enum(['restrict', 'orphan']).default('restrict'),
      })
      .strict()
      .default({}),
    audit: z
      .object({
        defaultLimit: z.number().int().positive().default(10),
        maxLimit: z.number().int().positive().default(100),
      })
      .strict()
      .refine((audit) => audit.defaultLimit <= audit.maxLimit, {
        message: 'defaultLimit must not exceed maxLimit',
        path: ['defaultLimit'],
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RbacConfig = z.output<typeof RbacConfigSchema>;
export type RbacConfigInput = z.input<typeof RbacConfigSchema>;

export const DEFAULT_CONFIG: RbacConfig = RbacConfigSchema.parse({});

/**
 * Environment variables applied on top of the file, as dotted config paths.
 */
export const ENV_OVERRIDES: Record<string, string> = {
  ROLEGRAPH_STORAGE_TYPE: 'storage.type',
  ROLEGRAPH_DATABASE_URL: 'storage.connectionString',
  ROLEGRAPH_DATABASE_SCHEMA: 'storage.schema',
  ROLEGRAPH_DATABASE_POOL_SIZE: 'storage.poolSize',
  ROLEGRAPH_CACHE_TYPE: 'cache.type',
  ROLEGRAPH_CACHE_MAX_SIZE: 'cache.maxSize',
  ROLEGRAPH_CACHE_TTL_MS: 'cache.ttlMs',
  ROLEGRAPH_CACHE_VERIFY_ON_READ: 'cache.verifyOnRead',
  ROLEGRAPH_REDIS_URL: 'cache.redis.url',
  ROLEGRAPH_HIERARCHY_MAX_DEPTH: 'hierarchy.maxDepth',
  ROLEGRAPH_LOCK_TIMEOUT_MS: 'locking.timeoutMs',
  ROLEGRAPH_ROLE_DELETION_POLICY: 'roles.deletionPolicy',
  ROLEGRAPH_LOG_LEVEL: 'logging.level',
};
