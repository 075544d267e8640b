// Types
export * from './types/rbac.types.js';
export * from './types/events.types.js';

// Errors
export * from './errors/index.js';

// Input validation
export * from './validation/schemas.js';

// Engine facade
export * from './engine/index.js';

// Hierarchy, assignments and resolution
export * from './hierarchy/role-hierarchy-store.js';
export * from './assignments/permission-assignment-store.js';
export * from './resolver/permission-resolver.js';

// Mutations
export * from './locking/keyed-lock.js';
export * from './mutation/mutation-runner.js';
export * from './mutation/mutation-coordinator.js';

// Catalog and users
export * from './catalog/index.js';
export * from './users/user-directory.js';

// Audit trail
export * from './audit/index.js';

// Permission cache
export * from './cache/index.js';

// Storage
export * from './storage/index.js';

// Configuration
export * from './config/index.js';

// OpenTelemetry tracing
export * from './telemetry/index.js';

// Logging
export { Logger, logger, type LogLevel } from './utils/logger.js';
