/**
 * Configuration Module
 */

export type { RbacConfig, RbacConfigInput } from './types.js';
export { RbacConfigSchema, DEFAULT_CONFIG, ENV_OVERRIDES } from './types.js';
export { ConfigLoadError, ConfigValidationError } from './errors.js';
export { ConfigManager, loadConfig, validateConfig, type ConfigManagerOptions } from './manager.js';
