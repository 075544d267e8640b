export { RbacEngine, type RbacEngineConfig, type EngineHealth } from './rbac-engine.js';
export {
  createRbacEngine,
  createRbacEngineFromConfigFile,
  storageConfigFrom,
  cacheConfigFrom,
  type EngineOverrides,
} from './factory.js';
