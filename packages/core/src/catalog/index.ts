export { PermissionCatalog, type CatalogSyncResult } from './permission-catalog.js';
