/**
 * @module @plugin-host/plugin-catalog
 *
 * Plugin discovery and lifecycle.
 */

export { PluginCatalog } from './catalog.js';
export type { PluginCatalogOptions, ProcessLauncher } from './catalog.js';
export { PluginIdCounter, defaultPluginIds } from './ids.js';
export { resolveCatalogConfig, DEFAULT_APP_NAME } from './config.js';
export type { CatalogConfig, CatalogConfigOptions } from './config.js';
