/**
 * @module @plugin-host/plugin-testing
 * Testing utilities for the plugin host
 */

export { buildGuestModule, buildCorruptModule, notificationLine } from './guest-module.js';
export type { GuestStep, GuestModuleOptions } from './guest-module.js';
export { PluginsRootFixture } from './plugins-root.js';
export type { TestPluginSpec } from './plugins-root.js';
