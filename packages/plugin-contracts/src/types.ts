/**
 * @module @plugin-host/plugin-contracts/types
 * Core plugin host types shared by the manifest loader, runtime and catalog
 */

import type { JsonValue } from './json.js';

/**
 * Plugin name as declared in its manifest (unique within a catalog)
 */
export type PluginName = string;

/**
 * Process-wide unique identifier, minted by the catalog when a plugin starts.
 * Identifiers start at 1 and only ever increase.
 */
export type PluginId = number;

/**
 * Manifest-derived description of a plugin.
 *
 * `execPath` and `dir` are absolute, canonical and known to exist at the
 * time the manifest was loaded.
 */
export interface PluginDescription {
  readonly name: PluginName;
  /** Free-form, informational only */
  readonly version: string;
  readonly execPath: string;
  readonly dir: string;
  /** Passed to the plugin on initialization */
  readonly configuration?: JsonValue;
}

/**
 * How a plugin is executed
 * - sandbox: WebAssembly module instantiated in-process behind WASI
 * - process: legacy executable spawned as a child process, spoken to over JSON-RPC
 */
export type PluginKind = 'sandbox' | 'process';

/**
 * A started plugin, owned exclusively by the catalog.
 */
export interface RunningPlugin {
  readonly kind: PluginKind;
  readonly description: PluginDescription;
  /** Assigned by {@link RunningPlugin.activate}; undefined before that */
  readonly id: PluginId | undefined;

  /**
   * Bind the freshly minted id to this instance. Legacy processes receive
   * their `initialize` notification here.
   */
  activate(id: PluginId): void;

  /**
   * Tear the instance down. Safe to call more than once.
   */
  dispose(): void;
}
