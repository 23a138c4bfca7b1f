/**
 * @module @plugin-host/plugin-runtime
 *
 * Execution strategies for plugins.
 *
 * - Sandbox: WebAssembly module with WASI stdin/stdout pipes and host functions
 * - Process: legacy executable over newline-delimited JSON-RPC
 *
 * @example
 * ```typescript
 * import { SandboxEngine } from '@plugin-host/plugin-runtime';
 *
 * const engine = new SandboxEngine();
 * const plugin = await engine.start(description, dispatcher);
 * plugin.activate(catalog.nextPluginId());
 * ```
 */

export { getLogger, isLogLevel, LOG_LEVELS } from './logging.js';
export type { Logger, LevelWithSilent } from './logging.js';

export { dispatchNotification } from './dispatch.js';
export { detectPluginKind, WASM_MAGIC } from './detect.js';

export * from './sandbox/index.js';
export * from './process/index.js';
