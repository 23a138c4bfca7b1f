/**
 * @module @plugin-host/plugin-runtime/sandbox/sandbox-plugin
 * A started WebAssembly plugin
 */

import type { PluginDescription, PluginId, RunningPlugin } from '@plugin-host/plugin-contracts';
import type { SandboxEnv } from './host-bridge.js';

export class SandboxPlugin implements RunningPlugin {
  readonly kind = 'sandbox';
  private pluginId: PluginId | undefined;
  private disposed = false;

  constructor(
    readonly description: PluginDescription,
    readonly instance: WebAssembly.Instance,
    readonly env: SandboxEnv
  ) {}

  get id(): PluginId | undefined {
    return this.pluginId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  activate(id: PluginId): void {
    this.pluginId = id;
    this.env.logger.info({ pluginId: id, version: this.description.version }, 'Sandboxed plugin started');
  }

  /**
   * Releases the pipe pair. The module instance is left to the garbage
   * collector; any later host call from it finds closed pipes and is dropped.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.env.io.dispose();
  }
}
