/**
 * @module @plugin-host/plugin-catalog/catalog
 *
 * The plugin registry: discovers manifests under the plugins root, starts
 * every described plugin with the execution strategy its module calls for
 * and owns the running instances.
 *
 * Failures are isolated. A bad manifest skips that plugin at load; a failed
 * start skips that plugin and leaves the others running.
 *
 * @example
 * ```typescript
 * const catalog = new PluginCatalog();
 * await catalog.load();
 * await catalog.startAll(dispatcher);
 *
 * // later
 * await catalog.reload();
 * await catalog.startAll(dispatcher);
 * ```
 */

import {
  normalizeError,
  type Dispatcher,
  type PluginDescription,
  type PluginId,
  type PluginKind,
  type PluginName,
  type RunningPlugin,
} from '@plugin-host/plugin-contracts';
import { findAllManifests, loadManifest } from '@plugin-host/plugin-manifest';
import {
  ProcessPlugin,
  SandboxEngine,
  detectPluginKind,
  getLogger,
  type Logger,
  type ProcessPluginOptions,
} from '@plugin-host/plugin-runtime';
import { resolveCatalogConfig, type CatalogConfig, type CatalogConfigOptions } from './config.js';
import { defaultPluginIds, type PluginIdCounter } from './ids.js';

/**
 * Starts a legacy (non-WebAssembly) plugin
 */
export type ProcessLauncher = (
  description: PluginDescription,
  dispatcher: Dispatcher,
  options: ProcessPluginOptions
) => Promise<RunningPlugin>;

export interface PluginCatalogOptions extends CatalogConfigOptions {
  /**
   * Engine for WebAssembly plugins.
   * Default: one engine per catalog, namespaced by the app name
   */
  engine?: SandboxEngine;

  /**
   * Default: spawn the executable as a child process
   */
  launchProcess?: ProcessLauncher;

  /**
   * Id source.
   * Default: the process-wide counter
   */
  ids?: PluginIdCounter;

  logger?: Logger;

  /** Environment read for configuration (default: `process.env`) */
  env?: NodeJS.ProcessEnv;
}

export class PluginCatalog {
  readonly config: CatalogConfig;
  private readonly items = new Map<PluginName, PluginDescription>();
  private readonly running = new Map<PluginId, RunningPlugin>();
  private readonly engine: SandboxEngine;
  private readonly launchProcess: ProcessLauncher;
  private readonly ids: PluginIdCounter;
  private readonly logger: Logger;

  /**
   * @throws ConfigError when the configuration is invalid
   */
  constructor(options: PluginCatalogOptions = {}) {
    this.config = resolveCatalogConfig(options, options.env);
    const level = this.config.logLevel;
    this.logger = options.logger ?? getLogger('catalog', { level });
    this.engine =
      options.engine ??
      new SandboxEngine({
        hostNamespace: this.config.appName,
        programName: this.config.appName,
        logger: getLogger('sandbox', { level }),
      });
    this.launchProcess = options.launchProcess ?? ((description, dispatcher, processOptions) =>
      ProcessPlugin.spawn(description, dispatcher, processOptions));
    this.ids = options.ids ?? defaultPluginIds;
  }

  /** Loaded descriptions by plugin name */
  get descriptions(): ReadonlyMap<PluginName, PluginDescription> {
    return this.items;
  }

  /** Running instances by id */
  get plugins(): ReadonlyMap<PluginId, RunningPlugin> {
    return this.running;
  }

  get(name: PluginName): PluginDescription | undefined {
    return this.items.get(name);
  }

  /**
   * Discover and load every manifest under the plugins root. A manifest that
   * fails to load is logged and skipped. A later manifest with the same
   * plugin name replaces an earlier one.
   */
  async load(): Promise<void> {
    const manifests = await findAllManifests(this.config.pluginsDir);
    this.logger.debug({ pluginsDir: this.config.pluginsDir, manifests }, 'Discovered plugin manifests');

    for (const manifestPath of manifests) {
      try {
        const description = await loadManifest(manifestPath);
        if (this.items.has(description.name)) {
          this.logger.warn({ plugin: description.name, manifestPath }, 'Duplicate plugin name, replacing earlier manifest');
        }
        this.items.set(description.name, description);
      } catch (error) {
        const err = normalizeError(error);
        this.logger.warn({ manifestPath, err }, 'Failed to load plugin manifest');
      }
    }

    this.logger.info({ pluginsDir: this.config.pluginsDir, count: this.items.size }, 'Plugin manifests loaded');
  }

  /**
   * Drop every running instance, description and compiled module, then load
   * again.
   */
  async reload(): Promise<void> {
    this.logger.info({ pluginsDir: this.config.pluginsDir }, 'Reloading plugins');
    this.shutdown();
    this.items.clear();
    this.engine.clear();
    await this.load();
  }

  /**
   * Start every loaded plugin, one after another. Each started instance gets
   * a fresh id and is activated with it; a plugin that fails to start is
   * logged and skipped.
   *
   * @returns the instances started by this call
   */
  async startAll(dispatcher: Dispatcher): Promise<RunningPlugin[]> {
    const started: RunningPlugin[] = [];

    for (const description of [...this.items.values()]) {
      const logger = this.logger.child({ plugin: description.name });
      let plugin: RunningPlugin;
      try {
        plugin = await this.startPlugin(description, dispatcher, logger);
      } catch (error) {
        const err = normalizeError(error);
        logger.warn({ err, execPath: description.execPath }, 'Failed to start plugin');
        continue;
      }

      const id = this.nextPluginId();
      this.running.set(id, plugin);
      plugin.activate(id);
      started.push(plugin);
    }

    return started;
  }

  nextPluginId(): PluginId {
    return this.ids.next();
  }

  /**
   * Dispose every running instance. Descriptions are kept.
   */
  shutdown(): void {
    for (const [id, plugin] of this.running) {
      try {
        plugin.dispose();
      } catch (error) {
        this.logger.warn({ pluginId: id, plugin: plugin.description.name, err: normalizeError(error) }, 'Failed to dispose plugin');
      }
    }
    this.running.clear();
  }

  private async startPlugin(
    description: PluginDescription,
    dispatcher: Dispatcher,
    logger: Logger
  ): Promise<RunningPlugin> {
    const kind: PluginKind = await detectPluginKind(description.execPath);
    logger.debug({ kind, execPath: description.execPath }, 'Starting plugin');

    switch (kind) {
      case 'sandbox':
        return this.engine.start(description, dispatcher);
      case 'process':
        return this.launchProcess(description, dispatcher, { logger: this.logger });
    }
  }
}
