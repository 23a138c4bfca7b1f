/**
 * @module @plugin-host/plugin-runtime/process/process-plugin
 *
 * Legacy execution strategy: the plugin is an executable spawned as a child
 * process and spoken to over JSON-RPC on its stdin/stdout.
 *
 * The plugin may send the same notifications a sandboxed plugin can. Requests
 * are not supported and are answered with an InvalidRequest error; the
 * connection stays open.
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import {
  createMessageConnection,
  ErrorCodes,
  ResponseError,
  type MessageConnection,
} from 'vscode-jsonrpc/node.js';
import {
  UnsupportedRequestError,
  decodeNotificationParts,
  normalizeError,
  type Dispatcher,
  type JsonValue,
  type PluginDescription,
  type PluginId,
  type PluginNotification,
  type RunningPlugin,
} from '@plugin-host/plugin-contracts';
import { getLogger, type Logger } from '../logging.js';
import { dispatchNotification } from '../dispatch.js';
import { LineMessageReader, LineMessageWriter } from './line-transport.js';

/**
 * The parts of a child process the plugin needs
 */
export interface PluginProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/**
 * Payload of the `initialize` notification sent on activation
 */
export interface InitializeParams {
  plugin_id: PluginId;
  configuration: JsonValue;
}

export interface ProcessPluginOptions {
  logger?: Logger;
}

export class ProcessPlugin implements RunningPlugin {
  readonly kind = 'process';
  private pluginId: PluginId | undefined;
  private readonly connection: MessageConnection;
  private readonly logger: Logger;
  private disposed = false;
  private exited = false;

  constructor(
    readonly description: PluginDescription,
    private readonly dispatcher: Dispatcher,
    private readonly child: PluginProcess,
    options: ProcessPluginOptions = {}
  ) {
    this.logger = (options.logger ?? getLogger('process')).child({ plugin: description.name });

    this.connection = createMessageConnection(
      new LineMessageReader(child.stdout),
      new LineMessageWriter(child.stdin),
      {
        error: (message) => this.logger.error(message),
        warn: (message) => this.logger.warn(message),
        info: (message) => this.logger.info(message),
        log: (message) => this.logger.debug(message),
      }
    );

    this.connection.onNotification((method, params) => this.handleNotification(method, params));
    this.connection.onRequest((method) => {
      const error = new UnsupportedRequestError(method);
      this.logger.warn({ method, code: error.code }, 'Rejecting request from legacy plugin');
      return new ResponseError(ErrorCodes.InvalidRequest, 'invalid request');
    });
    this.connection.onError(([error]) => {
      this.logger.warn({ err: normalizeError(error) }, 'Plugin connection error');
    });

    child.on('error', (error: Error) => {
      this.logger.warn({ err: error }, 'Plugin process error');
    });
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exited = true;
      this.logger.info({ code, signal }, 'Plugin process exited');
      this.connection.dispose();
    });

    this.connection.listen();
  }

  /**
   * Spawn the plugin executable and wait until the OS reports it started.
   */
  static async spawn(
    description: PluginDescription,
    dispatcher: Dispatcher,
    options: ProcessPluginOptions = {}
  ): Promise<ProcessPlugin> {
    const child = spawn(description.execPath, [], {
      cwd: description.dir,
      stdio: ['pipe', 'pipe', 'inherit'],
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(error);
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    return new ProcessPlugin(description, dispatcher, child, options);
  }

  get id(): PluginId | undefined {
    return this.pluginId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Send `initialize` with the assigned id and the manifest configuration.
   */
  activate(id: PluginId): void {
    this.pluginId = id;
    const params: InitializeParams = {
      plugin_id: id,
      configuration: this.description.configuration ?? null,
    };
    this.connection.sendNotification('initialize', params).catch((error: unknown) => {
      this.logger.warn({ err: normalizeError(error) }, 'Failed to send initialize');
    });
    this.logger.info({ pluginId: id, pid: this.child.pid, version: this.description.version }, 'Process plugin started');
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.connection.dispose();
    if (!this.exited) {
      this.child.kill();
    }
  }

  private handleNotification(method: string, params: unknown): void {
    let notification: PluginNotification;
    try {
      notification = decodeNotificationParts(method, params);
    } catch (error) {
      this.logger.debug({ err: normalizeError(error), method }, 'Ignoring undecodable notification');
      return;
    }

    try {
      dispatchNotification(notification, this.dispatcher);
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), method }, 'Notification dispatch failed');
    }
  }
}
