/**
 * @module @plugin-host/plugin-runtime/sandbox/engine
 *
 * Runs plugins compiled to WebAssembly (WASI preview1) inside the host
 * process.
 *
 * ## Startup
 *
 * 1. Compile the module (cached per canonical path until cleared)
 * 2. Create the pipe pair standing in for stdin/stdout and a WASI context on it
 * 3. Build the SandboxEnv (pipes + channel + shared dispatcher)
 * 4. Chain the host functions (host namespace) with the WASI imports
 * 5. Instantiate and bind WASI to the instance memory
 * 6. Write the configuration to stdin, call the `initialize` export
 *
 * A failure at any step is a SandboxError for this plugin only.
 */

import { readFile } from 'node:fs/promises';
import { WASI } from 'node:wasi';
import {
  SandboxError,
  normalizeError,
  type Dispatcher,
  type PluginDescription,
  type SandboxStage,
} from '@plugin-host/plugin-contracts';
import { getLogger, type Logger } from '../logging.js';
import { ObjectChannel } from './channel.js';
import { createHostImports, type SandboxEnv } from './host-bridge.js';
import { PipePair } from './pipe.js';
import { SandboxPlugin } from './sandbox-plugin.js';

export const DEFAULT_HOST_NAMESPACE = 'lapce';

export const INITIALIZE_EXPORT = 'initialize';

export interface SandboxEngineOptions {
  /**
   * Import namespace the host functions are exposed under.
   * Default: 'lapce'
   */
  hostNamespace?: string;

  /**
   * argv[0] seen by the guest.
   * Default: same as hostNamespace
   */
  programName?: string;

  /**
   * Guest stderr file descriptor.
   * Default: the host's stderr
   */
  stderrFd?: number;

  logger?: Logger;
}

export class SandboxEngine {
  readonly hostNamespace: string;
  private readonly programName: string;
  private readonly stderrFd: number;
  private readonly logger: Logger;
  private readonly modules = new Map<string, WebAssembly.Module>();

  constructor(options: SandboxEngineOptions = {}) {
    this.hostNamespace = options.hostNamespace ?? DEFAULT_HOST_NAMESPACE;
    this.programName = options.programName ?? this.hostNamespace;
    this.stderrFd = options.stderrFd ?? process.stderr.fd;
    this.logger = options.logger ?? getLogger('sandbox');
  }

  /**
   * Compile a plugin module. Modules are immutable once compiled and shared
   * by every instantiation from the same path until {@link clear}.
   */
  async compile(description: PluginDescription): Promise<WebAssembly.Module> {
    const cached = this.modules.get(description.execPath);
    if (cached) {
      return cached;
    }
    try {
      const bytes = await readFile(description.execPath);
      const module = await WebAssembly.compile(bytes);
      this.modules.set(description.execPath, module);
      return module;
    } catch (error) {
      throw stageError(description, 'compile', error);
    }
  }

  /**
   * Forget compiled modules so the next start reads each file again.
   */
  clear(): void {
    this.modules.clear();
  }

  /**
   * Start one plugin in a fresh sandbox.
   *
   * @throws SandboxError naming the failed stage
   */
  async start(description: PluginDescription, dispatcher: Dispatcher): Promise<SandboxPlugin> {
    const module = await this.compile(description);
    const logger = this.logger.child({ plugin: description.name });

    let io: PipePair;
    let wasi: WASI;
    try {
      io = PipePair.create();
    } catch (error) {
      throw stageError(description, 'environment', error);
    }

    try {
      try {
        wasi = new WASI({
          version: 'preview1',
          args: [this.programName],
          env: {},
          stdin: io.stdin.guestFd,
          stdout: io.stdout.guestFd,
          stderr: this.stderrFd,
          returnOnExit: true,
        });
      } catch (error) {
        throw stageError(description, 'environment', error);
      }

      const env: SandboxEnv = {
        io,
        channel: new ObjectChannel(io.stdin, io.stdout),
        dispatcher,
        logger,
      };

      const imports: WebAssembly.Imports = {
        ...wasi.getImportObject(),
        [this.hostNamespace]: createHostImports(env),
      };

      let instance: WebAssembly.Instance;
      try {
        instance = await WebAssembly.instantiate(module, imports);
        bindWasi(wasi, instance);
      } catch (error) {
        throw stageError(description, 'instantiate', error);
      }

      try {
        const initialize = instance.exports[INITIALIZE_EXPORT];
        if (typeof initialize !== 'function') {
          throw new Error(`module does not export "${INITIALIZE_EXPORT}"`);
        }
        env.channel.writeObject(description.configuration ?? {});
        initialize();
      } catch (error) {
        throw stageError(description, 'handshake', error);
      }

      logger.debug({ execPath: description.execPath }, 'Sandbox initialized');
      return new SandboxPlugin(description, instance, env);
    } catch (error) {
      io.dispose();
      throw error;
    }
  }
}

/**
 * Give the WASI context the instance's memory without running `_start`.
 * Plugins may be built as commands; the host never runs their main, only
 * `initialize`, so WASI sees a reactor-shaped view of the exports.
 */
function bindWasi(wasi: WASI, instance: WebAssembly.Instance): void {
  const { memory, _initialize } = instance.exports;
  if (!(memory instanceof WebAssembly.Memory)) {
    throw new Error('module does not export "memory"');
  }
  wasi.initialize({
    exports: typeof _initialize === 'function' ? { memory, _initialize } : { memory },
  });
}

function stageError(description: PluginDescription, stage: SandboxStage, error: unknown): SandboxError {
  if (error instanceof SandboxError) {
    return error;
  }
  return new SandboxError(description.name, stage, normalizeError(error).message, { cause: error });
}
