/**
 * @module @plugin-host/plugin-runtime/sandbox/host-bridge
 *
 * Functions a sandboxed module may import from the host.
 *
 * This is the trust boundary: whatever the guest writes, a host function
 * returns normally. Failures are logged and dropped, never thrown into the
 * guest.
 */

import {
  decodeNotification,
  normalizeError,
  type Dispatcher,
  type PluginNotification,
} from '@plugin-host/plugin-contracts';
import type { Logger } from '../logging.js';
import { dispatchNotification } from '../dispatch.js';
import type { ObjectChannel } from './channel.js';
import type { PipePair } from './pipe.js';

/**
 * State reachable from every host function call of one sandbox instance.
 * Shared by reference; host functions never copy it.
 */
export interface SandboxEnv {
  readonly io: PipePair;
  readonly channel: ObjectChannel;
  readonly dispatcher: Dispatcher;
  readonly logger: Logger;
}

/**
 * Read one notification from the guest's stdout and dispatch it.
 */
export function hostHandleNotification(env: SandboxEnv): void {
  let notification: PluginNotification;
  try {
    notification = decodeNotification(env.channel.readObject());
  } catch (error) {
    env.logger.debug({ err: normalizeError(error) }, 'Ignoring undecodable notification');
    return;
  }

  try {
    dispatchNotification(notification, env.dispatcher);
  } catch (error) {
    env.logger.warn({ err: normalizeError(error), method: notification.method }, 'Notification dispatch failed');
  }
}

/**
 * Host functions exposed to the guest under the host namespace.
 */
export function createHostImports(env: SandboxEnv): WebAssembly.ModuleImports {
  return {
    host_handle_notification: () => hostHandleNotification(env),
  };
}
