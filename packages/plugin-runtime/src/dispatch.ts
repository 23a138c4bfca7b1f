/**
 * @module @plugin-host/plugin-runtime/dispatch
 *
 * Turns decoded plugin notifications into Dispatcher calls. Shared by the
 * sandbox bridge and the legacy process handler so both speak the same
 * vocabulary.
 */

import type { Dispatcher, PluginNotification } from '@plugin-host/plugin-contracts';

/**
 * Forward a notification to the matching Dispatcher capability.
 *
 * The dispatcher lock is held only for the forward call.
 *
 * @throws LockContentionError if the dispatcher resource is already held
 */
export function dispatchNotification(notification: PluginNotification, dispatcher: Dispatcher): void {
  switch (notification.method) {
    case 'start_lsp_server': {
      const { exec_path, language_id, options } = notification.params;
      dispatcher.lsp.lock((lsp) => lsp.startServer(exec_path, language_id, options));
      return;
    }
  }
}
