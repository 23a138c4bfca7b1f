/**
 * @module @plugin-host/plugin-contracts/dispatcher
 *
 * Host-side collaborator contract invoked by plugin notifications.
 *
 * The language-server registry is the only state shared by every plugin. It is
 * owned by the Dispatcher and reachable only through {@link Guarded.lock}.
 */

import type { JsonValue } from './json.js';
import { LockContentionError } from './errors.js';

/**
 * Manages language-analysis servers. Implementations must tolerate repeated
 * starts for the same language.
 */
export interface LspServerRegistry {
  startServer(execPath: string, languageId: string, options: JsonValue): void;
}

/**
 * Exclusive, non-reentrant access to a shared value.
 *
 * The lock is held for exactly the synchronous extent of the callback. A second
 * acquisition while held (e.g. a registry that calls back into a plugin which
 * notifies again) fails with LockContentionError instead of deadlocking.
 */
export class Guarded<T> {
  private held = false;

  constructor(
    private readonly name: string,
    private readonly value: T
  ) {}

  get locked(): boolean {
    return this.held;
  }

  lock<R>(fn: (value: T) => R): R {
    if (this.held) {
      throw new LockContentionError(this.name);
    }
    this.held = true;
    try {
      return fn(this.value);
    } finally {
      this.held = false;
    }
  }
}

/**
 * Shared handle passed to every plugin instance.
 */
export class Dispatcher {
  readonly lsp: Guarded<LspServerRegistry>;

  constructor(lsp: LspServerRegistry) {
    this.lsp = new Guarded('lsp', lsp);
  }
}
