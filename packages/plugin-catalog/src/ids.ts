/**
 * @module @plugin-host/plugin-catalog/ids
 * Plugin id allocation
 */

import type { PluginId } from '@plugin-host/plugin-contracts';

/**
 * Mints strictly increasing ids, starting at 1.
 */
export class PluginIdCounter {
  private last = 0;

  next(): PluginId {
    this.last += 1;
    return this.last;
  }

  /** Last id handed out, 0 before the first */
  get current(): PluginId {
    return this.last;
  }
}

/**
 * Counter shared by every catalog in the process, so ids are unique
 * process-wide.
 */
export const defaultPluginIds = new PluginIdCounter();
