/**
 * @module @plugin-host/plugin-contracts/__tests__/dispatcher
 */

import { describe, it, expect, vi } from 'vitest';
import { Dispatcher, Guarded } from '../dispatcher.js';
import { LockContentionError } from '../errors.js';

describe('Guarded', () => {
  it('runs the callback with the value and returns its result', () => {
    const guarded = new Guarded('counter', { count: 1 });
    const result = guarded.lock((value) => {
      value.count += 1;
      return value.count;
    });

    expect(result).toBe(2);
    expect(guarded.locked).toBe(false);
  });

  it('is held only while the callback runs', () => {
    const guarded = new Guarded('resource', {});
    let heldInside = false;
    guarded.lock(() => {
      heldInside = guarded.locked;
    });

    expect(heldInside).toBe(true);
    expect(guarded.locked).toBe(false);
  });

  it('refuses re-entrant acquisition', () => {
    const guarded = new Guarded('lsp', {});

    expect(() => guarded.lock(() => guarded.lock(() => 'inner'))).toThrow(LockContentionError);
    expect(guarded.locked).toBe(false);
  });

  it('releases the lock when the callback throws', () => {
    const guarded = new Guarded('lsp', {});

    expect(() =>
      guarded.lock(() => {
        throw new Error('registry failure');
      })
    ).toThrow('registry failure');
    expect(guarded.locked).toBe(false);
  });
});

describe('Dispatcher', () => {
  it('guards the language server registry', () => {
    const startServer = vi.fn();
    const dispatcher = new Dispatcher({ startServer });

    dispatcher.lsp.lock((lsp) => lsp.startServer('/bin/ra', 'rust', null));

    expect(startServer).toHaveBeenCalledWith('/bin/ra', 'rust', null);
  });
});
