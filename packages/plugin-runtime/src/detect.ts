/**
 * @module @plugin-host/plugin-runtime/detect
 * Execution strategy selection by module type
 */

import { open } from 'node:fs/promises';
import type { PluginKind } from '@plugin-host/plugin-contracts';

/** `\0asm` */
export const WASM_MAGIC = Buffer.from([0x00, 0x61, 0x73, 0x6d]);

/**
 * WebAssembly modules run sandboxed; anything else is treated as a legacy
 * executable.
 */
export async function detectPluginKind(execPath: string): Promise<PluginKind> {
  const file = await open(execPath, 'r');
  try {
    const header = Buffer.alloc(WASM_MAGIC.length);
    const { bytesRead } = await file.read(header, 0, header.length, 0);
    return bytesRead === WASM_MAGIC.length && header.equals(WASM_MAGIC) ? 'sandbox' : 'process';
  } finally {
    await file.close();
  }
}
