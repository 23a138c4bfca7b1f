/**
 * @module @plugin-host/plugin-testing/guest-module
 *
 * Assembles small WASI guest modules for sandbox tests.
 *
 * The guest exports `memory` and an entry point (default `initialize`) whose
 * body runs a list of steps: write text to stdout, echo stdin to stdout, call
 * the host's `host_handle_notification`, or trap.
 */

export type GuestStep =
  | { op: 'write'; text: string }
  | { op: 'echo-stdin' }
  | { op: 'notify' }
  | { op: 'trap' };

export interface GuestModuleOptions {
  steps: GuestStep[];
  /** Default: 'lapce' */
  hostNamespace?: string;
  /** Default: 'initialize' */
  entryPoint?: string;
  /** Default: true */
  exportMemory?: boolean;
  /** Also export a `_start` that traps, like a WASI command */
  exportStart?: boolean;
}

const I32 = 0x7f;
const FUNC_TYPE = 0x60;
const OP = {
  unreachable: 0x00,
  end: 0x0b,
  call: 0x10,
  drop: 0x1a,
  i32Load: 0x28,
  i32Store: 0x36,
  i32Const: 0x41,
} as const;

// imported function indices
const FD_WRITE = 0;
const FD_READ = 1;
const HOST_NOTIFY = 2;
const ENTRY = 3;
const START = 4;

// memory layout
const SCRATCH_READ = 0;
const SCRATCH_WRITE = 4;
const ECHO_READ_IOV = 8;
const ECHO_WRITE_IOV = 16;
const WRITE_IOVS = 24;
const TEXT_BASE = 4096;
const ECHO_BUF = 32768;
const ECHO_LEN = 4096;

function u32(value: number): number[] {
  const out: number[] = [];
  let n = value >>> 0;
  do {
    let byte = n & 0x7f;
    n >>>= 7;
    if (n !== 0) {
      byte |= 0x80;
    }
    out.push(byte);
  } while (n !== 0);
  return out;
}

function s32(value: number): number[] {
  const out: number[] = [];
  let n = value | 0;
  for (;;) {
    const byte = n & 0x7f;
    n >>= 7;
    if ((n === 0 && (byte & 0x40) === 0) || (n === -1 && (byte & 0x40) !== 0)) {
      out.push(byte);
      return out;
    }
    out.push(byte | 0x80);
  }
}

function name(text: string): number[] {
  const bytes = [...Buffer.from(text, 'utf8')];
  return [...u32(bytes.length), ...bytes];
}

function vec(items: number[][]): number[] {
  return [...u32(items.length), ...items.flat()];
}

function section(id: number, body: number[]): number[] {
  return [id, ...u32(body.length), ...body];
}

function i32Const(value: number): number[] {
  return [OP.i32Const, ...s32(value)];
}

function writeLE32(target: Uint8Array, offset: number, value: number): void {
  target[offset] = value & 0xff;
  target[offset + 1] = (value >>> 8) & 0xff;
  target[offset + 2] = (value >>> 16) & 0xff;
  target[offset + 3] = (value >>> 24) & 0xff;
}

/**
 * Build the binary of a guest module.
 */
export function buildGuestModule(options: GuestModuleOptions): Uint8Array {
  const { steps, hostNamespace = 'lapce', entryPoint = 'initialize', exportMemory = true, exportStart = false } = options;

  const texts = steps.flatMap((step) => (step.op === 'write' ? [Buffer.from(step.text, 'utf8')] : []));
  const textSize = texts.reduce((total, text) => total + text.length, 0);
  if (WRITE_IOVS + texts.length * 8 > TEXT_BASE || TEXT_BASE + textSize > ECHO_BUF) {
    throw new Error('Guest module steps do not fit the memory layout');
  }

  const data = new Uint8Array(TEXT_BASE + textSize);
  writeLE32(data, ECHO_READ_IOV, ECHO_BUF);
  writeLE32(data, ECHO_READ_IOV + 4, ECHO_LEN);
  writeLE32(data, ECHO_WRITE_IOV, ECHO_BUF);

  const body: number[] = [];
  let textOffset = TEXT_BASE;
  let writeIndex = 0;
  for (const step of steps) {
    switch (step.op) {
      case 'write': {
        const text = texts[writeIndex];
        const iov = WRITE_IOVS + writeIndex * 8;
        data.set(text, textOffset);
        writeLE32(data, iov, textOffset);
        writeLE32(data, iov + 4, text.length);
        textOffset += text.length;
        writeIndex += 1;
        body.push(...i32Const(1), ...i32Const(iov), ...i32Const(1), ...i32Const(SCRATCH_WRITE));
        body.push(OP.call, ...u32(FD_WRITE), OP.drop);
        break;
      }
      case 'echo-stdin':
        body.push(...i32Const(0), ...i32Const(ECHO_READ_IOV), ...i32Const(1), ...i32Const(SCRATCH_READ));
        body.push(OP.call, ...u32(FD_READ), OP.drop);
        // write iovec length = bytes read
        body.push(...i32Const(ECHO_WRITE_IOV + 4), ...i32Const(SCRATCH_READ));
        body.push(OP.i32Load, 0x02, 0x00, OP.i32Store, 0x02, 0x00);
        body.push(...i32Const(1), ...i32Const(ECHO_WRITE_IOV), ...i32Const(1), ...i32Const(SCRATCH_WRITE));
        body.push(OP.call, ...u32(FD_WRITE), OP.drop);
        break;
      case 'notify':
        body.push(OP.call, ...u32(HOST_NOTIFY));
        break;
      case 'trap':
        body.push(OP.unreachable);
        break;
    }
  }

  const fdType = [FUNC_TYPE, ...vec([[I32], [I32], [I32], [I32]]), ...vec([[I32]])];
  const voidType = [FUNC_TYPE, ...vec([]), ...vec([])];

  const imports = [
    [...name('wasi_snapshot_preview1'), ...name('fd_write'), 0x00, ...u32(0)],
    [...name('wasi_snapshot_preview1'), ...name('fd_read'), 0x00, ...u32(0)],
    [...name(hostNamespace), ...name('host_handle_notification'), 0x00, ...u32(1)],
  ];

  const functions = exportStart ? [u32(1), u32(1)] : [u32(1)];

  const exports: number[][] = [];
  if (exportMemory) {
    exports.push([...name('memory'), 0x02, ...u32(0)]);
  }
  exports.push([...name(entryPoint), 0x00, ...u32(ENTRY)]);
  if (exportStart) {
    exports.push([...name('_start'), 0x00, ...u32(START)]);
  }

  const functionBody = (instructions: number[]): number[] => {
    const content = [...u32(0), ...instructions, OP.end];
    return [...u32(content.length), ...content];
  };
  const bodies = [functionBody(body)];
  if (exportStart) {
    bodies.push(functionBody([OP.unreachable]));
  }

  const dataSegment = [0x00, ...i32Const(0), OP.end, ...u32(data.length), ...data];

  return Uint8Array.from([
    0x00, 0x61, 0x73, 0x6d,
    0x01, 0x00, 0x00, 0x00,
    ...section(1, vec([fdType, voidType])),
    ...section(2, vec(imports)),
    ...section(3, vec(functions)),
    ...section(5, vec([[0x00, ...u32(1)]])),
    ...section(7, vec(exports)),
    ...section(10, [...u32(bodies.length), ...bodies.flat()]),
    ...section(11, vec([dataSegment])),
  ]);
}

/**
 * Starts with the WebAssembly magic but is not a valid module.
 */
export function buildCorruptModule(): Uint8Array {
  return Uint8Array.from([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00, 0x01, 0xff]);
}

/**
 * Serialize a notification the way a guest writes it: one JSON line.
 */
export function notificationLine(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}
