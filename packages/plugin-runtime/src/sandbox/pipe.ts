/**
 * @module @plugin-host/plugin-runtime/sandbox/pipe
 *
 * File-backed pipes standing in for a sandboxed module's standard streams.
 *
 * Each pipe is a file in a private temp directory opened twice: once for the
 * guest (the fd handed to WASI) and once for the host. The host appends what
 * the guest will read, or reads at its own offset what the guest has written,
 * so data flows in FIFO order without either side seeking the other's fd.
 *
 * The guest appends to its stdout file, so the host truncates it whenever a
 * drain reaches the end. The stdin file is never truncated: the guest reads it
 * at its own position, and the host only writes the initialization payload.
 */

import { closeSync, ftruncateSync, mkdtempSync, openSync, readSync, rmSync, writeFileSync, writeSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

/**
 * Which side produces the data
 */
export type PipeDirection = 'host-to-guest' | 'guest-to-host';

const READ_CHUNK = 64 * 1024;

export class FilePipe {
  readonly path: string;
  readonly direction: PipeDirection;
  /** File descriptor handed to the guest */
  readonly guestFd: number;
  private readonly hostFd: number;
  private readOffset = 0;
  private closed = false;

  constructor(filePath: string, direction: PipeDirection) {
    this.path = filePath;
    this.direction = direction;
    writeFileSync(filePath, '');
    if (direction === 'host-to-guest') {
      this.guestFd = openSync(filePath, 'r');
      this.hostFd = openSync(filePath, 'a');
    } else {
      this.guestFd = openSync(filePath, 'a');
      this.hostFd = openSync(filePath, 'r+');
    }
  }

  /**
   * Append bytes for the guest to read.
   */
  write(data: Uint8Array): void {
    if (this.direction !== 'host-to-guest') {
      throw new Error(`Cannot write to ${this.direction} pipe`);
    }
    let written = 0;
    while (written < data.length) {
      written += writeSync(this.hostFd, data, written, data.length - written);
    }
  }

  /**
   * Read everything the guest has written since the previous drain, then
   * empty the file.
   */
  drain(): Buffer {
    if (this.direction !== 'guest-to-host') {
      throw new Error(`Cannot read from ${this.direction} pipe`);
    }
    const chunks: Buffer[] = [];
    const buffer = Buffer.alloc(READ_CHUNK);
    for (;;) {
      const bytesRead = readSync(this.hostFd, buffer, 0, buffer.length, this.readOffset);
      if (bytesRead === 0) {
        ftruncateSync(this.hostFd, 0);
        this.readOffset = 0;
        break;
      }
      this.readOffset += bytesRead;
      chunks.push(Buffer.from(buffer.subarray(0, bytesRead)));
    }
    return Buffer.concat(chunks);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    closeSync(this.guestFd);
    closeSync(this.hostFd);
  }
}

/**
 * The guest's stdin and stdout, owned by one sandbox instance.
 */
export class PipePair {
  readonly dir: string;
  /** Host writes, guest reads */
  readonly stdin: FilePipe;
  /** Guest writes, host reads */
  readonly stdout: FilePipe;
  private disposed = false;

  private constructor(dir: string) {
    this.dir = dir;
    this.stdin = new FilePipe(path.join(dir, 'stdin'), 'host-to-guest');
    this.stdout = new FilePipe(path.join(dir, 'stdout'), 'guest-to-host');
  }

  static create(prefix = 'plugin-host-'): PipePair {
    const dir = mkdtempSync(path.join(tmpdir(), prefix));
    try {
      return new PipePair(dir);
    } catch (error) {
      rmSync(dir, { recursive: true, force: true });
      throw error;
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stdin.close();
    this.stdout.close();
    rmSync(this.dir, { recursive: true, force: true });
  }
}
