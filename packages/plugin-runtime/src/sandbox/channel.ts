/**
 * @module @plugin-host/plugin-runtime/sandbox/channel
 *
 * Whole-object exchange across the sandbox pipe pair.
 *
 * Framing: one compact JSON value per line, `\n`-terminated (a trailing `\r`
 * is tolerated). Each read drains whatever the guest has written into a carry
 * buffer and returns exactly the next complete line; the rest stays buffered
 * for subsequent reads, so a guest may send any number of messages over its
 * lifetime.
 */

import { ChannelDecodeError, normalizeError, type JsonValue } from '@plugin-host/plugin-contracts';

/**
 * Host side of the guest's stdin
 */
export interface ChannelWriter {
  write(data: Uint8Array): void;
}

/**
 * Host side of the guest's stdout
 */
export interface ChannelReader {
  drain(): Buffer;
}

const NEWLINE = 0x0a;

export class ObjectChannel {
  private pending: Buffer = Buffer.alloc(0);

  constructor(
    private readonly input: ChannelWriter,
    private readonly output: ChannelReader
  ) {}

  /**
   * Serialize a value and write it, terminated, to the guest's stdin.
   */
  writeObject(value: JsonValue): void {
    this.input.write(Buffer.from(`${JSON.stringify(value)}\n`, 'utf8'));
  }

  /**
   * Read the next framed value from the guest's stdout.
   *
   * @throws ChannelDecodeError when no complete line is available or the line is not JSON
   */
  readObject(): unknown {
    this.pending = Buffer.concat([this.pending, this.output.drain()]);

    for (;;) {
      const end = this.pending.indexOf(NEWLINE);
      if (end === -1) {
        throw new ChannelDecodeError('No complete message on guest output', {
          bufferedBytes: this.pending.length,
        });
      }

      const line = this.pending.subarray(0, end).toString('utf8').trim();
      this.pending = this.pending.subarray(end + 1);
      if (line.length === 0) {
        continue;
      }

      try {
        return JSON.parse(line);
      } catch (error) {
        throw new ChannelDecodeError(`Malformed message on guest output: ${normalizeError(error).message}`, {
          line: line.length > 200 ? `${line.slice(0, 200)}...` : line,
        });
      }
    }
  }

  /**
   * Bytes received but not yet consumed by a read
   */
  get bufferedBytes(): number {
    return this.pending.length;
  }
}
