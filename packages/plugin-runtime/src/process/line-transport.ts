/**
 * @module @plugin-host/plugin-runtime/process/line-transport
 *
 * Newline-delimited JSON framing for vscode-jsonrpc: one message per line in
 * each direction. Legacy plugins predate Content-Length framing and may omit
 * the `jsonrpc` member, which is filled in on read.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import {
  AbstractMessageReader,
  AbstractMessageWriter,
  Disposable,
  type DataCallback,
  type Message,
} from 'vscode-jsonrpc/node.js';

export class LineMessageReader extends AbstractMessageReader {
  constructor(private readonly readable: Readable) {
    super();
  }

  listen(callback: DataCallback): Disposable {
    const lines = createInterface({ input: this.readable, crlfDelay: Infinity });
    const onError = (error: Error) => this.fireError(error);

    lines.on('line', (line) => {
      const text = line.trim();
      if (text.length === 0) {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        this.fireError(error);
        return;
      }
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        this.fireError(new Error(`Expected a JSON object, got: ${text.slice(0, 200)}`));
        return;
      }
      const message: Message = { jsonrpc: '2.0', ...parsed };
      callback(message);
    });
    lines.once('close', () => this.fireClose());
    this.readable.on('error', onError);

    return Disposable.create(() => {
      this.readable.off('error', onError);
      lines.close();
    });
  }
}

export class LineMessageWriter extends AbstractMessageWriter {
  private errorCount = 0;

  constructor(private readonly writable: Writable) {
    super();
    this.writable.on('error', (error: Error) => this.fireError(error));
    this.writable.once('close', () => this.fireClose());
  }

  write(msg: Message): Promise<void> {
    return new Promise((resolve, reject) => {
      this.writable.write(`${JSON.stringify(msg)}\n`, 'utf8', (error) => {
        if (error) {
          this.errorCount += 1;
          this.fireError(error, msg, this.errorCount);
          reject(error);
          return;
        }
        this.errorCount = 0;
        resolve();
      });
    });
  }

  end(): void {
    this.writable.end();
  }
}
