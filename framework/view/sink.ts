/**
 * Render Sinks
 *
 * Destinations for rendered output. The renderer writes each result in a
 * single call, after execution has fully succeeded.
 */

import type { Writable } from 'node:stream';

export interface RenderSink {
  write(chunk: string): void | Promise<void>;
}

/**
 * Collects output in memory
 */
export class BufferSink implements RenderSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get byteLength(): number {
    return Buffer.byteLength(this.toString());
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Adapt a Node writable stream (including `http.ServerResponse`) to a sink.
 * The write resolves once the stream has accepted the chunk and rejects with
 * the first failure reported by either the write callback or an `'error'`
 * event.
 */
export function writableSink(stream: Writable): { write(chunk: string): Promise<void> } {
  return {
    write(chunk: string): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (stream.destroyed || stream.writableEnded) {
          reject(new Error('Stream is no longer writable'));
          return;
        }

        let settled = false;
        const fail = (error: Error) => {
          if (settled) return;
          settled = true;
          reject(error);
        };

        // A failed write is reported to the callback and then emitted as
        // 'error'; the listener stays attached until that event arrives.
        stream.once('error', fail);

        stream.write(chunk, (error) => {
          if (error) {
            fail(error);
            return;
          }
          stream.removeListener('error', fail);
          if (!settled) {
            settled = true;
            resolve();
          }
        });
      });
    },
  };
}
