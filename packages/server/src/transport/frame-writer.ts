/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Writable } from 'node:stream';

/**
 * `Content-Length: <byte-length>\r\n\r\n` followed by the UTF-8 payload, as
 * a single buffer.
 */
export function encodeFrame(payload: string): Buffer {
  const body = Buffer.from(payload, 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

/**
 * Writes frames one at a time. Each frame goes out as one `write` call and
 * the next does not start until the previous one's callback has fired, so
 * frames from different callers never interleave.
 */
export class FrameWriter {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly sink: Writable) {}

  /**
   * Resolves once the frame has been handed to the sink; rejects if that
   * write fails. A failed write does not block later ones.
   */
  write(payload: string): Promise<void> {
    const frame = encodeFrame(payload);
    const written = this.tail.then(() => this.writeFrame(frame));
    this.tail = written.then(
      () => undefined,
      () => undefined,
    );
    return written;
  }

  private writeFrame(frame: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.sink.destroyed || this.sink.writableEnded) {
        reject(new Error('Output stream is closed'));
        return;
      }
      this.sink.write(frame, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
