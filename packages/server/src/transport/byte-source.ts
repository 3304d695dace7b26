/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable } from 'node:stream';

import { EndOfStream } from './errors.js';

const HIGH_WATER_BYTES = 64 * 1024;

export interface ByteSource {
  /** Resolves with the next byte, or rejects with `EndOfStream`. */
  readByte(): Promise<number>;
  /** Resolves with exactly `length` bytes, or rejects with `EndOfStream`. */
  readExactly(length: number): Promise<Buffer>;
  close(): void;
}

/**
 * Pull-style view over a readable stream. Chunks are buffered as they
 * arrive; the stream is paused while more than 64 KiB sit unread, so a
 * stalled consumer pushes back on the producer.
 */
export class StreamByteSource implements ByteSource {
  private readonly chunks: Buffer[] = [];
  private offset = 0;
  private buffered = 0;
  private ended = false;
  private waiter: (() => void) | null = null;
  private closeReason: string | undefined;

  private readonly onData = (chunk: unknown): void => {
    const buffer = toBuffer(chunk);
    if (buffer.length === 0) {
      return;
    }
    this.chunks.push(buffer);
    this.buffered += buffer.length;
    if (this.buffered > HIGH_WATER_BYTES) {
      this.stream.pause();
    }
    this.wake();
  };

  private readonly onEnd = (): void => {
    this.finish('Stream from client has been closed');
  };

  private readonly onError = (error: Error): void => {
    this.finish(`Stream from client failed: ${error.message}`);
  };

  constructor(private readonly stream: Readable) {
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
  }

  async readByte(): Promise<number> {
    await this.waitFor(1);
    const head = this.chunks[0];
    const byte = head[this.offset];
    this.consume(1);
    return byte;
  }

  async readExactly(length: number): Promise<Buffer> {
    if (length === 0) {
      return Buffer.alloc(0);
    }
    await this.waitFor(length);
    const out = Buffer.allocUnsafe(length);
    let written = 0;
    while (written < length) {
      const head = this.chunks[0];
      const take = Math.min(head.length - this.offset, length - written);
      head.copy(out, written, this.offset, this.offset + take);
      written += take;
      this.consume(take);
    }
    return out;
  }

  /**
   * Detaches from the stream and drops unread bytes. Pending and later
   * reads reject with `EndOfStream`.
   */
  close(): void {
    this.chunks.length = 0;
    this.buffered = 0;
    this.offset = 0;
    this.finish('Byte source closed');
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
  }

  private async waitFor(length: number): Promise<void> {
    while (this.buffered < length) {
      if (this.ended) {
        throw new EndOfStream(this.closeReason);
      }
      if (this.stream.isPaused()) {
        this.stream.resume();
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private consume(length: number): void {
    this.offset += length;
    this.buffered -= length;
    while (this.chunks.length > 0 && this.offset >= this.chunks[0].length) {
      this.offset -= this.chunks[0].length;
      this.chunks.shift();
    }
    if (this.buffered <= HIGH_WATER_BYTES && this.stream.isPaused()) {
      this.stream.resume();
    }
  }

  private finish(reason: string): void {
    if (!this.ended) {
      this.ended = true;
      this.closeReason = reason;
    }
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  return Buffer.alloc(0);
}
