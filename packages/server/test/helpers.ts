/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';
import type { Logger, LogLevel } from '@lspd/core';

import type { PendingEntry, PendingQueue } from '../src/queue/pending-queue.js';
import type { JsonRpcId } from '../src/protocol/message.js';

export type LoggedLine = { level: LogLevel; message: string };

/**
 * Logger that keeps every line, lazy messages evaluated.
 */
export class RecordingLogger implements Logger {
  readonly lines: LoggedLine[] = [];

  debug(messageOrFn: string | (() => string)): void {
    this.record('debug', messageOrFn);
  }

  log(messageOrFn: string | (() => string)): void {
    this.record('info', messageOrFn);
  }

  warn(messageOrFn: string | (() => string)): void {
    this.record('warn', messageOrFn);
  }

  error(messageOrFn: string | (() => string)): void {
    this.record('error', messageOrFn);
  }

  messages(level: LogLevel): string[] {
    return this.lines
      .filter((line) => line.level === level)
      .map((line) => line.message);
  }

  private record(level: LogLevel, messageOrFn: string | (() => string)): void {
    const message =
      typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;
    this.lines.push({ level, message });
  }
}

/**
 * `Content-Length` framed bytes for one payload.
 */
export function frame(payload: string): string {
  return `Content-Length: ${Buffer.byteLength(payload, 'utf8')}\r\n\r\n${payload}`;
}

/**
 * Splits concatenated output frames back into their parsed bodies.
 */
export function parseFrames(bytes: Buffer): unknown[] {
  const bodies: unknown[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    const headerEnd = bytes.indexOf('\r\n\r\n', offset);
    if (headerEnd < 0) {
      throw new Error(`Incomplete header at byte ${offset}`);
    }
    const header = bytes.subarray(offset, headerEnd).toString('ascii');
    const match = /^Content-Length: (\d+)$/.exec(header);
    if (!match) {
      throw new Error(`Unexpected header: ${header}`);
    }
    const start = headerEnd + 4;
    const end = start + Number(match[1]);
    bodies.push(JSON.parse(bytes.subarray(start, end).toString('utf8')));
    offset = end;
  }
  return bodies;
}

/**
 * A writable stream that keeps everything written to it.
 */
export function captureOutput(): { stream: PassThrough; bytes: () => Buffer } {
  const stream = new PassThrough();
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => {
    chunks.push(chunk);
  });
  return { stream, bytes: () => Buffer.concat(chunks) };
}

export function requestEntry(
  id: JsonRpcId,
  method: string,
  params?: unknown,
): PendingEntry {
  return { kind: 'message', message: { kind: 'request', id, method, params } };
}

export function notificationEntry(
  method: string,
  params?: unknown,
): PendingEntry {
  return { kind: 'message', message: { kind: 'notification', method, params } };
}

export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Ids of the requests still waiting in `queue`, head first. */
export function pendingRequestIds(queue: PendingQueue): JsonRpcId[] {
  return queue
    .toArray()
    .flatMap((entry) =>
      entry.kind === 'message' && entry.message.kind === 'request'
        ? [entry.message.id]
        : [],
    );
}
