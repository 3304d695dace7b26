/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ByteSource } from './byte-source.js';
import { MalformedFrame } from './errors.js';
import { messageSchema, type Message } from '../protocol/message.js';

// ─── Constants ───────────────────────────────────────────────────────────────

export const CONTENT_LENGTH_HEADER = 'Content-Length: ';
export const MAX_CONTENT_LENGTH = 64 * 1024 * 1024;
export const MAX_HEADER_LINE_BYTES = 8 * 1024;

const CR = 0x0d;
const LF = 0x0a;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Space, tab, LF, VT, FF, CR and the ASCII separators 0x1C-0x1F.
 */
export function isWhitespaceByte(byte: number): boolean {
  return (
    byte === 0x20 ||
    (byte >= 0x09 && byte <= 0x0d) ||
    (byte >= 0x1c && byte <= 0x1f)
  );
}

/**
 * Returns the length carried by a `Content-Length: <decimal>` header line,
 * or `undefined` for any other header.
 */
export function parseContentLength(line: string): number | undefined {
  if (!line.startsWith(CONTENT_LENGTH_HEADER)) {
    return undefined;
  }
  const tail = line.slice(CONTENT_LENGTH_HEADER.length);
  if (!/^\d+$/.test(tail)) {
    throw new MalformedFrame(`Invalid Content-Length: ${tail}`);
  }
  const length = Number(tail);
  if (length > MAX_CONTENT_LENGTH) {
    throw new MalformedFrame(
      `Content-Length ${tail} exceeds the ${MAX_CONTENT_LENGTH} byte limit`,
    );
  }
  return length;
}

export function parseMessage(token: string): Message {
  let parsed: unknown;
  try {
    parsed = JSON.parse(token);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedFrame(`Invalid JSON in frame: ${reason}`, { cause: e });
  }
  const result = messageSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedFrame(
      `Frame is not a JSON-RPC message: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
      { cause: result.error },
    );
  }
  return result.data;
}

// ─── FrameReader Class ───────────────────────────────────────────────────────

/**
 * Reads `Content-Length` framed messages from a byte source, one per call.
 *
 * The expected body length is reader state, not frame state: a frame that
 * carries no `Content-Length` header reuses the last one seen on the
 * stream. Whitespace in front of a body is skipped before counting starts,
 * which absorbs the stray CR LF pairs some clients put between frames.
 */
export class FrameReader {
  private contentLength = -1;

  constructor(private readonly source: ByteSource) {}

  /**
   * Resolves with the next body as text. Rejects with `EndOfStream` when the
   * source closes and with `MalformedFrame` on a bad header.
   */
  async nextToken(): Promise<string> {
    while (true) {
      const line = await this.readHeaderLine();
      if (line.length === 0) {
        return this.readBody();
      }
      const length = parseContentLength(line);
      if (length !== undefined) {
        this.contentLength = length;
      }
    }
  }

  async nextMessage(): Promise<Message> {
    return parseMessage(await this.nextToken());
  }

  private async readHeaderLine(): Promise<string> {
    const bytes: number[] = [];
    while (true) {
      const next = await this.source.readByte();
      if (next === CR) {
        const last = await this.source.readByte();
        if (last !== LF) {
          throw new MalformedFrame('Header line not terminated by CR LF');
        }
        return Buffer.from(bytes).toString('latin1');
      }
      bytes.push(next);
      if (bytes.length > MAX_HEADER_LINE_BYTES) {
        throw new MalformedFrame(
          `Header line exceeds ${MAX_HEADER_LINE_BYTES} bytes`,
        );
      }
    }
  }

  private async readBody(): Promise<string> {
    if (this.contentLength < 0) {
      throw new MalformedFrame('Missing Content-Length header');
    }
    if (this.contentLength === 0) {
      return '';
    }

    let first = await this.source.readByte();
    while (isWhitespaceByte(first)) {
      first = await this.source.readByte();
    }
    const rest = await this.source.readExactly(this.contentLength - 1);
    return Buffer.concat([Buffer.of(first), rest]).toString('utf8');
  }
}
