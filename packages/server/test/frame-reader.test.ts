/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { StreamByteSource } from '../src/transport/byte-source.js';
import { EndOfStream, MalformedFrame } from '../src/transport/errors.js';
import {
  FrameReader,
  MAX_CONTENT_LENGTH,
  MAX_HEADER_LINE_BYTES,
  isWhitespaceByte,
  parseContentLength,
} from '../src/transport/frame-reader.js';
import { frame } from './helpers.js';

function readerFor(...chunks: Array<string | Buffer>): FrameReader {
  const stream = new PassThrough();
  for (const chunk of chunks) {
    stream.write(chunk);
  }
  stream.end();
  return new FrameReader(new StreamByteSource(stream));
}

describe('parseContentLength', () => {
  it('reads the decimal value', () => {
    expect(parseContentLength('Content-Length: 42')).toBe(42);
  });

  it('ignores other headers', () => {
    expect(
      parseContentLength('Content-Type: application/vscode-jsonrpc'),
    ).toBeUndefined();
    expect(parseContentLength('Content-Length:42')).toBeUndefined();
  });

  it('rejects a value that is not a decimal', () => {
    expect(() => parseContentLength('Content-Length: 4x')).toThrow(
      'Invalid Content-Length: 4x',
    );
  });

  it('rejects a value above the limit', () => {
    expect(() =>
      parseContentLength(`Content-Length: ${MAX_CONTENT_LENGTH + 1}`),
    ).toThrow(MalformedFrame);
  });
});

describe('isWhitespaceByte', () => {
  it('covers blanks, control whitespace and the ASCII separators', () => {
    for (const byte of [0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x1c, 0x1f]) {
      expect(isWhitespaceByte(byte)).toBe(true);
    }
    for (const byte of [0x7b, 0x00, 0x08, 0x0e, 0x41]) {
      expect(isWhitespaceByte(byte)).toBe(false);
    }
  });
});

describe('FrameReader', () => {
  it('reads one message', async () => {
    const reader = readerFor(frame('{"jsonrpc":"2.0","id":1,"method":"shutdown"}'));

    await expect(reader.nextMessage()).resolves.toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'shutdown',
    });
  });

  it('ignores headers other than Content-Length', async () => {
    const reader = readerFor(
      'Content-Type: application/vscode-jsonrpc; charset=utf-8\r\n' +
        'Content-Length: 2\r\n\r\n{}',
    );

    await expect(reader.nextToken()).resolves.toBe('{}');
  });

  it('skips whitespace before the body', async () => {
    const reader = readerFor('Content-Length: 2\r\n\r\n\r\n \t{}');

    await expect(reader.nextToken()).resolves.toBe('{}');
  });

  it('keeps the last Content-Length for frames that omit it', async () => {
    const reader = readerFor('Content-Length: 2\r\n\r\n{}\r\n[]');

    await expect(reader.nextToken()).resolves.toBe('{}');
    await expect(reader.nextToken()).resolves.toBe('[]');
  });

  it('fails when no Content-Length was ever seen', async () => {
    const reader = readerFor('X-Other: 1\r\n\r\n{}');

    await expect(reader.nextToken()).rejects.toThrow(
      'Missing Content-Length header',
    );
  });

  it('fails on a header line not ended by CR LF', async () => {
    const reader = readerFor('Content-Length: 2\rX');

    await expect(reader.nextToken()).rejects.toThrow(
      'Header line not terminated by CR LF',
    );
  });

  it('accepts a header line of exactly the maximum length', async () => {
    const padding = 'X-Pad: ' + 'a'.repeat(MAX_HEADER_LINE_BYTES - 7);
    const reader = readerFor(`${padding}\r\nContent-Length: 2\r\n\r\n{}`);

    await expect(reader.nextToken()).resolves.toBe('{}');
  });

  it('fails on a header line longer than the maximum', async () => {
    const padding = 'X-Pad: ' + 'a'.repeat(MAX_HEADER_LINE_BYTES);
    const reader = readerFor(`${padding}\r\nContent-Length: 2\r\n\r\n{}`);

    const failure = reader.nextToken();
    await expect(failure).rejects.toBeInstanceOf(MalformedFrame);
    await expect(failure).rejects.toThrow(
      `Header line exceeds ${MAX_HEADER_LINE_BYTES} bytes`,
    );
  });

  it('signals end of stream on an empty stream', async () => {
    await expect(readerFor().nextToken()).rejects.toBeInstanceOf(EndOfStream);
  });

  it('signals end of stream in the middle of a header', async () => {
    await expect(readerFor('Content-Len').nextToken()).rejects.toBeInstanceOf(
      EndOfStream,
    );
  });

  it('signals end of stream in the middle of a body', async () => {
    const reader = readerFor('Content-Length: 10\r\n\r\n{"id"');

    await expect(reader.nextToken()).rejects.toBeInstanceOf(EndOfStream);
  });

  it('returns an empty body for a zero length, which is not a message', async () => {
    const reader = readerFor('Content-Length: 0\r\n\r\n');

    await expect(reader.nextMessage()).rejects.toThrow(
      /^Invalid JSON in frame:/,
    );
  });

  it('rejects a body that is not JSON', async () => {
    const reader = readerFor(frame('abc'));

    const error = await reader.nextMessage().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MalformedFrame);
    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid JSON in frame:/));
  });

  it('rejects JSON that is not a message envelope', async () => {
    const reader = readerFor(frame('{"id":true,"method":"x"}'));

    await expect(reader.nextMessage()).rejects.toThrow(
      /^Frame is not a JSON-RPC message: id:/,
    );
  });

  it('counts body length in bytes and decodes UTF-8 split across chunks', async () => {
    const payload = '{"method":"ünïcödé ✓"}';
    const bytes = Buffer.from(frame(payload), 'utf8');
    const split = bytes.indexOf(0xc3) + 1;

    const reader = readerFor(bytes.subarray(0, split), bytes.subarray(split));

    await expect(reader.nextToken()).resolves.toBe(payload);
  });

  it('returns every framed payload in order', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.fullUnicodeString({ maxLength: 40 }), { maxLength: 8 }),
        async (texts) => {
          const payloads = texts.map((text) =>
            JSON.stringify({ jsonrpc: '2.0', method: 'custom', params: text }),
          );
          const reader = readerFor(payloads.map(frame).join(''));

          for (const payload of payloads) {
            expect(await reader.nextToken()).toBe(payload);
          }
          await expect(reader.nextToken()).rejects.toBeInstanceOf(EndOfStream);
        },
      ),
      { numRuns: 50 },
    );
  });
});
