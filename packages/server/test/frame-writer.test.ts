/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';

import { FrameWriter, encodeFrame } from '../src/transport/frame-writer.js';
import { captureOutput, parseFrames } from './helpers.js';

describe('encodeFrame', () => {
  it('prefixes the byte length of the UTF-8 body', () => {
    expect(encodeFrame('{"a":"é"}').toString('utf8')).toBe(
      'Content-Length: 10\r\n\r\n{"a":"é"}',
    );
  });

  it('frames an empty payload', () => {
    expect(encodeFrame('').toString('utf8')).toBe('Content-Length: 0\r\n\r\n');
  });
});

describe('FrameWriter', () => {
  it('writes each frame as one chunk, in call order', async () => {
    const chunks: Buffer[] = [];
    let inFlight = 0;
    let maxInFlight = 0;
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        chunks.push(chunk);
        setTimeout(() => {
          inFlight -= 1;
          callback();
        }, 2);
      },
    });
    const writer = new FrameWriter(sink);
    const payloads = ['{"id":1}', '{"id":2,"result":"ß"}', '{"id":3}'];

    await Promise.all(payloads.map((payload) => writer.write(payload)));

    expect(chunks.map((chunk) => chunk.toString('utf8'))).toEqual(
      payloads.map((payload) => encodeFrame(payload).toString('utf8')),
    );
    expect(maxInFlight).toBe(1);
  });

  it('produces frames a reader can split apart', async () => {
    const output = captureOutput();
    const writer = new FrameWriter(output.stream);

    await writer.write('{"jsonrpc":"2.0","id":1,"result":null}');
    await writer.write('{"jsonrpc":"2.0","method":"window/showMessage","params":{"type":3,"message":"hi"}}');

    expect(parseFrames(output.bytes())).toEqual([
      { jsonrpc: '2.0', id: 1, result: null },
      {
        jsonrpc: '2.0',
        method: 'window/showMessage',
        params: { type: 3, message: 'hi' },
      },
    ]);
  });

  it('rejects writes once the sink has ended, without blocking later ones', async () => {
    const sink = new PassThrough();
    sink.end();
    const writer = new FrameWriter(sink);

    await expect(writer.write('{}')).rejects.toThrow('Output stream is closed');
    await expect(writer.write('{}')).rejects.toThrow('Output stream is closed');
  });
});
