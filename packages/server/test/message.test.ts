/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import {
  classifyMessage,
  describeMessage,
  encodeErrorResponse,
  encodeNotification,
  encodeResponse,
} from '../src/protocol/message.js';

describe('classifyMessage', () => {
  it('treats id plus method as a request', () => {
    expect(
      classifyMessage({ jsonrpc: '2.0', id: 3, method: 'textDocument/hover' }),
    ).toEqual({
      kind: 'request',
      id: 3,
      method: 'textDocument/hover',
      params: undefined,
    });
  });

  it('keeps id 0 and string ids', () => {
    expect(classifyMessage({ id: 0, method: 'shutdown' })).toMatchObject({
      kind: 'request',
      id: 0,
    });
    expect(classifyMessage({ id: 'abc', method: 'shutdown' })).toMatchObject({
      kind: 'request',
      id: 'abc',
    });
  });

  it('treats a method without id, or with a null id, as a notification', () => {
    expect(classifyMessage({ method: 'exit' })).toEqual({
      kind: 'notification',
      method: 'exit',
      params: undefined,
    });
    expect(
      classifyMessage({ id: null, method: 'initialized', params: {} }),
    ).toEqual({ kind: 'notification', method: 'initialized', params: {} });
  });

  it('treats an id without method as a response', () => {
    expect(classifyMessage({ id: 4, result: [1] })).toEqual({
      kind: 'response',
      id: 4,
      result: [1],
    });
    expect(
      classifyMessage({ id: 5, error: { code: -32601, message: 'nope' } }),
    ).toEqual({
      kind: 'response',
      id: 5,
      result: undefined,
      error: { code: -32601, message: 'nope' },
    });
  });

  it('rejects an envelope with neither', () => {
    expect(classifyMessage({ jsonrpc: '2.0' })).toBeUndefined();
  });
});

describe('describeMessage', () => {
  it('names the kind, id and method', () => {
    expect(
      describeMessage({ kind: 'request', id: 1, method: 'x', params: null }),
    ).toBe('request 1 x');
    expect(
      describeMessage({ kind: 'notification', method: 'y', params: null }),
    ).toBe('notification y');
    expect(describeMessage({ kind: 'response', id: 'r', result: null })).toBe(
      'response r',
    );
  });
});

describe('encoders', () => {
  it('writes an absent result as null', () => {
    expect(encodeResponse(1, undefined)).toBe(
      '{"jsonrpc":"2.0","id":1,"result":null}',
    );
    expect(encodeResponse('a', { x: [1, 2] })).toBe(
      '{"jsonrpc":"2.0","id":"a","result":{"x":[1,2]}}',
    );
  });

  it('writes error responses with and without data', () => {
    expect(encodeErrorResponse(2, { code: -32603, message: 'boom' })).toBe(
      '{"jsonrpc":"2.0","id":2,"error":{"code":-32603,"message":"boom"}}',
    );
    expect(
      encodeErrorResponse(2, { code: -32001, message: 'busy', data: 5 }),
    ).toBe(
      '{"jsonrpc":"2.0","id":2,"error":{"code":-32001,"message":"busy","data":5}}',
    );
  });

  it('writes absent params as null', () => {
    expect(encodeNotification('custom/ping', undefined)).toBe(
      '{"jsonrpc":"2.0","method":"custom/ping","params":null}',
    );
    expect(encodeNotification('window/logMessage', { type: 4 })).toBe(
      '{"jsonrpc":"2.0","method":"window/logMessage","params":{"type":4}}',
    );
  });
});
