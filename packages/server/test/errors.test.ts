/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ErrorCodes, ResponseError } from 'vscode-jsonrpc';

import { describeError, toErrorPayload } from '../src/dispatch/errors.js';

describe('describeError', () => {
  it('uses the message of an Error, or its name when the message is empty', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(new TypeError())).toBe('TypeError');
  });

  it('stringifies other values', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(7)).toBe('7');
    expect(describeError(undefined)).toBe('undefined');
  });

  it('describes values that cannot be converted to a string', () => {
    expect(describeError(Object.create(null))).toBe('[object Object]');
  });
});

describe('toErrorPayload', () => {
  it('keeps the code and data of a ResponseError', () => {
    expect(toErrorPayload(new ResponseError(-32001, 'bad', [1]))).toEqual({
      code: -32001,
      message: 'bad',
      data: [1],
    });
  });

  it('reports a thrown non-Error as an internal error', () => {
    expect(toErrorPayload(Object.create(null))).toEqual({
      code: ErrorCodes.InternalError,
      message: '[object Object]',
    });
  });
});
