/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ErrorCodes, ResponseError } from 'vscode-jsonrpc';
import type { ZodError } from 'zod';

import type { ErrorPayload } from '../protocol/message.js';

/**
 * Params did not have the shape the routed method needs.
 */
export class InvalidParamsError extends Error {
  readonly method: string;

  constructor(method: string, cause: ZodError) {
    super(
      `Invalid params for ${method}: ${cause.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
      { cause },
    );
    this.name = 'InvalidParamsError';
    this.method = method;
  }
}

/**
 * Maps a handler failure onto a JSON-RPC error object. A `ResponseError`
 * keeps its code and data; bad params become `InvalidParams`; anything else
 * is an `InternalError` carrying the failure's message.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ResponseError) {
    return error.data === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, data: error.data };
  }
  if (error instanceof InvalidParamsError) {
    return { code: ErrorCodes.InvalidParams, message: error.message };
  }
  if (error instanceof Error) {
    return {
      code: ErrorCodes.InternalError,
      message: error.message || error.name,
    };
  }
  return { code: ErrorCodes.InternalError, message: describeError(error) };
}

/**
 * A one-line description of a thrown value. Never throws, even for values
 * `String()` rejects, such as objects without a prototype.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
}
