/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export type JsonRpcId = number | string;

export const errorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type ErrorPayload = z.infer<typeof errorPayloadSchema>;

/**
 * The wire envelope as received. Which members are present decides what
 * kind of message it is; see `classifyMessage`.
 */
export const messageSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number().int(), z.string()]).nullable().optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: errorPayloadSchema.optional(),
});

export type Message = z.infer<typeof messageSchema>;

export type RequestMessage = {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params: unknown;
};

export type NotificationMessage = {
  kind: 'notification';
  method: string;
  params: unknown;
};

export type ResponseMessage = {
  kind: 'response';
  id: JsonRpcId;
  result: unknown;
  error?: ErrorPayload;
};

export type InboundMessage =
  | RequestMessage
  | NotificationMessage
  | ResponseMessage;

/**
 * Sorts an envelope into request, notification or response. Returns
 * `undefined` for an envelope with neither an id nor a method.
 */
export function classifyMessage(message: Message): InboundMessage | undefined {
  const id = message.id ?? undefined;
  if (message.method !== undefined) {
    return id === undefined
      ? { kind: 'notification', method: message.method, params: message.params }
      : { kind: 'request', id, method: message.method, params: message.params };
  }
  if (id !== undefined) {
    return message.error
      ? { kind: 'response', id, result: message.result, error: message.error }
      : { kind: 'response', id, result: message.result };
  }
  return undefined;
}

export function describeMessage(message: InboundMessage): string {
  switch (message.kind) {
    case 'request':
      return `request ${String(message.id)} ${message.method}`;
    case 'notification':
      return `notification ${message.method}`;
    case 'response':
      return `response ${String(message.id)}`;
    default: {
      const unreachable: never = message;
      return String(unreachable);
    }
  }
}

/**
 * `{"jsonrpc":"2.0","id":<id>,"result":<json>}`; an absent result is
 * written as `null`.
 */
export function encodeResponse(id: JsonRpcId, result: unknown): string {
  return JSON.stringify({ jsonrpc: '2.0', id, result: result ?? null });
}

export function encodeErrorResponse(
  id: JsonRpcId,
  error: ErrorPayload,
): string {
  const payload: ErrorPayload =
    error.data === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, data: error.data };
  return JSON.stringify({ jsonrpc: '2.0', id, error: payload });
}

/**
 * `{"jsonrpc":"2.0","method":"<name>","params":<json>}`; absent params are
 * written as `null`.
 */
export function encodeNotification(method: string, params: unknown): string {
  return JSON.stringify({ jsonrpc: '2.0', method, params: params ?? null });
}
