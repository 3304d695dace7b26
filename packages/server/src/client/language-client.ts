/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import { DebugLogger, type Logger } from '@lspd/core';
import type {
  LSPAny,
  MessageType,
  PublishDiagnosticsParams,
  Registration,
  ShowMessageParams,
} from 'vscode-languageserver-protocol';

import {
  encodeErrorResponse,
  encodeNotification,
  encodeResponse,
  type ErrorPayload,
  type JsonRpcId,
} from '../protocol/message.js';
import type { FrameWriter } from '../transport/frame-writer.js';

/**
 * Server-initiated traffic a handler may send to the editor.
 */
export interface LanguageClient {
  publishDiagnostics(params: PublishDiagnosticsParams): void;
  showMessage(type: MessageType, message: string): void;
  /**
   * Announces a dynamic registration and returns its generated id.
   */
  registerCapability(method: string, registerOptions?: LSPAny): string;
  customNotification(method: string, params?: unknown): void;
}

/**
 * Encodes responses and notifications and hands them to the frame writer.
 * Notifications are fire-and-forget for handlers: a failed write is logged
 * here. Responses return the write so the dispatcher can observe it.
 */
export class ClientSink implements LanguageClient {
  constructor(
    private readonly writer: FrameWriter,
    private readonly logger: Logger = DebugLogger.getLogger('lspd:client'),
  ) {}

  respond(id: JsonRpcId, result: unknown): Promise<void> {
    return this.writer.write(encodeResponse(id, result));
  }

  respondError(id: JsonRpcId, error: ErrorPayload): Promise<void> {
    return this.writer.write(encodeErrorResponse(id, error));
  }

  publishDiagnostics(params: PublishDiagnosticsParams): void {
    this.notify('textDocument/publishDiagnostics', params);
  }

  showMessage(type: MessageType, message: string): void {
    const params: ShowMessageParams = { type, message };
    this.notify('window/showMessage', params);
  }

  registerCapability(method: string, registerOptions?: LSPAny): string {
    const registration: Registration = {
      id: randomUUID(),
      method,
      registerOptions,
    };
    this.notify('client/registerCapability', registration);
    return registration.id;
  }

  customNotification(method: string, params?: unknown): void {
    this.notify(method, params);
  }

  private notify(method: string, params: unknown): void {
    let payload: string;
    try {
      payload = encodeNotification(method, params);
    } catch (error) {
      this.logger.error(
        () => `Failed to encode notification '${method}': ${String(error)}`,
      );
      return;
    }
    void this.writer.write(payload).catch((error: unknown) => {
      this.logger.error(
        () => `Failed to send notification '${method}': ${String(error)}`,
      );
    });
  }
}
