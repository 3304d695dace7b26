/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, type Logger } from '@lspd/core';
import { ErrorCodes } from 'vscode-jsonrpc';

import type { LanguageServer } from '../handler/language-server.js';
import {
  describeMessage,
  type ErrorPayload,
  type InboundMessage,
  type JsonRpcId,
  type NotificationMessage,
  type RequestMessage,
} from '../protocol/message.js';
import type { PendingQueue } from '../queue/pending-queue.js';
import { describeError, toErrorPayload } from './errors.js';
import { findRoute } from './routes.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export type DispatcherState = 'running' | 'shutting-down' | 'exited';

export type ConnectionOutcome = {
  reason: 'exit' | 'end-of-stream' | 'transport-error';
  /** Whether a `shutdown` was dispatched before the loop ended. */
  shutdownRequested: boolean;
  /** The transport fault, for `transport-error`. */
  error?: Error;
};

/**
 * Where responses go. `ClientSink` is the production implementation.
 */
export interface ResponseSink {
  respond(id: JsonRpcId, result: unknown): Promise<void>;
  respondError(id: JsonRpcId, error: ErrorPayload): Promise<void>;
}

export interface DispatcherOptions {
  pollIntervalMs?: number;
  logger?: Logger;
}

/**
 * The control loop. Takes one entry at a time off the queue and runs it to
 * completion before taking the next, so handler code, the idle hook and
 * response writes never overlap.
 */
export class Dispatcher {
  private currentState: DispatcherState = 'running';
  private shutdownRequested = false;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly queue: PendingQueue,
    private readonly server: LanguageServer,
    private readonly sink: ResponseSink,
    options: DispatcherOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? DebugLogger.getLogger('lspd:dispatch');
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  /**
   * Runs until `exit` is dispatched or the queue delivers its `closed`
   * entry. Entries still queued at that point are abandoned.
   */
  async run(): Promise<ConnectionOutcome> {
    while (true) {
      const entry = await this.queue.poll(this.pollIntervalMs);

      if (entry === undefined) {
        if (this.queue.isDisposed) {
          return this.finish({ reason: 'end-of-stream' });
        }
        await this.idle();
        continue;
      }

      if (entry.kind === 'closed') {
        return this.finish(
          entry.error
            ? { reason: 'transport-error', error: entry.error }
            : { reason: 'end-of-stream' },
        );
      }

      const exited = await this.dispatch(entry.message);
      if (exited) {
        return this.finish({ reason: 'exit' });
      }
    }
  }

  /**
   * Handles one message. Returns `true` when it was `exit`.
   */
  private async dispatch(message: InboundMessage): Promise<boolean> {
    this.logger.debug(() => `Dispatching ${describeMessage(message)}`);

    if (message.kind === 'response') {
      const { id } = message;
      this.logger.debug(
        () => `Ignoring response ${String(id)}; no requests are outstanding`,
      );
      return false;
    }

    const { method, params } = message;
    const route = findRoute(method);
    if (route === undefined) {
      this.logger.warn(`Don't know what to do with method \`${method}\``);
      return false;
    }

    switch (route.kind) {
      case 'cancel':
        return false;
      case 'exit':
        return true;
      case 'shutdown':
        this.shutdownRequested = true;
        this.currentState = 'shutting-down';
        await this.execute(message, async () => {
          await this.server.shutdown();
        });
        return false;
      case 'request':
      case 'notification':
        await this.execute(message, () => route.invoke(this.server, params));
        return false;
      default: {
        const unreachable: never = route;
        throw new Error(`Unhandled route ${String(unreachable)}`);
      }
    }
  }

  /**
   * Runs a handler operation. A request gets its result, or the failure as
   * an error response; a notification's failure is only logged.
   */
  private async execute(
    message: RequestMessage | NotificationMessage,
    operation: () => Promise<unknown>,
  ): Promise<void> {
    const { method } = message;
    if (message.kind === 'notification') {
      try {
        await operation();
      } catch (error) {
        this.logger.error(
          () => `Notification ${method} failed: ${describeError(error)}`,
        );
      }
      return;
    }

    const { id } = message;

    let reply: Promise<void>;
    try {
      const result = await operation();
      reply = this.sink.respond(id, result);
    } catch (error) {
      const payload = toErrorPayload(error);
      this.logger.warn(
        () => `Request ${String(id)} ${method} failed: ${payload.message}`,
      );
      reply = this.replyWithError(id, payload);
    }

    try {
      await reply;
    } catch (error) {
      this.logger.error(
        () =>
          `Failed to send response to ${String(id)}: ${describeError(error)}`,
      );
    }
  }

  /**
   * Sends `payload` as the error response. When the sink cannot encode it,
   * which happens for `data` JSON cannot represent, the response goes out as
   * an `InternalError` with the same message and no data.
   */
  private replyWithError(id: JsonRpcId, payload: ErrorPayload): Promise<void> {
    try {
      return this.sink.respondError(id, payload);
    } catch (error) {
      this.logger.warn(
        () =>
          `Dropping error data for ${String(id)}, it cannot be encoded: ${describeError(error)}`,
      );
      return this.sink.respondError(id, {
        code: ErrorCodes.InternalError,
        message: payload.message,
      });
    }
  }

  private async idle(): Promise<void> {
    try {
      await this.server.doAsyncWork();
    } catch (error) {
      this.logger.error(() => `Idle work failed: ${describeError(error)}`);
    }
  }

  private finish(
    outcome: Omit<ConnectionOutcome, 'shutdownRequested'>,
  ): ConnectionOutcome {
    this.currentState = 'exited';
    this.logger.debug(() => `Dispatch loop ended: ${outcome.reason}`);
    for (const entry of this.queue.toArray()) {
      if (entry.kind === 'message') {
        this.logger.debug(() => `Abandoning ${describeMessage(entry.message)}`);
      }
    }
    return { ...outcome, shutdownRequested: this.shutdownRequested };
  }
}
