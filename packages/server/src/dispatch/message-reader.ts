/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, type Logger } from '@lspd/core';

import {
  classifyMessage,
  describeMessage,
  type InboundMessage,
} from '../protocol/message.js';
import { cancelParams } from '../protocol/params.js';
import type { PendingQueue } from '../queue/pending-queue.js';
import { EndOfStream } from '../transport/errors.js';
import type { FrameReader } from '../transport/frame-reader.js';
import { CANCEL_METHOD } from './routes.js';

/**
 * The reader task: pulls frames off the wire, applies cancellations to the
 * queue, and enqueues every message for the dispatcher. Ends by putting a
 * single `closed` entry on the queue.
 */
export class MessageReader {
  private stopped = false;

  constructor(
    private readonly frames: FrameReader,
    private readonly queue: PendingQueue,
    private readonly logger: Logger = DebugLogger.getLogger('lspd:reader'),
  ) {}

  /**
   * Resolves once the stream closes, a transport fault stops reading, or
   * `stop()` was called and the queue stopped accepting entries. Never
   * rejects.
   */
  async run(): Promise<void> {
    while (!this.stopped) {
      let next: InboundMessage | undefined;
      try {
        next = classifyMessage(await this.frames.nextMessage());
      } catch (error) {
        await this.close(error);
        return;
      }

      const message = next;
      if (message === undefined) {
        this.logger.warn('Dropping frame with neither an id nor a method');
        continue;
      }

      this.peek(message);
      this.logger.debug(() => `Queueing ${describeMessage(message)}`);
      const accepted = await this.queue.put({ kind: 'message', message });
      if (!accepted) {
        return;
      }
    }
  }

  stop(): void {
    this.stopped = true;
  }

  /**
   * Applies a `$/cancelRequest` before it is queued, so a request still
   * waiting in the queue never reaches the dispatcher.
   */
  private peek(message: InboundMessage): void {
    if (message.kind === 'response' || message.method !== CANCEL_METHOD) {
      return;
    }
    const parsed = cancelParams.safeParse(message.params);
    if (!parsed.success) {
      this.logger.warn('Ignoring $/cancelRequest without a valid id');
      return;
    }
    const { id } = parsed.data;
    if (this.queue.cancel(id)) {
      this.logger.log(`Cancelled request ${id}, which had not yet started`);
    } else {
      this.logger.log(
        `Cannot cancel request ${id} because it has already started`,
      );
    }
  }

  private async close(error: unknown): Promise<void> {
    if (error instanceof EndOfStream) {
      this.logger.debug('Input stream closed');
      await this.queue.put({ kind: 'closed' });
      return;
    }
    const fault = error instanceof Error ? error : new Error(String(error));
    this.logger.error(() => `Stopped reading: ${fault.message}`);
    await this.queue.put({ kind: 'closed', error: fault });
  }
}
