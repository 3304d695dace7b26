/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { InboundMessage, JsonRpcId } from '../protocol/message.js';
import { BoundedQueue } from './bounded-queue.js';

export const DEFAULT_QUEUE_CAPACITY = 10;

/**
 * What travels from the reader to the dispatcher: a message, or the single
 * `closed` marker saying no more messages will follow. `error` is set when
 * the reader stopped on a transport fault rather than a clean close.
 */
export type PendingEntry =
  | { kind: 'message'; message: InboundMessage }
  | { kind: 'closed'; error?: Error };

export class PendingQueue extends BoundedQueue<PendingEntry> {
  constructor(capacity = DEFAULT_QUEUE_CAPACITY) {
    super(capacity);
  }

  /**
   * Drops the queued request with this id, if it has not been dispatched
   * yet. Returns whether anything was removed.
   */
  cancel(id: JsonRpcId): boolean {
    return (
      this.removeIf(
        (entry) =>
          entry.kind === 'message' &&
          entry.message.kind === 'request' &&
          entry.message.id === id,
      ) > 0
    );
  }
}
