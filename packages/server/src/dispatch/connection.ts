/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable, Writable } from 'node:stream';
import { DebugLogger, type Logger } from '@lspd/core';

import { ClientSink } from '../client/language-client.js';
import type { LanguageServerFactory } from '../handler/language-server.js';
import { DEFAULT_QUEUE_CAPACITY, PendingQueue } from '../queue/pending-queue.js';
import { StreamByteSource } from '../transport/byte-source.js';
import { FrameReader } from '../transport/frame-reader.js';
import { FrameWriter } from '../transport/frame-writer.js';
import {
  DEFAULT_POLL_INTERVAL_MS,
  Dispatcher,
  type ConnectionOutcome,
} from './dispatcher.js';
import { MessageReader } from './message-reader.js';

export interface ConnectOptions {
  queueCapacity?: number;
  pollIntervalMs?: number;
  /** Replaces the default namespaced logger of every component. */
  logger?: Logger;
}

/**
 * Serves one client over a pair of streams until the dispatcher leaves its
 * loop. The reader task runs alongside the dispatcher and is torn down
 * before this resolves, so nothing keeps reading from `input` afterwards.
 */
export async function connect(
  factory: LanguageServerFactory,
  input: Readable,
  output: Writable,
  options: ConnectOptions = {},
): Promise<ConnectionOutcome> {
  const logger = options.logger ?? DebugLogger.getLogger('lspd:connection');
  const queue = new PendingQueue(
    options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
  );
  const client = new ClientSink(new FrameWriter(output), options.logger);
  const server = factory(client);

  const source = new StreamByteSource(input);
  const reader = new MessageReader(
    new FrameReader(source),
    queue,
    options.logger,
  );
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const dispatcher = new Dispatcher(queue, server, client, {
    pollIntervalMs,
    logger: options.logger,
  });

  logger.debug(
    () =>
      `Connection open (queue capacity ${queue.capacity}, poll interval ${pollIntervalMs}ms)`,
  );

  const reading = reader.run();
  try {
    return await dispatcher.run();
  } finally {
    reader.stop();
    source.close();
    queue.dispose();
    await reading;
    logger.debug('Connection closed');
  }
}
