/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Transport
export { StreamByteSource } from './transport/byte-source.js';
export type { ByteSource } from './transport/byte-source.js';
export { EndOfStream, MalformedFrame } from './transport/errors.js';
export {
  CONTENT_LENGTH_HEADER,
  FrameReader,
  MAX_CONTENT_LENGTH,
  MAX_HEADER_LINE_BYTES,
} from './transport/frame-reader.js';
export { FrameWriter, encodeFrame } from './transport/frame-writer.js';

// Messages
export * from './protocol/message.js';

// Queue
export { BoundedQueue } from './queue/bounded-queue.js';
export { DEFAULT_QUEUE_CAPACITY, PendingQueue } from './queue/pending-queue.js';
export type { PendingEntry } from './queue/pending-queue.js';

// Dispatch
export { connect } from './dispatch/connection.js';
export type { ConnectOptions } from './dispatch/connection.js';
export {
  DEFAULT_POLL_INTERVAL_MS,
  Dispatcher,
} from './dispatch/dispatcher.js';
export type {
  ConnectionOutcome,
  DispatcherOptions,
  DispatcherState,
  ResponseSink,
} from './dispatch/dispatcher.js';
export {
  describeError,
  InvalidParamsError,
  toErrorPayload,
} from './dispatch/errors.js';
export { MessageReader } from './dispatch/message-reader.js';
export {
  CANCEL_METHOD,
  LSP_METHODS,
  ROUTES,
  findRoute,
  isLspMethod,
} from './dispatch/routes.js';
export type { LspMethod, Route } from './dispatch/routes.js';

// Handler interface
export { ClientSink } from './client/language-client.js';
export type { LanguageClient } from './client/language-client.js';
export { BaseLanguageServer } from './handler/base-language-server.js';
export type {
  Awaitable,
  LanguageServer,
  LanguageServerFactory,
} from './handler/language-server.js';

// Configuration and entry point
export {
  ConfigError,
  DEFAULT_SERVER_CONFIG,
  resolveServerConfig,
  serverConfigSchema,
} from './config.js';
export type {
  ServerConfig,
  ServerConfigLayer,
  ServerConfigSources,
} from './config.js';
export {
  applyDebugArguments,
  exitCodeFor,
  parseArguments,
  startStdioServer,
} from './main.js';
export type { CliArgs } from './main.js';
