/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * The byte source closed. Not a fault: the client went away.
 */
export class EndOfStream extends Error {
  constructor(message = 'Stream from client has been closed') {
    super(message);
    this.name = 'EndOfStream';
  }
}

/**
 * A frame could not be read or decoded. The reader does not try to
 * resynchronise after one of these.
 */
export class MalformedFrame extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedFrame';
  }
}
