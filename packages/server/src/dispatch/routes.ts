/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { z } from 'zod';

import type {
  Awaitable,
  LanguageServer,
} from '../handler/language-server.js';
import * as params from '../protocol/params.js';
import { InvalidParamsError } from './errors.js';

/**
 * How the dispatcher treats a recognised method. Requests produce a
 * response, notifications run for effect, and the control routes change
 * the dispatcher's own state.
 */
export type Route =
  | {
      kind: 'request';
      invoke(server: LanguageServer, params: unknown): Promise<unknown>;
    }
  | {
      kind: 'notification';
      invoke(server: LanguageServer, params: unknown): Promise<void>;
    }
  | { kind: 'shutdown' }
  | { kind: 'exit' }
  | { kind: 'cancel' };

export const LSP_METHODS = [
  'initialize',
  'initialized',
  'shutdown',
  'exit',
  '$/cancelRequest',
  'workspace/didChangeWorkspaceFolders',
  'workspace/didChangeConfiguration',
  'workspace/didChangeWatchedFiles',
  'workspace/symbol',
  'textDocument/documentLink',
  'textDocument/didOpen',
  'textDocument/didChange',
  'textDocument/willSave',
  'textDocument/willSaveWaitUntil',
  'textDocument/didSave',
  'textDocument/didClose',
  'textDocument/completion',
  'completionItem/resolve',
  'textDocument/hover',
  'textDocument/signatureHelp',
  'textDocument/definition',
  'textDocument/references',
  'textDocument/documentSymbol',
  'textDocument/codeAction',
  'textDocument/codeLens',
  'codeLens/resolve',
  'textDocument/prepareRename',
  'textDocument/rename',
  'textDocument/formatting',
  'textDocument/foldingRange',
] as const;

export type LspMethod = (typeof LSP_METHODS)[number];

export const CANCEL_METHOD = '$/cancelRequest' satisfies LspMethod;

function decode<P>(method: string, schema: z.ZodType<P>, value: unknown): P {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidParamsError(method, result.error);
  }
  return result.data;
}

function request<P>(
  method: LspMethod,
  schema: z.ZodType<P>,
  handle: (server: LanguageServer, params: P) => Awaitable<unknown>,
): Route {
  return {
    kind: 'request',
    invoke: async (server, value) =>
      handle(server, decode(method, schema, value)),
  };
}

function notification<P>(
  method: LspMethod,
  schema: z.ZodType<P>,
  handle: (server: LanguageServer, params: P) => Awaitable<void>,
): Route {
  return {
    kind: 'notification',
    invoke: async (server, value) => {
      await handle(server, decode(method, schema, value));
    },
  };
}

/**
 * Every recognised method and how it is handled. Typed as a total record,
 * so adding a name to `LSP_METHODS` without a route fails to compile.
 */
export const ROUTES: { readonly [M in LspMethod]: Route } = {
  initialize: request('initialize', params.initializeParams, (s, p) =>
    s.initialize(p),
  ),
  initialized: {
    kind: 'notification',
    invoke: async (server) => {
      await server.initialized();
    },
  },
  shutdown: { kind: 'shutdown' },
  exit: { kind: 'exit' },
  '$/cancelRequest': { kind: 'cancel' },
  'workspace/didChangeWorkspaceFolders': notification(
    'workspace/didChangeWorkspaceFolders',
    params.didChangeWorkspaceFoldersParams,
    (s, p) => s.didChangeWorkspaceFolders(p),
  ),
  'workspace/didChangeConfiguration': notification(
    'workspace/didChangeConfiguration',
    params.didChangeConfigurationParams,
    (s, p) => s.didChangeConfiguration(p),
  ),
  'workspace/didChangeWatchedFiles': notification(
    'workspace/didChangeWatchedFiles',
    params.didChangeWatchedFilesParams,
    (s, p) => s.didChangeWatchedFiles(p),
  ),
  'workspace/symbol': request(
    'workspace/symbol',
    params.workspaceSymbolParams,
    (s, p) => s.workspaceSymbols(p),
  ),
  'textDocument/documentLink': request(
    'textDocument/documentLink',
    params.documentLinkParams,
    (s, p) => s.documentLink(p),
  ),
  'textDocument/didOpen': notification(
    'textDocument/didOpen',
    params.didOpenTextDocumentParams,
    (s, p) => s.didOpenTextDocument(p),
  ),
  'textDocument/didChange': notification(
    'textDocument/didChange',
    params.didChangeTextDocumentParams,
    (s, p) => s.didChangeTextDocument(p),
  ),
  'textDocument/willSave': notification(
    'textDocument/willSave',
    params.willSaveTextDocumentParams,
    (s, p) => s.willSaveTextDocument(p),
  ),
  'textDocument/willSaveWaitUntil': request(
    'textDocument/willSaveWaitUntil',
    params.willSaveTextDocumentParams,
    (s, p) => s.willSaveWaitUntilTextDocument(p),
  ),
  'textDocument/didSave': notification(
    'textDocument/didSave',
    params.didSaveTextDocumentParams,
    (s, p) => s.didSaveTextDocument(p),
  ),
  'textDocument/didClose': notification(
    'textDocument/didClose',
    params.didCloseTextDocumentParams,
    (s, p) => s.didCloseTextDocument(p),
  ),
  'textDocument/completion': request(
    'textDocument/completion',
    params.completionParams,
    (s, p) => s.completion(p),
  ),
  'completionItem/resolve': request(
    'completionItem/resolve',
    params.completionItem,
    (s, p) => s.resolveCompletionItem(p),
  ),
  'textDocument/hover': request(
    'textDocument/hover',
    params.hoverParams,
    (s, p) => s.hover(p),
  ),
  'textDocument/signatureHelp': request(
    'textDocument/signatureHelp',
    params.signatureHelpParams,
    (s, p) => s.signatureHelp(p),
  ),
  'textDocument/definition': request(
    'textDocument/definition',
    params.definitionParams,
    (s, p) => s.gotoDefinition(p),
  ),
  'textDocument/references': request(
    'textDocument/references',
    params.referenceParams,
    (s, p) => s.findReferences(p),
  ),
  'textDocument/documentSymbol': request(
    'textDocument/documentSymbol',
    params.documentSymbolParams,
    (s, p) => s.documentSymbol(p),
  ),
  'textDocument/codeAction': request(
    'textDocument/codeAction',
    params.codeActionParams,
    (s, p) => s.codeAction(p),
  ),
  'textDocument/codeLens': request(
    'textDocument/codeLens',
    params.codeLensParams,
    (s, p) => s.codeLens(p),
  ),
  'codeLens/resolve': request(
    'codeLens/resolve',
    params.codeLens,
    (s, p) => s.resolveCodeLens(p),
  ),
  'textDocument/prepareRename': request(
    'textDocument/prepareRename',
    params.prepareRenameParams,
    (s, p) => s.prepareRename(p),
  ),
  'textDocument/rename': request(
    'textDocument/rename',
    params.renameParams,
    (s, p) => s.rename(p),
  ),
  'textDocument/formatting': request(
    'textDocument/formatting',
    params.documentFormattingParams,
    (s, p) => s.formatting(p),
  ),
  'textDocument/foldingRange': request(
    'textDocument/foldingRange',
    params.foldingRangeParams,
    (s, p) => s.foldingRange(p),
  ),
};

export function isLspMethod(method: string): method is LspMethod {
  return Object.prototype.hasOwnProperty.call(ROUTES, method);
}

export function findRoute(method: string): Route | undefined {
  return isLspMethod(method) ? ROUTES[method] : undefined;
}
