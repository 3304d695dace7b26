/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CodeAction,
  CodeActionParams,
  CodeLens,
  CodeLensParams,
  Command,
  CompletionItem,
  CompletionList,
  CompletionParams,
  DefinitionParams,
  DidChangeConfigurationParams,
  DidChangeTextDocumentParams,
  DidChangeWatchedFilesParams,
  DidChangeWorkspaceFoldersParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  DidSaveTextDocumentParams,
  DocumentFormattingParams,
  DocumentLink,
  DocumentLinkParams,
  DocumentSymbol,
  DocumentSymbolParams,
  FoldingRange,
  FoldingRangeParams,
  Hover,
  HoverParams,
  InitializeParams,
  InitializeResult,
  Location,
  LocationLink,
  PrepareRenameParams,
  PrepareRenameResult,
  ReferenceParams,
  RenameParams,
  SignatureHelp,
  SignatureHelpParams,
  SymbolInformation,
  TextEdit,
  WillSaveTextDocumentParams,
  WorkspaceEdit,
  WorkspaceSymbol,
  WorkspaceSymbolParams,
} from 'vscode-languageserver-protocol';

import type { LanguageClient } from '../client/language-client.js';

export type Awaitable<T> = T | Promise<T>;

/**
 * What the dispatcher calls into: one operation per routed method plus the
 * idle hook. Every call happens on the dispatch loop, one at a time, so an
 * implementation never sees two of its operations overlap.
 *
 * Operations may throw (or reject). For requests the failure becomes an
 * error response; for notifications it is logged.
 */
export interface LanguageServer {
  initialize(params: InitializeParams): Awaitable<InitializeResult>;
  initialized(): Awaitable<void>;
  shutdown(): Awaitable<void>;

  didChangeWorkspaceFolders(
    params: DidChangeWorkspaceFoldersParams,
  ): Awaitable<void>;
  didChangeConfiguration(params: DidChangeConfigurationParams): Awaitable<void>;
  didChangeWatchedFiles(params: DidChangeWatchedFilesParams): Awaitable<void>;
  workspaceSymbols(
    params: WorkspaceSymbolParams,
  ): Awaitable<SymbolInformation[] | WorkspaceSymbol[] | null>;

  documentLink(params: DocumentLinkParams): Awaitable<DocumentLink[] | null>;
  didOpenTextDocument(params: DidOpenTextDocumentParams): Awaitable<void>;
  didChangeTextDocument(params: DidChangeTextDocumentParams): Awaitable<void>;
  willSaveTextDocument(params: WillSaveTextDocumentParams): Awaitable<void>;
  willSaveWaitUntilTextDocument(
    params: WillSaveTextDocumentParams,
  ): Awaitable<TextEdit[] | null>;
  didSaveTextDocument(params: DidSaveTextDocumentParams): Awaitable<void>;
  didCloseTextDocument(params: DidCloseTextDocumentParams): Awaitable<void>;

  completion(
    params: CompletionParams,
  ): Awaitable<CompletionItem[] | CompletionList | null>;
  resolveCompletionItem(item: CompletionItem): Awaitable<CompletionItem>;
  hover(params: HoverParams): Awaitable<Hover | null>;
  signatureHelp(params: SignatureHelpParams): Awaitable<SignatureHelp | null>;
  gotoDefinition(
    params: DefinitionParams,
  ): Awaitable<Location | Location[] | LocationLink[] | null>;
  findReferences(params: ReferenceParams): Awaitable<Location[] | null>;
  documentSymbol(
    params: DocumentSymbolParams,
  ): Awaitable<DocumentSymbol[] | SymbolInformation[] | null>;
  codeAction(
    params: CodeActionParams,
  ): Awaitable<Array<Command | CodeAction> | null>;
  codeLens(params: CodeLensParams): Awaitable<CodeLens[] | null>;
  resolveCodeLens(codeLens: CodeLens): Awaitable<CodeLens>;
  prepareRename(
    params: PrepareRenameParams,
  ): Awaitable<PrepareRenameResult | null>;
  rename(params: RenameParams): Awaitable<WorkspaceEdit | null>;
  formatting(params: DocumentFormattingParams): Awaitable<TextEdit[] | null>;
  foldingRange(params: FoldingRangeParams): Awaitable<FoldingRange[] | null>;

  /**
   * Called whenever the queue stays empty for a full poll interval. Must be
   * safe to call any number of times; keep each call short, since nothing
   * else is dispatched while it runs.
   */
  doAsyncWork(): Awaitable<void>;
}

export type LanguageServerFactory = (client: LanguageClient) => LanguageServer;
