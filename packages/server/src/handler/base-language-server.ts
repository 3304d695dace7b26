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
import type { Awaitable, LanguageServer } from './language-server.js';

/**
 * Answers every method with an empty result so a concrete server only
 * overrides what it actually provides. Advertise the matching capabilities
 * from `initialize`.
 */
export abstract class BaseLanguageServer implements LanguageServer {
  constructor(protected readonly client: LanguageClient) {}

  initialize(_params: InitializeParams): Awaitable<InitializeResult> {
    return { capabilities: {} };
  }

  initialized(): Awaitable<void> {}

  shutdown(): Awaitable<void> {}

  didChangeWorkspaceFolders(
    _params: DidChangeWorkspaceFoldersParams,
  ): Awaitable<void> {}

  didChangeConfiguration(
    _params: DidChangeConfigurationParams,
  ): Awaitable<void> {}

  didChangeWatchedFiles(_params: DidChangeWatchedFilesParams): Awaitable<void> {}

  workspaceSymbols(
    _params: WorkspaceSymbolParams,
  ): Awaitable<SymbolInformation[] | WorkspaceSymbol[] | null> {
    return [];
  }

  documentLink(_params: DocumentLinkParams): Awaitable<DocumentLink[] | null> {
    return [];
  }

  didOpenTextDocument(_params: DidOpenTextDocumentParams): Awaitable<void> {}

  didChangeTextDocument(
    _params: DidChangeTextDocumentParams,
  ): Awaitable<void> {}

  willSaveTextDocument(_params: WillSaveTextDocumentParams): Awaitable<void> {}

  willSaveWaitUntilTextDocument(
    _params: WillSaveTextDocumentParams,
  ): Awaitable<TextEdit[] | null> {
    return [];
  }

  didSaveTextDocument(_params: DidSaveTextDocumentParams): Awaitable<void> {}

  didCloseTextDocument(_params: DidCloseTextDocumentParams): Awaitable<void> {}

  completion(
    _params: CompletionParams,
  ): Awaitable<CompletionItem[] | CompletionList | null> {
    return null;
  }

  resolveCompletionItem(item: CompletionItem): Awaitable<CompletionItem> {
    return item;
  }

  hover(_params: HoverParams): Awaitable<Hover | null> {
    return null;
  }

  signatureHelp(_params: SignatureHelpParams): Awaitable<SignatureHelp | null> {
    return null;
  }

  gotoDefinition(
    _params: DefinitionParams,
  ): Awaitable<Location | Location[] | LocationLink[] | null> {
    return [];
  }

  findReferences(_params: ReferenceParams): Awaitable<Location[] | null> {
    return [];
  }

  documentSymbol(
    _params: DocumentSymbolParams,
  ): Awaitable<DocumentSymbol[] | SymbolInformation[] | null> {
    return [];
  }

  codeAction(
    _params: CodeActionParams,
  ): Awaitable<Array<Command | CodeAction> | null> {
    return [];
  }

  codeLens(_params: CodeLensParams): Awaitable<CodeLens[] | null> {
    return [];
  }

  resolveCodeLens(codeLens: CodeLens): Awaitable<CodeLens> {
    return codeLens;
  }

  prepareRename(
    _params: PrepareRenameParams,
  ): Awaitable<PrepareRenameResult | null> {
    return null;
  }

  rename(_params: RenameParams): Awaitable<WorkspaceEdit | null> {
    return null;
  }

  formatting(_params: DocumentFormattingParams): Awaitable<TextEdit[] | null> {
    return [];
  }

  foldingRange(_params: FoldingRangeParams): Awaitable<FoldingRange[] | null> {
    return [];
  }

  doAsyncWork(): Awaitable<void> {}
}
