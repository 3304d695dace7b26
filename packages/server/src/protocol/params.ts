/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type {
  CodeActionParams,
  CodeLens,
  CodeLensParams,
  CompletionItem,
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
  DocumentLinkParams,
  DocumentSymbolParams,
  FoldingRangeParams,
  HoverParams,
  InitializeParams,
  PrepareRenameParams,
  ReferenceParams,
  RenameParams,
  SignatureHelpParams,
  WillSaveTextDocumentParams,
  WorkspaceSymbolParams,
} from 'vscode-languageserver-protocol';

/**
 * A schema that checks the structural minimum a handler relies on and
 * types the untouched value as the full protocol type.
 */
function conforming<T>(shape: z.ZodTypeAny): z.ZodType<T> {
  return z.custom<T>().superRefine((value, ctx) => {
    const result = shape.safeParse(value);
    if (result.success) {
      return;
    }
    for (const issue of result.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: issue.message,
        path: issue.path,
      });
    }
  });
}

const uinteger = z.number().int().nonnegative();
const position = z.object({ line: uinteger, character: uinteger });
const range = z.object({ start: position, end: position });
const textDocumentIdentifier = z.object({ uri: z.string() });
const textDocumentPosition = z.object({
  textDocument: textDocumentIdentifier,
  position,
});
const documentOnly = z.object({ textDocument: textDocumentIdentifier });

export const cancelParams = z.object({
  id: z.union([z.number().int(), z.string()]),
});

export type CancelParams = z.infer<typeof cancelParams>;

export const initializeParams = conforming<InitializeParams>(
  z.object({
    processId: z.number().int().nullable().optional(),
    rootUri: z.string().nullable().optional(),
    capabilities: z.record(z.unknown()),
  }),
);

export const didChangeWorkspaceFoldersParams =
  conforming<DidChangeWorkspaceFoldersParams>(
    z.object({
      event: z.object({
        added: z.array(z.object({ uri: z.string(), name: z.string() })),
        removed: z.array(z.object({ uri: z.string(), name: z.string() })),
      }),
    }),
  );

export const didChangeConfigurationParams =
  conforming<DidChangeConfigurationParams>(
    z.object({ settings: z.unknown() }),
  );

export const didChangeWatchedFilesParams =
  conforming<DidChangeWatchedFilesParams>(
    z.object({
      changes: z.array(z.object({ uri: z.string(), type: z.number().int() })),
    }),
  );

export const workspaceSymbolParams = conforming<WorkspaceSymbolParams>(
  z.object({ query: z.string() }),
);

export const documentLinkParams =
  conforming<DocumentLinkParams>(documentOnly);

export const didOpenTextDocumentParams = conforming<DidOpenTextDocumentParams>(
  z.object({
    textDocument: z.object({
      uri: z.string(),
      languageId: z.string(),
      version: z.number().int(),
      text: z.string(),
    }),
  }),
);

export const didChangeTextDocumentParams =
  conforming<DidChangeTextDocumentParams>(
    z.object({
      textDocument: z.object({ uri: z.string(), version: z.number().int() }),
      contentChanges: z.array(
        z.object({ text: z.string(), range: range.optional() }),
      ),
    }),
  );

export const willSaveTextDocumentParams =
  conforming<WillSaveTextDocumentParams>(
    z.object({ textDocument: textDocumentIdentifier, reason: z.number().int() }),
  );

export const didSaveTextDocumentParams = conforming<DidSaveTextDocumentParams>(
  z.object({ textDocument: textDocumentIdentifier, text: z.string().optional() }),
);

export const didCloseTextDocumentParams =
  conforming<DidCloseTextDocumentParams>(documentOnly);

export const completionParams =
  conforming<CompletionParams>(textDocumentPosition);

export const completionItem = conforming<CompletionItem>(
  z.object({ label: z.string() }),
);

export const hoverParams = conforming<HoverParams>(textDocumentPosition);

export const signatureHelpParams =
  conforming<SignatureHelpParams>(textDocumentPosition);

export const definitionParams =
  conforming<DefinitionParams>(textDocumentPosition);

export const referenceParams = conforming<ReferenceParams>(
  textDocumentPosition.extend({
    context: z.object({ includeDeclaration: z.boolean() }),
  }),
);

export const documentSymbolParams =
  conforming<DocumentSymbolParams>(documentOnly);

export const codeActionParams = conforming<CodeActionParams>(
  z.object({
    textDocument: textDocumentIdentifier,
    range,
    context: z.object({ diagnostics: z.array(z.unknown()) }),
  }),
);

export const codeLensParams = conforming<CodeLensParams>(documentOnly);

export const codeLens = conforming<CodeLens>(z.object({ range }));

export const prepareRenameParams =
  conforming<PrepareRenameParams>(textDocumentPosition);

export const renameParams = conforming<RenameParams>(
  textDocumentPosition.extend({ newName: z.string() }),
);

export const documentFormattingParams = conforming<DocumentFormattingParams>(
  z.object({
    textDocument: textDocumentIdentifier,
    options: z.object({
      tabSize: uinteger,
      insertSpaces: z.boolean(),
    }),
  }),
);

export const foldingRangeParams =
  conforming<FoldingRangeParams>(documentOnly);
