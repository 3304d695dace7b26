/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import type { RenameParams } from 'vscode-languageserver-protocol';

import type { LanguageClient } from '../src/client/language-client.js';
import { InvalidParamsError } from '../src/dispatch/errors.js';
import {
  LSP_METHODS,
  ROUTES,
  findRoute,
  isLspMethod,
} from '../src/dispatch/routes.js';
import { BaseLanguageServer } from '../src/handler/base-language-server.js';

class EmptyServer extends BaseLanguageServer {}

const client: LanguageClient = {
  publishDiagnostics: vi.fn(),
  showMessage: vi.fn(),
  registerCapability: vi.fn(() => 'registration-1'),
  customNotification: vi.fn(),
};

describe('routes', () => {
  it('covers the thirty recognised methods', () => {
    expect(LSP_METHODS).toHaveLength(30);
    expect(new Set(LSP_METHODS).size).toBe(30);
    expect(Object.keys(ROUTES).sort()).toEqual([...LSP_METHODS].sort());
  });

  it('gives lifecycle control methods their own routes', () => {
    expect(ROUTES.shutdown.kind).toBe('shutdown');
    expect(ROUTES.exit.kind).toBe('exit');
    expect(ROUTES['$/cancelRequest'].kind).toBe('cancel');
    expect(ROUTES.initialize.kind).toBe('request');
    expect(ROUTES.initialized.kind).toBe('notification');
    expect(ROUTES['textDocument/didChange'].kind).toBe('notification');
    expect(ROUTES['textDocument/willSaveWaitUntil'].kind).toBe('request');
  });

  it('does not match unknown names or object prototype keys', () => {
    expect(findRoute('textDocument/semanticTokens/full')).toBeUndefined();
    expect(findRoute('toString')).toBeUndefined();
    expect(isLspMethod('constructor')).toBe(false);
    expect(isLspMethod('codeLens/resolve')).toBe(true);
  });

  it('passes the params object through to the handler', async () => {
    const server = new EmptyServer(client);
    const rename = vi.spyOn(server, 'rename').mockReturnValue({ changes: {} });
    const params: RenameParams = {
      textDocument: { uri: 'file:///work/a.ts' },
      position: { line: 1, character: 4 },
      newName: 'renamed',
    };
    const route = ROUTES['textDocument/rename'];
    if (route.kind !== 'request') {
      throw new Error('expected a request route');
    }

    await expect(route.invoke(server, params)).resolves.toEqual({
      changes: {},
    });
    expect(rename).toHaveBeenCalledWith(params);
  });

  it('rejects params without the shape the method needs', async () => {
    const server = new EmptyServer(client);
    const route = ROUTES['textDocument/didChange'];
    if (route.kind !== 'notification') {
      throw new Error('expected a notification route');
    }

    const error = await route
      .invoke(server, { textDocument: { uri: 'file:///work/a.ts' } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidParamsError);
    expect(error).toHaveProperty(
      'message',
      'Invalid params for textDocument/didChange: textDocument.version: Required; contentChanges: Required',
    );
  });

  it('answers with the base server defaults', async () => {
    const server = new EmptyServer(client);
    const invoke = async (method: keyof typeof ROUTES, params: unknown) => {
      const route = ROUTES[method];
      if (route.kind !== 'request') {
        throw new Error(`${method} is not a request route`);
      }
      return route.invoke(server, params);
    };
    const position = {
      textDocument: { uri: 'file:///work/a.ts' },
      position: { line: 0, character: 0 },
    };

    await expect(
      invoke('initialize', { processId: 1, rootUri: null, capabilities: {} }),
    ).resolves.toEqual({ capabilities: {} });
    await expect(invoke('textDocument/hover', position)).resolves.toBeNull();
    await expect(
      invoke('textDocument/references', {
        ...position,
        context: { includeDeclaration: true },
      }),
    ).resolves.toEqual([]);
    await expect(
      invoke('completionItem/resolve', { label: 'foo', detail: 'bar' }),
    ).resolves.toEqual({ label: 'foo', detail: 'bar' });
    await expect(
      invoke('workspace/symbol', { query: 'Foo' }),
    ).resolves.toEqual([]);
  });
});
