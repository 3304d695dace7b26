/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { stderr } from 'node:process';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  ConfigurationManager,
  DebugLogger,
  FileOutput,
  type DebugSettings,
} from '@lspd/core';

import { ConfigError, resolveServerConfig, type ServerConfig } from './config.js';
import { connect } from './dispatch/connection.js';
import type { ConnectionOutcome } from './dispatch/dispatcher.js';
import type { LanguageServerFactory } from './handler/language-server.js';

export interface CliArgs {
  queueCapacity: number | undefined;
  pollIntervalMs: number | undefined;
  debug: string | undefined;
  logFile: boolean | undefined;
}

export async function parseArguments(argv: string[]): Promise<CliArgs> {
  const result = await yargs(argv)
    .locale('en')
    .scriptName('lspd')
    .usage('$0 [options]\n\nServe the Language Server Protocol on stdin/stdout')
    .option('queue-capacity', {
      type: 'number',
      description: 'Messages buffered between the reader and the dispatcher',
    })
    .option('poll-interval-ms', {
      type: 'number',
      description: 'Idle time before the background work hook runs',
    })
    .option('debug', {
      type: 'string',
      description: 'Comma-separated debug namespaces to enable, e.g. lspd:*',
    })
    .option('log-file', {
      type: 'boolean',
      description: 'Also write debug output to a JSONL file under ~/.lspd/debug',
    })
    .help()
    .alias('h', 'help')
    .strict()
    .parseAsync();

  return {
    queueCapacity: result.queueCapacity,
    pollIntervalMs: result.pollIntervalMs,
    debug: result.debug,
    logFile: result.logFile,
  };
}

/**
 * Turns `--debug` and `--log-file` into the command-line layer of the
 * debug configuration. Leaves the layer untouched when neither is given.
 */
export function applyDebugArguments(
  args: CliArgs,
  configManager: ConfigurationManager,
): void {
  const layer: Partial<DebugSettings> = {};
  if (args.debug !== undefined) {
    const namespaces = args.debug
      .split(',')
      .map((ns) => ns.trim())
      .filter(Boolean);
    layer.enabled = namespaces.length > 0;
    layer.namespaces = namespaces;
  }
  if (args.logFile) {
    const target = configManager.getOutputTarget();
    const targets = target.split(',').map((t) => t.trim());
    layer.output = {
      target: targets.includes('file') ? target : `${target},file`,
      directory: configManager.getOutputDirectory(),
    };
  }
  if (Object.keys(layer).length > 0) {
    configManager.setCliConfig(layer);
  }
}

/**
 * 0 only for an `exit` that followed `shutdown`; 1 for every other ending.
 */
export function exitCodeFor(outcome: ConnectionOutcome): number {
  return outcome.reason === 'exit' && outcome.shutdownRequested ? 0 : 1;
}

async function flushLogs(): Promise<void> {
  DebugLogger.disposeAll();
  await FileOutput.getInstance().dispose();
}

const fatal = async (message: string): Promise<never> => {
  stderr.write(`${message}\n`);
  await flushLogs();
  process.exit(1);
};

/**
 * Parses the command line, serves one client on stdin/stdout and exits the
 * process with the LSP exit code once the connection ends.
 */
export async function startStdioServer(
  factory: LanguageServerFactory,
  argv: string[] = hideBin(process.argv),
): Promise<never> {
  const args = await parseArguments(argv);
  applyDebugArguments(args, ConfigurationManager.getInstance());
  const logger = DebugLogger.getLogger('lspd:main');

  let config: ServerConfig;
  try {
    config = resolveServerConfig({
      cli: {
        queueCapacity: args.queueCapacity,
        pollIntervalMs: args.pollIntervalMs,
      },
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      return fatal(error.message);
    }
    throw error;
  }

  logger.debug(
    () =>
      `Starting with queue capacity ${config.queueCapacity}, poll interval ${config.pollIntervalMs}ms`,
  );
  const outcome = await connect(factory, process.stdin, process.stdout, config);
  const code = exitCodeFor(outcome);
  if (outcome.error) {
    logger.error(() => `Connection failed: ${outcome.error?.message ?? ''}`);
  }
  logger.log(
    () =>
      `Connection ended (${outcome.reason}, shutdown ${
        outcome.shutdownRequested ? 'requested' : 'not requested'
      }); exiting with ${code}`,
  );
  await flushLogs();
  process.exit(code);
}
