/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { getProjectConfigPath } from '@lspd/core';
import { z } from 'zod';

import { DEFAULT_POLL_INTERVAL_MS } from './dispatch/dispatcher.js';
import { DEFAULT_QUEUE_CAPACITY } from './queue/pending-queue.js';

export const MAX_QUEUE_CAPACITY = 1024;
export const MAX_POLL_INTERVAL_MS = 60_000;

export const serverConfigSchema = z.object({
  queueCapacity: z.number().int().min(1).max(MAX_QUEUE_CAPACITY),
  pollIntervalMs: z.number().int().min(1).max(MAX_POLL_INTERVAL_MS),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export type ServerConfigLayer = Partial<ServerConfig>;

export const DEFAULT_SERVER_CONFIG: Readonly<ServerConfig> = {
  queueCapacity: DEFAULT_QUEUE_CAPACITY,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
};

const layerSchema = serverConfigSchema.partial();

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface ServerConfigSources {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  cli?: ServerConfigLayer;
}

/**
 * Merges defaults < project `.lspd/config.json` `server` section <
 * `LSPD_QUEUE_CAPACITY` / `LSPD_POLL_INTERVAL_MS` < command line.
 * Throws `ConfigError` for the first layer holding an invalid value.
 */
export function resolveServerConfig(
  sources: ServerConfigSources = {},
): ServerConfig {
  const env = sources.env ?? process.env;
  const projectPath = getProjectConfigPath(sources.cwd ?? process.cwd());

  const layers: Array<[string, unknown]> = [
    [projectPath, readProjectLayer(projectPath)],
    ['environment', readEnvLayer(env)],
    ['command line', sources.cli ?? {}],
  ];

  let config: ServerConfig = { ...DEFAULT_SERVER_CONFIG };
  for (const [source, layer] of layers) {
    config = { ...config, ...validateLayer(source, layer) };
  }
  return config;
}

function validateLayer(source: string, layer: unknown): ServerConfigLayer {
  const result = layerSchema.safeParse(layer);
  if (result.success) {
    return dropUndefined(result.data);
  }
  const [issue] = result.error.issues;
  const field = issue.path.join('.') || '<root>';
  throw new ConfigError(
    `Invalid ${field} in ${source}: ${issue.message}`,
    source,
    { cause: result.error },
  );
}

function dropUndefined(layer: ServerConfigLayer): ServerConfigLayer {
  const out: ServerConfigLayer = {};
  if (layer.queueCapacity !== undefined) {
    out.queueCapacity = layer.queueCapacity;
  }
  if (layer.pollIntervalMs !== undefined) {
    out.pollIntervalMs = layer.pollIntervalMs;
  }
  return out;
}

function readProjectLayer(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      { cause: error },
    );
  }
  if (typeof parsed !== 'object' || parsed === null || !('server' in parsed)) {
    return {};
  }
  return parsed.server ?? {};
}

function readEnvLayer(env: NodeJS.ProcessEnv): Record<string, number> {
  const layer: Record<string, number> = {};
  const queueCapacity = env.LSPD_QUEUE_CAPACITY;
  if (queueCapacity !== undefined && queueCapacity !== '') {
    layer.queueCapacity = toNumber(queueCapacity);
  }
  const pollIntervalMs = env.LSPD_POLL_INTERVAL_MS;
  if (pollIntervalMs !== undefined && pollIntervalMs !== '') {
    layer.pollIntervalMs = toNumber(pollIntervalMs);
  }
  return layer;
}

function toNumber(value: string): number {
  const trimmed = value.trim();
  return trimmed === '' ? Number.NaN : Number(trimmed);
}
