/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import { z } from 'zod';
import {
  LSPD_DIR,
  getProjectConfigPath,
  getUserSettingsPath,
} from '../utils/paths.js';
import { LOG_LEVELS, isLogLevel } from './types.js';
import type { DebugSettings } from './types.js';

const debugSettingsSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.union([z.array(z.string()), z.record(z.unknown())]),
    level: z.enum(['debug', 'info', 'warn', 'error']),
    output: z.union([
      z.string(),
      z.object({ target: z.string(), directory: z.string().optional() }),
    ]),
    redactPatterns: z.array(z.string()),
  })
  .partial();

type DebugSettingsLayer = Partial<DebugSettings>;

export interface ConfigurationSources {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  cwd?: string;
}

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private projectConfig: DebugSettingsLayer | null = null;
  private userConfig: DebugSettingsLayer | null = null;
  private envConfig: DebugSettingsLayer | null = null;
  private cliConfig: DebugSettingsLayer | null = null;
  private ephemeralConfig: DebugSettingsLayer | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;
  private readonly cwd: string;

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the shared instance so the next `getInstance()` re-reads every
   * source. Loggers created before the reset keep the old instance.
   */
  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  constructor(sources: ConfigurationSources = {}) {
    this.env = sources.env ?? process.env;
    this.homeDir = sources.homeDir ?? os.homedir();
    this.cwd = sources.cwd ?? process.cwd();
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'info',
      output: { target: 'stderr', directory: `~/${LSPD_DIR}/debug` },
      redactPatterns: ['token', 'password', 'secret'],
    };
    this.mergedConfig = { ...this.defaultConfig };
    this.loadConfigurations();
    this.mergeConfigurations();
  }

  loadConfigurations(): void {
    this.loadEnvironmentConfig();
    this.userConfig = this.loadFileLayer(getUserSettingsPath(this.homeDir));
    this.projectConfig = this.loadFileLayer(getProjectConfigPath(this.cwd));
  }

  private loadEnvironmentConfig(): void {
    let layer: DebugSettingsLayer | null = null;

    const debugEnv = this.env.DEBUG;
    if (debugEnv) {
      // DEBUG is shared with other tools; only our namespaces switch us on.
      const namespaces = parseNamespaceList(debugEnv).filter(
        (ns) => ns.startsWith('lspd') || ns === '*',
      );
      if (namespaces.length > 0) {
        layer = { enabled: true, namespaces };
      }
    }

    const lspdDebug = this.env.LSPD_DEBUG;
    if (lspdDebug) {
      layer = { enabled: true, namespaces: parseNamespaceList(lspdDebug) };
    }

    const level = this.env.LSPD_DEBUG_LEVEL;
    if (level) {
      if (isLogLevel(level)) {
        layer = { ...layer, level };
      } else {
        console.warn(
          `Ignoring LSPD_DEBUG_LEVEL=${level}; expected one of ${LOG_LEVELS.join(', ')}`,
        );
      }
    }

    const output = this.env.LSPD_DEBUG_OUTPUT;
    if (output) {
      layer = { ...layer, output: { target: output } };
    }

    this.envConfig = layer;
  }

  private loadFileLayer(configPath: string): DebugSettingsLayer | null {
    if (!fs.existsSync(configPath)) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      if (typeof parsed !== 'object' || parsed === null) {
        return null;
      }
      if (!('debug' in parsed) || parsed.debug === undefined) {
        return null;
      }
      const result = debugSettingsSchema.safeParse(parsed.debug);
      if (!result.success) {
        console.warn(
          `Ignoring debug settings in ${configPath}: ${result.error.message}`,
        );
        return null;
      }
      return result.data;
    } catch (error) {
      console.warn(`Failed to load ${configPath}:`, error);
      return null;
    }
  }

  private mergeConfigurations(): void {
    let merged: DebugSettings = { ...this.defaultConfig };
    for (const layer of [
      this.projectConfig,
      this.userConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ]) {
      if (layer) {
        merged = { ...merged, ...layer };
      }
    }
    this.mergedConfig = merged;

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: DebugSettingsLayer): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: DebugSettingsLayer): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    if (typeof output === 'string') {
      return output;
    }
    return output.target;
  }

  getOutputDirectory(): string | undefined {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? undefined : output.directory;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }
}

function parseNamespaceList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
