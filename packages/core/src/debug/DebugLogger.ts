/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { format } from 'node:util';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import { LOG_LEVELS } from './types.js';
import type { LogEntry, LogLevel, Logger } from './types.js';

// stdout belongs to the protocol; debug output must never reach it.
createDebug.log = (...args: unknown[]) => {
  process.stderr.write(`${format(...args)}\n`);
};

export interface DebugLoggerOptions {
  configManager?: ConfigurationManager;
  fileOutput?: FileOutput;
}

export class DebugLogger implements Logger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _fileOutput: FileOutput;
  private _enabled: boolean;
  private levelOverride: LogLevel | undefined;
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for `namespace`, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string, options: DebugLoggerOptions = {}) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    // Enablement is decided here, not by the DEBUG variable.
    this.debugInstance.enabled = true;
    this._configManager =
      options.configManager ?? ConfigurationManager.getInstance();
    this._fileOutput =
      options.fileOutput ??
      FileOutput.getInstance(this._configManager.getOutputDirectory());
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): LogLevel {
    return (
      this.levelOverride ?? this._configManager.getEffectiveConfig().level
    );
  }

  set level(value: LogLevel) {
    this.levelOverride = value;
  }

  get configManager(): ConfigurationManager {
    return this._configManager;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('info', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this._enabled) {
      return;
    }
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      runId: this._fileOutput.runId,
      pid: process.pid,
    };

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      void this._fileOutput.write(logEntry);
    }

    if (target.includes('stderr')) {
      this.debugInstance(`[${level}] ${message}`, ...args);
    }
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    const namespaces = Array.isArray(config.namespaces)
      ? config.namespaces
      : Object.keys(config.namespaces);

    return namespaces.some((pattern) =>
      matchesPattern(this._namespace, pattern),
    );
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
  }

  async dispose(): Promise<void> {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
    await this._fileOutput.flush();
  }
}

/**
 * Exact match, or `*` wildcards anywhere in the pattern.
 */
export function matchesPattern(namespace: string, pattern: string): boolean {
  if (pattern === namespace) {
    return true;
  }
  if (!pattern.includes('*')) {
    return false;
  }
  const regexPattern = pattern
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');
  return new RegExp(`^${regexPattern}$`).test(namespace);
}
