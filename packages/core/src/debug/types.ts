/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
];

export interface DebugOutputConfig {
  target: string;
  directory?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[] | Record<string, unknown>;
  level: LogLevel;
  output: DebugOutputConfig | string;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}

/**
 * The logging surface components depend on. `DebugLogger` implements it;
 * tests substitute recorders.
 */
export interface Logger {
  debug(messageOrFn: string | (() => string), ...args: unknown[]): void;
  log(messageOrFn: string | (() => string), ...args: unknown[]): void;
  warn(messageOrFn: string | (() => string), ...args: unknown[]): void;
  error(messageOrFn: string | (() => string), ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' &&
    LOG_LEVELS.some((level) => level === value)
  );
}
