/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { ConfigurationManager } from './ConfigurationManager.js';
export type { ConfigurationSources } from './ConfigurationManager.js';
export { DebugLogger, matchesPattern } from './DebugLogger.js';
export type { DebugLoggerOptions } from './DebugLogger.js';
export { FileOutput } from './FileOutput.js';
export type { FileOutputOptions } from './FileOutput.js';
export { LOG_LEVELS, isLogLevel } from './types.js';
export type {
  DebugOutputConfig,
  DebugSettings,
  LogEntry,
  LogLevel,
  Logger,
} from './types.js';
