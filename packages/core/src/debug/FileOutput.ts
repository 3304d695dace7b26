/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { LSPD_DIR, expandHome } from '../utils/paths.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

export interface FileOutputOptions {
  directory?: string;
  runId?: string;
  maxFileSize?: number;
  flushIntervalMs?: number;
}

/**
 * Batched JSONL sink for log entries. Writes are queued and flushed either
 * when a batch fills or on a timer; failures are reported on stderr and the
 * entries are retried on the next flush.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private readonly debugDir: string;
  private currentLogFile = '';
  private currentLogDay = '';
  private rotations = 0;
  private writeQueue: LogEntry[] = [];
  private writing: Promise<void> | null = null;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private readonly maxFileSize: number;
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly flushInterval: number;
  private readonly debugRunId: string;

  constructor(options: FileOutputOptions = {}) {
    const home = homedir();
    this.debugDir = options.directory
      ? expandHome(options.directory, home || process.cwd())
      : join(home || process.cwd(), LSPD_DIR, 'debug');
    this.debugRunId =
      options.runId ?? process.env.LSPD_DEBUG_RUN_ID ?? String(process.pid);
    this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024;
    this.flushInterval = options.flushIntervalMs ?? 1000;
    this.openLogFile(new Date());
  }

  static getInstance(directory?: string): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput({ directory });
    }
    return FileOutput.instance;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  get pendingEntries(): number {
    return this.writeQueue.length;
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize) {
      await this.flushQueue();
      return;
    }
    this.startFlushTimer();
  }

  /**
   * Writes everything queued so far. Safe to call repeatedly.
   */
  async flush(): Promise<void> {
    while (this.writeQueue.length > 0) {
      if (this.writing) {
        await this.writing;
        continue;
      }
      const before = this.writeQueue.length;
      await this.flushQueue();
      if (this.writeQueue.length >= before) {
        // Nothing was written; the failure has been reported.
        return;
      }
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flush();
    this.disposed = true;
    if (FileOutput.instance === this) {
      FileOutput.instance = undefined;
    }
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    this.flushTimeout.unref();
  }

  private flushQueue(): Promise<void> {
    if (this.writing) {
      return this.writing;
    }
    if (this.writeQueue.length === 0 || this.disposed) {
      return Promise.resolve();
    }
    this.writing = this.writeBatch().finally(() => {
      this.writing = null;
    });
    return this.writing;
  }

  private async writeBatch(): Promise<void> {
    let entriesToWrite: LogEntry[] = [];

    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      await this.checkFileRotation();

      entriesToWrite = this.writeQueue.splice(0, this.batchSize);
      if (entriesToWrite.length === 0) {
        return;
      }

      const jsonlData =
        entriesToWrite.map((entry) => JSON.stringify(entry)).join('\n') + '\n';

      await fs.appendFile(this.currentLogFile, jsonlData, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      console.error('FileOutput: Failed to write log entries:', error);

      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entriesToWrite);
      }
    }
  }

  /**
   * Moves to a fresh file once the current one reaches `maxFileSize` or the
   * local date has changed since it was opened.
   */
  private async checkFileRotation(): Promise<void> {
    const now = new Date();
    if (now.toDateString() !== this.currentLogDay) {
      this.rotate(now);
      return;
    }

    const stats = await fs.stat(this.currentLogFile).catch(() => null);
    if (stats && stats.size >= this.maxFileSize) {
      this.rotate(now);
    }
  }

  private rotate(now: Date): void {
    this.rotations += 1;
    this.openLogFile(now);
  }

  private openLogFile(now: Date): void {
    this.currentLogDay = now.toDateString();
    this.currentLogFile = this.generateLogFileName(now);
  }

  private generateLogFileName(now: Date): string {
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    const millis = String(now.getMilliseconds()).padStart(3, '0');
    // Rotation can happen within the same millisecond.
    const sequence = this.rotations > 0 ? `.${this.rotations}` : '';
    return join(
      this.debugDir,
      `lspd-debug-${this.debugRunId}-${datePart}-${timePart}-${millis}${sequence}.jsonl`,
    );
  }
}
