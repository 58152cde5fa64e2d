/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* eslint-disable no-console */
import * as fs from 'node:fs';
import * as util from 'node:util';

export const DEBUG_LOG_FILE_ENV = 'REQLINE_DEBUG_LOG_FILE';

/**
 * A small, centralized logger for developer-facing debug messages.
 *
 * Every call goes to the matching `console` method. When
 * `REQLINE_DEBUG_LOG_FILE` is set, the formatted message is also appended to
 * that file, which is the only way to see editor diagnostics while the
 * terminal is owned by the UI.
 */
export class DebugLogger {
  private readonly logStream: fs.WriteStream | undefined;

  constructor(logFile: string | undefined = process.env[DEBUG_LOG_FILE_ENV]) {
    this.logStream = logFile
      ? fs.createWriteStream(logFile, {
          flags: 'a',
        })
      : undefined;
    this.logStream?.on('error', (err) => {
      console.error('Error writing to debug log stream:', err);
    });
  }

  private writeToFile(level: string, args: unknown[]) {
    if (this.logStream) {
      const message = util.format(...args);
      const timestamp = new Date().toISOString();
      const logEntry = `[${timestamp}] [${level}] ${message}\n`;
      this.logStream.write(logEntry);
    }
  }

  log(...args: unknown[]): void {
    this.writeToFile('LOG', args);
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('WARN', args);
    console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('ERROR', args);
    console.error(...args);
  }

  debug(...args: unknown[]): void {
    this.writeToFile('DEBUG', args);
    console.debug(...args);
  }
}

export const debugLogger = new DebugLogger();
