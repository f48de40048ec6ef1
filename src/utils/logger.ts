/**
 * File logger
 *
 * Appends `<ISO timestamp> <LEVEL>:<message>` lines to a log file.
 * Optionally echoes each line to stderr, coloured by level.
 */

import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { Logger, LogLevel } from '../types/index.js';
import { getErrorMessage } from './errors.js';

export interface FileLoggerOptions {
  /** Also write every line to stderr */
  echo?: boolean;

  /** Clock override for tests */
  now?: () => Date;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  INFO: chalk.gray,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
};

export function formatLogLine(level: LogLevel, message: string, timestamp: Date): string {
  return `${timestamp.toISOString()} ${level}:${message}`;
}

export function formatException(error: unknown, context?: string): string {
  const detail =
    error instanceof Error ? (error.stack ?? `${error.name}: ${error.message}`) : getErrorMessage(error);
  return context ? `${context}\n${detail}` : detail;
}

export class FileLogger implements Logger {
  private readonly logFile: string;
  private readonly echo: boolean;
  private readonly now: () => Date;
  private dirReady = false;

  constructor(logFile: string, options: FileLoggerOptions = {}) {
    this.logFile = logFile;
    this.echo = options.echo ?? false;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARNING', message);
  }

  error(message: string): void {
    this.write('ERROR', message);
  }

  exception(error: unknown, context?: string): void {
    this.write('ERROR', formatException(error, context));
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message, this.now());
    if (!this.dirReady) {
      mkdirSync(path.dirname(this.logFile), { recursive: true });
      this.dirReady = true;
    }
    appendFileSync(this.logFile, `${line}\n`, 'utf-8');

    if (this.echo) {
      process.stderr.write(`${LEVEL_COLORS[level](line)}\n`);
    }
  }
}
