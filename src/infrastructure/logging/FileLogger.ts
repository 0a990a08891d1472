/**
 * File logger implementation
 * Appends every entry to app-<date>.log, errors also to error-<date>.log
 */

import fs from 'fs';
import path from 'path';
import { inspect } from 'util';
import { ILogger } from '../../domain/interfaces';
import { LogLevel } from '../../config';
import { LOG_LEVEL_ORDER } from './ConsoleLogger';

type EntryLevel = LogLevel | 'log';

export class FileLogger implements ILogger {
  private appStream: fs.WriteStream | null;
  private errorStream: fs.WriteStream | null;
  readonly appFile: string;
  readonly errorFile: string;

  constructor(
    logDir: string,
    private readonly minLevel: LogLevel = 'debug'
  ) {
    fs.mkdirSync(logDir, { recursive: true });

    const day = new Date().toISOString().slice(0, 10);
    this.appFile = path.join(logDir, `app-${day}.log`);
    this.errorFile = path.join(logDir, `error-${day}.log`);

    this.appStream = this.open(this.appFile);
    this.errorStream = this.open(this.errorFile);
  }

  log(message: string, ...args: unknown[]): void {
    this.write(this.appStream, 'log', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(this.appStream, 'error', message, args);
    this.write(this.errorStream, 'error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(this.appStream, 'warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(this.appStream, 'info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(this.appStream, 'debug', message, args);
  }

  /**
   * Flushes and closes both files (call on application shutdown)
   */
  close(): void {
    this.appStream?.end();
    this.errorStream?.end();
    this.appStream = null;
    this.errorStream = null;
  }

  static format(level: EntryLevel, message: string, args: unknown[], now: Date = new Date()): string {
    const rendered = args
      .map((arg) => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity })))
      .join(' ');
    return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${rendered ? ' ' + rendered : ''}\n`;
  }

  private open(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    // A broken log file must not take the process down; report once on stderr
    stream.once('error', (err) => {
      console.error(`FileLogger: cannot write ${file}:`, err);
    });
    return stream;
  }

  private write(stream: fs.WriteStream | null, level: EntryLevel, message: string, args: unknown[]): void {
    if (!stream || !stream.writable) {
      return;
    }
    if (level !== 'log' && LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.minLevel]) {
      return;
    }
    stream.write(FileLogger.format(level, message, args));
  }
}
