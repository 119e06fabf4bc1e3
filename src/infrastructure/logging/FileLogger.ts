/**
 * File logger implementation
 * Appends every run's log lines to files in the log directory; never prints
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../../domain/interfaces';

export class FileLogger implements ILogger {
  readonly logFile: string;
  readonly errorFile: string;
  private writeStream: fs.WriteStream | null = null;
  private errorStream: fs.WriteStream | null = null;

  constructor(logDir: string, now: Date = new Date()) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const day = now.toISOString().split('T')[0];
    this.logFile = path.join(logDir, `fetch-${day}.log`);
    this.errorFile = path.join(logDir, `error-${day}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
    });
  }

  static formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === 'object' && arg !== null) {
      return JSON.stringify(arg);
    }
    return String(arg);
  }

  static formatLine(timestamp: string, level: string, message: string, args: unknown[]): string {
    const argsStr = args.length > 0 ? ' ' + args.map((arg) => FileLogger.formatArg(arg)).join(' ') : '';
    return `[${timestamp}] [${level}] ${message}${argsStr}\n`;
  }

  private writeToFile(stream: fs.WriteStream | null, level: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(FileLogger.formatLine(new Date().toISOString(), level, message, args));
  }

  log(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.writeToFile(this.errorStream, 'ERROR', message, args);
    this.writeToFile(this.writeStream, 'ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'DEBUG', message, args);
  }

  /**
   * Flushes and closes both files
   */
  async close(): Promise<void> {
    const streams = [this.writeStream, this.errorStream];
    this.writeStream = null;
    this.errorStream = null;
    await Promise.all(
      streams.map(
        (stream) =>
          new Promise<void>((resolve) => {
            if (!stream || stream.destroyed) {
              resolve();
              return;
            }
            stream.end(() => resolve());
          })
      )
    );
  }
}
