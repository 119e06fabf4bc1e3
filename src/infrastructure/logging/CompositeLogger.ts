/**
 * Composite logger that writes to the console and, when a log directory
 * is given, to log files as well
 */

import { ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from './ConsoleLogger';
import { FileLogger } from './FileLogger';

export interface CompositeLoggerOptions {
  verbose?: boolean;
  logDir?: string;
}

export class CompositeLogger implements ILogger {
  private consoleLogger: ConsoleLogger;
  private fileLogger: FileLogger | null;

  constructor(options: CompositeLoggerOptions = {}) {
    this.consoleLogger = new ConsoleLogger({ verbose: options.verbose });
    this.fileLogger = options.logDir ? new FileLogger(options.logDir) : null;
  }

  log(message: string, ...args: unknown[]): void {
    this.consoleLogger.log(message, ...args);
    this.fileLogger?.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.consoleLogger.error(message, ...args);
    this.fileLogger?.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.consoleLogger.warn(message, ...args);
    this.fileLogger?.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.consoleLogger.info(message, ...args);
    this.fileLogger?.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.consoleLogger.debug(message, ...args);
    this.fileLogger?.debug(message, ...args);
  }

  /**
   * Close file streams (call on application shutdown)
   */
  async close(): Promise<void> {
    await this.fileLogger?.close();
  }
}
