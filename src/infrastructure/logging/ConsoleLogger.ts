/**
 * Console logger implementation
 * Debug output only shows up with `verbose`
 */

import { ILogger } from '../../domain/interfaces';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export class ConsoleLogger implements ILogger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    console.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose) {
      return;
    }
    console.debug(message, ...args);
  }
}
