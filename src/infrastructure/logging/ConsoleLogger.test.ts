/**
 * Unit tests for ConsoleLogger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogger } from './ConsoleLogger';

describe('ConsoleLogger', () => {
  let logger: ConsoleLogger;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;
  let consoleInfoSpy: ReturnType<typeof vi.spyOn>;
  let consoleDebugSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logger = new ConsoleLogger({ verbose: true });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log messages', () => {
    logger.log('Options are:');
    expect(consoleLogSpy).toHaveBeenCalledWith('Options are:');
  });

  it('should log errors', () => {
    logger.error('Archive file not found: lol/BIN_0x00000000');
    expect(consoleErrorSpy).toHaveBeenCalledWith('Archive file not found: lol/BIN_0x00000000');
  });

  it('should log warnings', () => {
    logger.warn('Total sizes don\'t match');
    expect(consoleWarnSpy).toHaveBeenCalledWith('Total sizes don\'t match');
  });

  it('should log info', () => {
    logger.info('Downloading: lol/BIN_0x00000000 (1/1)');
    expect(consoleInfoSpy).toHaveBeenCalledWith('Downloading: lol/BIN_0x00000000 (1/1)');
  });

  it('should log debug when verbose', () => {
    logger.debug('GET http://origin/packagemanifest: status=200');
    expect(consoleDebugSpy).toHaveBeenCalledWith('GET http://origin/packagemanifest: status=200');
  });

  it('should drop debug output by default', () => {
    const quiet = new ConsoleLogger();
    quiet.debug('hidden');
    quiet.info('shown');
    expect(consoleDebugSpy).not.toHaveBeenCalled();
    expect(consoleInfoSpy).toHaveBeenCalledWith('shown');
  });

  it('should handle multiple arguments', () => {
    logger.log('message', { key: 'value' }, 123);
    expect(consoleLogSpy).toHaveBeenCalledWith('message', { key: 'value' }, 123);
  });
});
