import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CompositeLogger } from './CompositeLogger';

describe('CompositeLogger', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'composite-logs-'));
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(logDir, { recursive: true, force: true });
  });

  it('writes to the console and the log file', async () => {
    const logger = new CompositeLogger({ logDir });
    logger.info('Extracting game files...');
    logger.debug('Removed lol/BIN_0x00000000');
    await logger.close();

    expect(console.info).toHaveBeenCalledWith('Extracting game files...');
    expect(console.debug).not.toHaveBeenCalled();

    const [logFile] = (await fs.promises.readdir(logDir)).filter((name) => name.startsWith('fetch-'));
    const lines = (await fs.promises.readFile(path.join(logDir, logFile), 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[INFO\] Extracting game files\.\.\.$/);
    expect(lines[1]).toMatch(/\[DEBUG\] Removed lol\/BIN_0x00000000$/);
  });

  it('logs to the console only without a log directory', async () => {
    const logger = new CompositeLogger();
    logger.info('console only');
    await logger.close();

    expect(console.info).toHaveBeenCalledWith('console only');
    expect(await fs.promises.readdir(logDir)).toEqual([]);
  });
});
