import path from 'path';
import { describe, it, expect } from 'vitest';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import config from '../../config';
import { EXIT_CODES, ProgramOptions, buildProgram, exitCodeFor, parseJobs, toSettings } from './program';

function quietProgram(): Command {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

function parse(args: string[]) {
  const program = quietProgram().parse(args, { from: 'user' });
  return toSettings(program.opts<ProgramOptions>());
}

function commanderErrorCode(args: string[]): string {
  try {
    quietProgram().parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code;
    }
    throw error;
  }
  throw new Error('expected the command line to be rejected');
}

describe('CLI program', () => {
  it('falls back to the configured defaults', () => {
    expect(parse(['-v', '0.0.1.7'])).toEqual({
      run: {
        downloadUrl: config.DOWNLOAD_URL,
        downloadPath: config.DOWNLOAD_PATH,
        gameVersion: '0.0.1.7',
        destFolder: config.DEST_FOLDER,
        useArchives: true,
        removeExisting: false,
        keepArchives: false,
        concurrency: config.CONCURRENCY
      },
      logDir: path.join(config.RUNTIME_DIR, 'logs'),
      verbose: false
    });
  });

  it('maps every flag onto the run options', () => {
    const settings = parse([
      '--game-version', '1.2',
      '-u', 'cdn.example.test',
      '-p', '/releases/pbe',
      '-d', 'C:\\games\\lol',
      '-i', '-r', '-k',
      '-j', '4',
      '--no-log-file',
      '--verbose'
    ]);

    expect(settings).toEqual({
      run: {
        downloadUrl: 'cdn.example.test',
        downloadPath: '/releases/pbe',
        gameVersion: '1.2',
        destFolder: 'C:/games/lol',
        useArchives: false,
        removeExisting: true,
        keepArchives: true,
        concurrency: 4
      },
      logDir: undefined,
      verbose: true
    });
  });

  it('requires a version', () => {
    expect(commanderErrorCode(['-d', 'lol'])).toBe('commander.missingMandatoryOptionValue');
  });

  it('rejects a job count that is not a positive integer', () => {
    expect(commanderErrorCode(['-v', '1.0', '-j', '0'])).toBe('commander.invalidArgument');
    expect(() => parseJobs('two')).toThrow(InvalidArgumentError);
    expect(parseJobs('8')).toBe(8);
  });

  it('maps run results to exit codes', () => {
    const report = {
      mode: 'archives' as const,
      statistics: { fileCount: 1, archiveCount: 1, fileBytes: 1, archiveBytes: 1, maxLineLength: 1 },
      archivesTransferred: 1,
      archivesRemoved: 0,
      filesCompleted: 0,
      filesSkipped: 0,
      failures: [{ target: 'lol/a.txt', error: 'bad data' }]
    };

    expect(exitCodeFor({ success: true, report })).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeFor({ success: false, report })).toBe(EXIT_CODES.PARTIAL);
    expect(exitCodeFor({ success: false, error: 'Invalid header' })).toBe(EXIT_CODES.FATAL);
    expect(exitCodeFor({ success: false, cancelled: true, error: 'Run cancelled' })).toBe(EXIT_CODES.CANCELLED);
  });
});
