/**
 * Command-line surface: flags, their defaults and the mapping to RunOptions
 */

import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import config from '../../config';
import { DownloadReleaseResponse, RunOptions } from '../../types';

const version = '1.0.0';

export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  PARTIAL: 2,
  CANCELLED: 130
} as const;

export type ProgramOptions = {
  gameVersion: string;
  url: string;
  path: string;
  dest: string;
  individual?: boolean;
  removeExisting?: boolean;
  keepArchives?: boolean;
  jobs: number;
  logDir: string;
  logFile: boolean;
  verbose?: boolean;
};

export interface CliSettings {
  run: RunOptions;
  /** Unset when file logging is switched off */
  logDir?: string;
  verbose: boolean;
}

export function parseJobs(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

export function normalizeDest(value: string): string {
  return value.replace(/\\/g, '/');
}

export function buildProgram(): Command {
  return new Command()
    .name('release-fetcher')
    .description('Download one game client release and rebuild its files from the packed archives')
    .version(version)
    .requiredOption('-v, --game-version <version>', 'release version to fetch, e.g. 0.0.1.7')
    .option('-u, --url <url>', 'origin to download from', config.DOWNLOAD_URL)
    .option('-p, --path <path>', 'path prefix of the release tree on the origin', config.DOWNLOAD_PATH)
    .option('-d, --dest <dir>', 'destination folder', normalizeDest, config.DEST_FOLDER)
    .option('-i, --individual', 'download each file on its own instead of the archives')
    .option('-r, --remove-existing', 'delete files already on disk before downloading them again')
    .option('-k, --keep-archives', 'keep archive files once everything is extracted')
    .option('-j, --jobs <n>', 'archives downloaded and extracted in parallel', parseJobs, config.CONCURRENCY)
    .option('--log-dir <dir>', 'directory for log files', path.join(config.RUNTIME_DIR, 'logs'))
    .option('--no-log-file', 'do not write log files')
    .option('--verbose', 'print debug output');
}

export function toSettings(options: ProgramOptions): CliSettings {
  return {
    run: {
      downloadUrl: options.url,
      downloadPath: options.path,
      gameVersion: options.gameVersion,
      destFolder: options.dest,
      useArchives: !options.individual,
      removeExisting: options.removeExisting ?? false,
      keepArchives: options.keepArchives ?? false,
      concurrency: options.jobs
    },
    logDir: options.logFile ? options.logDir : undefined,
    verbose: options.verbose ?? false
  };
}

export function exitCodeFor(response: DownloadReleaseResponse): number {
  if (response.cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  if (response.success) {
    return EXIT_CODES.SUCCESS;
  }
  return response.report ? EXIT_CODES.PARTIAL : EXIT_CODES.FATAL;
}
