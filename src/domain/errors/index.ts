/**
 * Error types raised during a run
 *
 * `fatal` errors abort the whole run. Local errors abort a single resource;
 * they are logged, recorded in the run report and the run moves on.
 */

import { ManifestParseError } from '../value-objects/ManifestParseError';

export abstract class FetcherError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The manifest is unusable; nothing from it is processed
 */
export class ManifestFormatError extends FetcherError {
  readonly fatal = true;

  constructor(
    public readonly code: ManifestParseError,
    message: string,
    public readonly line: number
  ) {
    super(`packagemanifest line ${line}: ${message}`);
  }
}

export class ArchiveMissingError extends FetcherError {
  readonly fatal = true;

  constructor(public readonly archivePath: string, cause?: unknown) {
    super(`Archive file not found: ${archivePath}`, cause);
  }
}

export class RunCancelledError extends FetcherError {
  readonly fatal = true;

  constructor() {
    super('Run cancelled');
  }
}

/**
 * An HTTP request failed or delivered fewer bytes than declared
 */
export class TransferError extends FetcherError {
  readonly fatal = false;

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * The archive ended before the recorded byte range did
 */
export class ShortReadError extends FetcherError {
  readonly fatal = false;

  constructor(
    public readonly archivePath: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Couldn't read ${expected} bytes from ${archivePath} (got ${actual})`);
  }
}

/**
 * Staging, writing or inflating a single file failed
 */
export class ExtractionError extends FetcherError {
  readonly fatal = false;

  constructor(message: string, public readonly fileName: string, cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Per-resource failures are local unless explicitly marked fatal
 */
export function isFatal(error: unknown): boolean {
  return error instanceof FetcherError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
