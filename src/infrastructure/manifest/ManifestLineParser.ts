import path from 'path';
import {
  ManifestLineParseResult,
  ManifestParseError
} from '../../domain/value-objects/ManifestParseError';
import { parseArchiveTag } from '../../domain/value-objects/ArchiveId';

/**
 * Parses one `<relativePath>,BIN_0x<8 hex>,<offset>,<size>,<auxiliary>` line
 */
export class ManifestLineParser {
  private static readonly FIELD_SEPARATOR = ',';
  private static readonly FIELD_COUNT = 5;
  private static readonly FILES_MARKER = 'files/';
  private static readonly UNSIGNED = /^\d+$/;
  private static readonly SIGNED = /^[+-]?\d+$/;

  static parse(line: string, maxArchiveCount: number): ManifestLineParseResult {
    const fields = line.split(this.FIELD_SEPARATOR);
    if (fields.length !== this.FIELD_COUNT) {
      return {
        success: false,
        error: ManifestParseError.INVALID_FIELD_COUNT,
        message: `Expected ${this.FIELD_COUNT} comma-separated fields, got ${fields.length}`
      };
    }

    const [relativePath, archiveTag, offsetStr, sizeStr, auxiliaryStr] = fields;

    const markerIndex = relativePath.indexOf(this.FILES_MARKER);
    if (markerIndex === -1) {
      return {
        success: false,
        error: ManifestParseError.INVALID_PATH,
        message: `Path has no '${this.FILES_MARKER}' marker: '${relativePath}'`
      };
    }

    const destination = relativePath.slice(markerIndex + this.FILES_MARKER.length);
    if (!this.isSafeDestination(destination)) {
      return {
        success: false,
        error: ManifestParseError.INVALID_PATH,
        message: `Unsafe or empty destination path: '${destination}'`
      };
    }

    const baseName = path.posix.basename(destination);
    if (baseName.lastIndexOf('.') <= 0) {
      return {
        success: false,
        error: ManifestParseError.MISSING_COMPRESSION_SUFFIX,
        message: `File name has no compression suffix: '${baseName}'`
      };
    }

    const archiveId = parseArchiveTag(archiveTag);
    if (archiveId === null) {
      return {
        success: false,
        error: ManifestParseError.INVALID_ARCHIVE_TAG,
        message: `Invalid archive tag: '${archiveTag}'`
      };
    }
    if (archiveId >= maxArchiveCount) {
      return {
        success: false,
        error: ManifestParseError.ARCHIVE_OUT_OF_RANGE,
        message: `Archive id ${archiveId} must be below ${maxArchiveCount}`
      };
    }

    const offset = this.parseInteger(offsetStr, this.UNSIGNED);
    const size = this.parseInteger(sizeStr, this.UNSIGNED);
    const auxiliary = this.parseInteger(auxiliaryStr, this.SIGNED);
    if (offset === null || size === null || auxiliary === null) {
      return {
        success: false,
        error: ManifestParseError.INVALID_NUMBER,
        message: `Invalid numeric field: offset='${offsetStr}', size='${sizeStr}', auxiliary='${auxiliaryStr}'`
      };
    }

    return {
      success: true,
      value: { relativePath, destination, archiveId, offset, size, auxiliary }
    };
  }

  private static parseInteger(value: string, pattern: RegExp): number | null {
    const trimmed = value.trim();
    if (!pattern.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }

  /**
   * Rejects empty, absolute and `..`-escaping destinations
   */
  private static isSafeDestination(destination: string): boolean {
    if (!destination || destination.startsWith('/') || destination.includes('\\')) {
      return false;
    }
    return destination.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
  }
}
