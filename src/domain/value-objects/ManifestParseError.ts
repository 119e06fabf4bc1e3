/**
 * Manifest parsing error codes
 */
export enum ManifestParseError {
  INVALID_HEADER = 'INVALID_HEADER',
  INVALID_FIELD_COUNT = 'INVALID_FIELD_COUNT',
  INVALID_PATH = 'INVALID_PATH',
  MISSING_COMPRESSION_SUFFIX = 'MISSING_COMPRESSION_SUFFIX',
  INVALID_ARCHIVE_TAG = 'INVALID_ARCHIVE_TAG',
  ARCHIVE_OUT_OF_RANGE = 'ARCHIVE_OUT_OF_RANGE',
  INVALID_NUMBER = 'INVALID_NUMBER',
  DUPLICATE_DESTINATION = 'DUPLICATE_DESTINATION'
}

/**
 * One manifest entry line, split and validated but not yet rooted
 * under a destination folder
 */
export interface ManifestLine {
  /** Path as written in the manifest, appended to the origin to build per-file links */
  relativePath: string;
  /** Destination-relative path following the `files/` marker */
  destination: string;
  archiveId: number;
  offset: number;
  size: number;
  auxiliary: number;
}

/**
 * Result type for line parsing
 */
export type ManifestLineParseResult =
  | { success: true; value: ManifestLine }
  | { success: false; error: ManifestParseError; message: string };
