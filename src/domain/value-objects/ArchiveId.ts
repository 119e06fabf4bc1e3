/**
 * Archive identifiers and their `BIN_0x<8 hex digits>` names
 */

const ARCHIVE_PREFIX = 'BIN_0x';
const ARCHIVE_TAG = /^BIN_0x[0-9a-fA-F]{8}$/;

/**
 * Formats an archive id as it appears on the origin and on disk
 *
 * @example
 * formatArchiveName(10) // 'BIN_0x0000000a'
 */
export function formatArchiveName(id: number): string {
  return `${ARCHIVE_PREFIX}${id.toString(16).padStart(8, '0')}`;
}

/**
 * Reads the hex id that follows the fixed 6-character prefix
 * @returns The id, or null when the tag is not `BIN_0x` + 8 hex digits
 */
export function parseArchiveTag(tag: string): number | null {
  if (!ARCHIVE_TAG.test(tag)) {
    return null;
  }
  return parseInt(tag.slice(ARCHIVE_PREFIX.length), 16);
}
