import { describe, it, expect } from 'vitest';
import { ManifestLineParser } from './ManifestLineParser';
import { ManifestParseError } from '../../domain/value-objects/ManifestParseError';

const PREFIX = '/projects/lol_game_client/releases/0.0.0.1/files/';

describe('ManifestLineParser', () => {
  it('parses a well-formed line', () => {
    const result = ManifestLineParser.parse(`${PREFIX}DATA/a.txt.compressed,BIN_0x0000000a,128,64,-3`, 32);

    expect(result).toEqual({
      success: true,
      value: {
        relativePath: `${PREFIX}DATA/a.txt.compressed`,
        destination: 'DATA/a.txt.compressed',
        archiveId: 10,
        offset: 128,
        size: 64,
        auxiliary: -3
      }
    });
  });

  it('accepts upper-case hex digits in the archive tag', () => {
    const result = ManifestLineParser.parse(`${PREFIX}b.bin.compressed,BIN_0x0000001F,0,1,0`, 32);
    expect(result.success && result.value.archiveId).toBe(31);
  });

  it('rejects the wrong number of fields', () => {
    const result = ManifestLineParser.parse(`${PREFIX}a.txt.compressed,BIN_0x00000000,0,10`, 32);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe(ManifestParseError.INVALID_FIELD_COUNT);
      expect(result.message).toBe('Expected 5 comma-separated fields, got 4');
    }
  });

  it('rejects paths without the files/ marker', () => {
    const result = ManifestLineParser.parse('/projects/x/a.txt.compressed,BIN_0x00000000,0,10,0', 32);
    expect(!result.success && result.error).toBe(ManifestParseError.INVALID_PATH);
  });

  it.each([
    ['empty destination', ''],
    ['parent escape', '../outside.txt.compressed'],
    ['nested parent escape', 'DATA/../../outside.txt.compressed'],
    ['absolute destination', '/etc/passwd.compressed'],
    ['backslash', 'DATA\\a.txt.compressed']
  ])('rejects an unsafe destination (%s)', (_label, destination) => {
    const result = ManifestLineParser.parse(`${PREFIX}${destination},BIN_0x00000000,0,10,0`, 32);
    expect(!result.success && result.error).toBe(ManifestParseError.INVALID_PATH);
  });

  it('rejects a file name without a compression suffix', () => {
    const result = ManifestLineParser.parse(`${PREFIX}DATA/README,BIN_0x00000000,0,10,0`, 32);
    expect(!result.success && result.error).toBe(ManifestParseError.MISSING_COMPRESSION_SUFFIX);
  });

  it('rejects a dot file as having no suffix', () => {
    const result = ManifestLineParser.parse(`${PREFIX}DATA/.hidden,BIN_0x00000000,0,10,0`, 32);
    expect(!result.success && result.error).toBe(ManifestParseError.MISSING_COMPRESSION_SUFFIX);
  });

  it.each(['BIN_0x0000000', 'BIN_0x0000000g', 'bin_0x00000000', 'BIN_00000000'])(
    'rejects the malformed archive tag %s',
    (tag) => {
      const result = ManifestLineParser.parse(`${PREFIX}a.txt.compressed,${tag},0,10,0`, 32);
      expect(!result.success && result.error).toBe(ManifestParseError.INVALID_ARCHIVE_TAG);
    }
  );

  it('rejects archive ids at or above the bound', () => {
    const result = ManifestLineParser.parse(`${PREFIX}a.txt.compressed,BIN_0x00000020,0,10,0`, 32);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe(ManifestParseError.ARCHIVE_OUT_OF_RANGE);
      expect(result.message).toBe('Archive id 32 must be below 32');
    }
  });

  it.each([
    ['negative offset', '-1,10,0'],
    ['non-numeric size', '0,ten,0'],
    ['fractional size', '0,1.5,0'],
    ['unsafe integer', '0,9007199254740993,0'],
    ['non-numeric auxiliary', '0,10,x']
  ])('rejects %s', (_label, numbers) => {
    const result = ManifestLineParser.parse(`${PREFIX}a.txt.compressed,BIN_0x00000000,${numbers}`, 32);
    expect(!result.success && result.error).toBe(ManifestParseError.INVALID_NUMBER);
  });

  it('accepts a signed auxiliary value', () => {
    const result = ManifestLineParser.parse(`${PREFIX}a.txt.compressed,BIN_0x00000000,0,10,+7`, 32);
    expect(result.success && result.value.auxiliary).toBe(7);
  });
});
