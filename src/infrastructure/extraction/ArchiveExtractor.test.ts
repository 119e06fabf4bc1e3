import fs from 'fs';
import os from 'os';
import path from 'path';
import zlib from 'zlib';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ArchiveExtractor } from './ArchiveExtractor';
import { ZlibDecompressor } from './ZlibDecompressor';
import { FileDescriptor } from '../../domain/entities';
import { ILogger } from '../../domain/interfaces';
import { ArchiveMissingError, ExtractionError, ShortReadError } from '../../domain/errors';
import { pathExists } from '../../utils/files';

describe('ArchiveExtractor', () => {
  let dir: string;
  let archivePath: string;
  let mockLogger: ILogger;
  let extractor: ArchiveExtractor;

  const first = zlib.deflateSync(Buffer.from('first file contents, first file contents'));
  const second = zlib.deflateSync(Buffer.from('second'));

  function descriptor(name: string, offset: number, size: number): FileDescriptor {
    return {
      remoteLink: `http://origin.test/files/${name}.compressed`,
      localName: path.join(dir, 'DATA', `${name}.compressed`),
      finalName: path.join(dir, 'DATA', name),
      archiveId: 0,
      offset,
      size,
      auxiliary: 0,
      line: 2
    };
  }

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'extract-'));
    archivePath = path.join(dir, 'BIN_0x00000000');
    await fs.promises.writeFile(archivePath, Buffer.concat([first, second]));
    mockLogger = {
      log: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      info: vi.fn(),
      debug: vi.fn()
    };
    extractor = new ArchiveExtractor(new ZlibDecompressor(), mockLogger);
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('rebuilds byte-identical files from their archive ranges', async () => {
    const a = descriptor('a.txt', 0, first.length);
    const b = descriptor('b.txt', first.length, second.length);

    await extractor.extract(a, archivePath);
    await extractor.extract(b, archivePath);

    expect(await fs.promises.readFile(a.finalName, 'utf8')).toBe('first file contents, first file contents');
    expect(await fs.promises.readFile(b.finalName, 'utf8')).toBe('second');
    expect(await pathExists(a.localName)).toBe(false);
    expect(await pathExists(b.localName)).toBe(false);
    expect(await pathExists(archivePath)).toBe(true);
  });

  it('fails fatally when the archive is missing', async () => {
    const missing = path.join(dir, 'BIN_0x00000001');

    const result = extractor.extract(descriptor('a.txt', 0, first.length), missing);

    await expect(result).rejects.toBeInstanceOf(ArchiveMissingError);
    await expect(result).rejects.toThrow(`Archive file not found: ${missing}`);
  });

  it('reports a range that runs past the end of the archive', async () => {
    const total = first.length + second.length;
    const file = descriptor('c.txt', first.length, second.length + 5);

    const result = extractor.extract(file, archivePath);

    await expect(result).rejects.toBeInstanceOf(ShortReadError);
    await expect(result).rejects.toThrow(
      `Couldn't read ${second.length + 5} bytes from ${archivePath} (got ${total - first.length})`
    );
    expect(await pathExists(file.localName)).toBe(false);
    expect(await pathExists(file.finalName)).toBe(false);
  });

  it('removes both copies when the data does not inflate', async () => {
    const file = descriptor('bad.txt', 1, 6);

    await expect(extractor.extract(file, archivePath)).rejects.toBeInstanceOf(ExtractionError);
    expect(await pathExists(file.localName)).toBe(false);
    expect(await pathExists(file.finalName)).toBe(false);
  });

  it('writes an empty file for an empty entry', async () => {
    const file = descriptor('empty.txt', 0, 0);

    await extractor.extract(file, archivePath);

    expect(await fs.promises.readFile(file.finalName, 'utf8')).toBe('');
    expect(await pathExists(file.localName)).toBe(false);
  });

  it('inflates an individually downloaded file and drops the compressed copy', async () => {
    const file = descriptor('single.txt', 0, second.length);
    await fs.promises.mkdir(path.dirname(file.localName), { recursive: true });
    await fs.promises.writeFile(file.localName, second);

    await extractor.inflateDownloaded(file);

    expect(await fs.promises.readFile(file.finalName, 'utf8')).toBe('second');
    expect(await pathExists(file.localName)).toBe(false);
  });
});
