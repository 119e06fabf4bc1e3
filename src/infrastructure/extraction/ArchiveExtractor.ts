import fs from 'fs';
import { FileHandle } from 'fs/promises';
import { FileDescriptor } from '../../domain/entities';
import { ArchiveMissingError, ExtractionError, FetcherError, ShortReadError, errorMessage } from '../../domain/errors';
import { IDecompressor, ILogger } from '../../domain/interfaces';
import { ByteRange } from '../../domain/value-objects/ByteRange';
import { ensureParentDir, isNotFound, removeFile } from '../../utils/files';

/**
 * Turns an archive-relative byte range into a standalone decompressed file
 *
 * Archive mode: read [offset, offset + size) from the archive, stage it at
 * `localName`, inflate to `finalName`, remove the staged copy.
 * Individual mode: inflate the downloaded `localName` directly.
 */
export class ArchiveExtractor {
  constructor(
    private readonly decompressor: IDecompressor,
    private readonly logger: ILogger
  ) {}

  /**
   * @throws ArchiveMissingError when the archive is not on disk (fatal)
   * @throws ShortReadError | ExtractionError for this file only
   */
  async extract(file: FileDescriptor, archivePath: string): Promise<void> {
    const range = ByteRange.at(file.offset, file.size);
    const bytes = await this.readRange(archivePath, range);

    try {
      await ensureParentDir(file.localName);
      await fs.promises.writeFile(file.localName, bytes);
    } catch (error) {
      await removeFile(file.localName);
      throw new ExtractionError(`Couldn't write to file ${file.localName}: ${errorMessage(error)}`, file.localName, error);
    }

    try {
      await this.inflate(file);
    } finally {
      await removeFile(file.localName);
    }
  }

  /**
   * Inflates an individually downloaded file; the compressed copy is
   * removed only once the final file is complete
   */
  async inflateDownloaded(file: FileDescriptor): Promise<void> {
    await this.inflate(file);
    await removeFile(file.localName);
  }

  private async readRange(archivePath: string, range: ByteRange): Promise<Buffer> {
    let archive: FileHandle;
    try {
      archive = await fs.promises.open(archivePath, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        throw new ArchiveMissingError(archivePath, error);
      }
      throw new ExtractionError(`Couldn't open archive ${archivePath}: ${errorMessage(error)}`, archivePath, error);
    }

    try {
      let buffer: Buffer;
      try {
        buffer = Buffer.alloc(range.length);
      } catch (error) {
        throw new ExtractionError(
          `Couldn't allocate ${range.length} bytes to extract ${range.toString()} from ${archivePath}`,
          archivePath,
          error
        );
      }

      let filled = 0;
      while (filled < range.length) {
        const { bytesRead } = await archive.read(buffer, filled, range.length - filled, range.start + filled);
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
      }

      if (filled !== range.length) {
        throw new ShortReadError(archivePath, range.length, filled);
      }
      return buffer;
    } catch (error) {
      if (error instanceof FetcherError) {
        throw error;
      }
      throw new ExtractionError(`Couldn't read from archive ${archivePath}: ${errorMessage(error)}`, archivePath, error);
    } finally {
      await archive.close();
    }
  }

  /**
   * Writes `finalName` from `localName`; a failed inflate leaves no partial final file
   */
  private async inflate(file: FileDescriptor): Promise<void> {
    try {
      if (file.size === 0) {
        this.logger.debug(`[${file.finalName}] Empty entry, writing empty file`);
        await fs.promises.writeFile(file.finalName, Buffer.alloc(0));
        return;
      }
      await this.decompressor.decompress(file.localName, file.finalName);
    } catch (error) {
      await removeFile(file.finalName);
      throw new ExtractionError(`Couldn't decompress ${file.localName}: ${errorMessage(error)}`, file.finalName, error);
    }
  }
}
