import path from 'path';
import {
  ArchiveDescriptor,
  FileDescriptor,
  ManifestStatistics,
  ParsedManifest
} from '../../domain/entities';
import { IHttpClient, ILogger } from '../../domain/interfaces';
import { formatArchiveName } from '../../domain/value-objects/ArchiveId';
import { cancellable, throwIfCancelled } from '../../utils/cancellation';
import { ByteFormatter } from '../progress/ByteFormatter';
import { archiveLink, OriginOptions } from './ReleaseUrls';

export interface ArchiveIndexOptions {
  origin: OriginOptions;
  destFolder: string;
  signal?: AbortSignal;
}

/**
 * Groups file descriptors by archive and owns both sets for the run
 */
export class ArchiveIndex {
  private readonly archivesById: ReadonlyMap<number, ArchiveDescriptor>;

  private constructor(
    public readonly files: readonly FileDescriptor[],
    public readonly archives: readonly ArchiveDescriptor[],
    public readonly statistics: ManifestStatistics
  ) {
    this.archivesById = new Map(archives.map((archive) => [archive.id, archive]));
  }

  /**
   * Builds one archive descriptor per referenced id, in ascending id order,
   * probing each archive's remote size
   */
  static async build(
    manifest: ParsedManifest,
    options: ArchiveIndexOptions,
    http: IHttpClient,
    logger: ILogger
  ): Promise<ArchiveIndex> {
    const filesByArchive = new Map<number, FileDescriptor[]>();
    for (const file of manifest.files) {
      const group = filesByArchive.get(file.archiveId);
      if (group) {
        group.push(file);
      } else {
        filesByArchive.set(file.archiveId, [file]);
      }
    }

    const archives: ArchiveDescriptor[] = [];
    let archiveBytes = 0;

    for (let id = 0; id < manifest.archiveIds.length; id++) {
      if (!manifest.archiveIds[id]) {
        continue;
      }
      throwIfCancelled(options.signal);

      const name = formatArchiveName(id);
      const remoteLink = archiveLink(options.origin, id);
      const remoteSize = await cancellable(options.signal, () => http.probeSize(remoteLink, options.signal));
      logger.debug(`Archive ${name}: ${remoteSize} bytes at ${remoteLink}`);

      archives.push({
        id,
        name,
        remoteLink,
        localName: path.posix.join(options.destFolder, name),
        remoteSize,
        files: filesByArchive.get(id) ?? []
      });
      archiveBytes += remoteSize;
    }

    const statistics: ManifestStatistics = {
      fileCount: manifest.files.length,
      archiveCount: archives.length,
      fileBytes: manifest.fileBytes,
      archiveBytes,
      maxLineLength: manifest.maxLineLength
    };

    if (statistics.archiveBytes !== statistics.fileBytes) {
      logger.warn(
        `Total sizes don't match: files sum to ${statistics.fileBytes} bytes, archives to ${statistics.archiveBytes} bytes`
      );
    }

    return new ArchiveIndex(manifest.files, archives, statistics);
  }

  archiveFor(file: FileDescriptor): ArchiveDescriptor | undefined {
    return this.archivesById.get(file.archiveId);
  }

  logStatistics(logger: ILogger): void {
    const stats = this.statistics;
    logger.info('Stats:');
    logger.info(`  Total size (sum of individual files' sizes): ${ByteFormatter.toSummary(stats.fileBytes)}`);
    logger.info(`  Total size (sum of archive files' sizes):    ${ByteFormatter.toSummary(stats.archiveBytes)}`);
    logger.info(`  Max line length: ${stats.maxLineLength}`);
    logger.info(`  File count: ${stats.fileCount}`);
    logger.info(`  Archive count: ${stats.archiveCount}`);
  }
}
