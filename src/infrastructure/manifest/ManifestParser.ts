import path from 'path';
import config from '../../config';
import { FileDescriptor, ParsedManifest } from '../../domain/entities';
import { ManifestFormatError } from '../../domain/errors';
import { ManifestParseError } from '../../domain/value-objects/ManifestParseError';
import { stripCompressionSuffix } from '../../utils/files';
import { ManifestLineParser } from './ManifestLineParser';
import { fileLink, OriginOptions } from './ReleaseUrls';

export interface ManifestParserOptions {
  origin: OriginOptions;
  destFolder: string;
  header?: string;
  maxArchiveCount?: number;
}

/**
 * Decodes packagemanifest text into file descriptors and the set of
 * referenced archive ids
 *
 * Any malformed line fails the whole parse; no partial manifest is returned.
 */
export class ManifestParser {
  private readonly header: string;
  private readonly maxArchiveCount: number;

  constructor(private readonly options: ManifestParserOptions) {
    this.header = options.header ?? config.MANIFEST_HEADER;
    this.maxArchiveCount = options.maxArchiveCount ?? config.MAX_ARCHIVE_COUNT;
  }

  parse(text: string): ParsedManifest {
    const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    if (lines.length === 0 || lines[0] !== this.header) {
      const found = lines.length === 0 ? '<empty>' : `'${lines[0]}'`;
      throw new ManifestFormatError(
        ManifestParseError.INVALID_HEADER,
        `Invalid header ${found}, expected '${this.header}'`,
        1
      );
    }

    const files: FileDescriptor[] = [];
    const archiveIds: boolean[] = new Array(this.maxArchiveCount).fill(false);
    const destinations = new Set<string>();
    let fileBytes = 0;
    let maxLineLength = 0;

    for (let i = 1; i < lines.length; i++) {
      const lineNumber = i + 1;
      const line = lines[i];
      maxLineLength = Math.max(maxLineLength, line.length);

      const result = ManifestLineParser.parse(line, this.maxArchiveCount);
      if (!result.success) {
        throw new ManifestFormatError(result.error, result.message, lineNumber);
      }

      const entry = result.value;
      const localName = path.posix.join(this.options.destFolder, entry.destination);
      const finalName = stripCompressionSuffix(localName);

      for (const name of [localName, finalName]) {
        if (destinations.has(name)) {
          throw new ManifestFormatError(
            ManifestParseError.DUPLICATE_DESTINATION,
            `Destination '${name}' is written by more than one entry`,
            lineNumber
          );
        }
        destinations.add(name);
      }

      files.push({
        remoteLink: fileLink(this.options.origin, entry.relativePath),
        localName,
        finalName,
        archiveId: entry.archiveId,
        offset: entry.offset,
        size: entry.size,
        auxiliary: entry.auxiliary,
        line: lineNumber
      });
      archiveIds[entry.archiveId] = true;
      fileBytes += entry.size;
    }

    return { files, archiveIds, fileBytes, maxLineLength };
  }
}
