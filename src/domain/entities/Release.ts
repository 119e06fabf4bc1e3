/**
 * Domain entities describing one release's asset set
 * Built once per run and read-only afterwards
 */

/**
 * One logical game file
 */
export interface FileDescriptor {
  /** Fully-qualified source URL, used when files are fetched individually */
  readonly remoteLink: string;
  /** Compressed destination path under the destination folder */
  readonly localName: string;
  /** localName with its compression suffix removed */
  readonly finalName: string;
  readonly archiveId: number;
  /** Byte offset inside the archive blob */
  readonly offset: number;
  readonly size: number;
  /** Carried through unchanged */
  readonly auxiliary: number;
  /** 1-based manifest line, for diagnostics */
  readonly line: number;
}

/**
 * One shared archive blob
 */
export interface ArchiveDescriptor {
  readonly id: number;
  /** `BIN_0x<8 hex digits>` */
  readonly name: string;
  readonly remoteLink: string;
  readonly localName: string;
  readonly remoteSize: number;
  /** Files stored in this archive, in manifest order */
  readonly files: readonly FileDescriptor[];
}

export interface ManifestStatistics {
  readonly fileCount: number;
  readonly archiveCount: number;
  /** Sum of per-file sizes */
  readonly fileBytes: number;
  /** Sum of probed per-archive remote sizes */
  readonly archiveBytes: number;
  readonly maxLineLength: number;
}

/**
 * Output of a manifest parse pass
 */
export interface ParsedManifest {
  readonly files: readonly FileDescriptor[];
  /** Membership set indexed by archive id */
  readonly archiveIds: readonly boolean[];
  readonly fileBytes: number;
  readonly maxLineLength: number;
}
