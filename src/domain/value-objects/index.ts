export * from './ByteRange';
export * from './ArchiveId';
export * from './ManifestParseError';
export * from './TransferDecision';
