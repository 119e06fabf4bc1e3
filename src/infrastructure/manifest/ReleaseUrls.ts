/**
 * Builds origin URLs for release files
 *
 * <downloadUrl><downloadPath>/projects/<project>/releases/<version>/packages/files/<name>
 */

import config from '../../config';
import { formatArchiveName } from '../../domain/value-objects/ArchiveId';

export interface OriginOptions {
  downloadUrl: string;
  downloadPath: string;
  gameVersion: string;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Prefixes `http://` when no scheme is given and drops trailing slashes
 */
export function normalizeDownloadUrl(url: string): string {
  const withScheme = SCHEME.test(url) ? url : `http://${url}`;
  return withScheme.replace(/\/+$/, '');
}

/**
 * Ensures a leading slash and no trailing slash; '' stays ''
 */
export function normalizeDownloadPath(downloadPath: string): string {
  const trimmed = downloadPath.replace(/\/+$/, '');
  if (!trimmed) {
    return '';
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function originBase(origin: OriginOptions): string {
  return `${normalizeDownloadUrl(origin.downloadUrl)}${normalizeDownloadPath(origin.downloadPath)}`;
}

export function releaseFileLink(origin: OriginOptions, name: string): string {
  return `${originBase(origin)}/projects/${config.RELEASE_PROJECT}/releases/${origin.gameVersion}/packages/files/${name}`;
}

export function manifestLink(origin: OriginOptions): string {
  return releaseFileLink(origin, config.MANIFEST_NAME);
}

export function archiveLink(origin: OriginOptions, archiveId: number): string {
  return releaseFileLink(origin, formatArchiveName(archiveId));
}

/**
 * Per-file links append the manifest's own path to the origin base
 */
export function fileLink(origin: OriginOptions, relativePath: string): string {
  return `${originBase(origin)}${relativePath.startsWith('/') ? '' : '/'}${relativePath}`;
}
