/**
 * Filesystem helpers shared by transfers and extraction
 */

import fs from 'fs';
import path from 'path';

/**
 * Returns the size of a file, or null when it does not exist
 */
export async function fileSizeOrNull(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await fileSizeOrNull(filePath)) !== null;
}

/**
 * Creates every missing directory above `filePath`
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Drops the last `.`-delimited suffix of the file name
 *
 * @example
 * stripCompressionSuffix('lol/DATA/a.dds.compressed') // 'lol/DATA/a.dds'
 */
export function stripCompressionSuffix(filePath: string): string {
  const base = path.posix.basename(filePath);
  const dot = base.lastIndexOf('.');
  if (dot <= 0) {
    return filePath;
  }
  return filePath.slice(0, filePath.length - (base.length - dot));
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
