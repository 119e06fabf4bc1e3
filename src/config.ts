/**
 * Configuration for release fetcher
 */

import path from 'path';

export interface Config {
  DOWNLOAD_URL: string;
  DOWNLOAD_PATH: string;
  DEST_FOLDER: string;
  // Project segment of release URLs: <path>/projects/<project>/releases/<version>/...
  RELEASE_PROJECT: string;
  MANIFEST_NAME: string;
  MANIFEST_HEADER: string;
  // Archive ids must stay below this bound
  MAX_ARCHIVE_COUNT: number;
  SAMPLE_INTERVAL_MS: number; // Minimum time between throughput samples
  SMOOTHING_FACTOR: number; // Weight of the newest sample in the speed average
  MAX_BAR_WIDTH: number;
  CONCURRENCY: number;
  // Runtime directory for logs
  RUNTIME_DIR: string;
}

const config: Config = {
  // Origin configuration
  DOWNLOAD_URL: process.env.DOWNLOAD_URL || 'l3cdn.riotgames.com',
  DOWNLOAD_PATH: process.env.DOWNLOAD_PATH || '/releases/live',
  DEST_FOLDER: process.env.DEST_FOLDER || 'lol',
  RELEASE_PROJECT: 'lol_game_client',

  // Manifest format
  MANIFEST_NAME: 'packagemanifest',
  MANIFEST_HEADER: 'PKG1',
  MAX_ARCHIVE_COUNT: 32,

  // Progress reporting
  SAMPLE_INTERVAL_MS: 1000, // 1 second
  SMOOTHING_FACTOR: 0.1,
  MAX_BAR_WIDTH: 36,

  // Parallel archive downloads / extractions, 1 = strictly sequential
  CONCURRENCY: Number(process.env.CONCURRENCY) || 1,

  RUNTIME_DIR: process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime')
};

export default config;
