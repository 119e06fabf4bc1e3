/**
 * Common types for a release fetch run
 */

import { ManifestStatistics } from '../domain/entities';

export interface RunOptions {
    /** Origin base, e.g. http://l3cdn.riotgames.com */
    downloadUrl: string;
    /** Path prefix on the origin, e.g. /releases/live */
    downloadPath: string;
    gameVersion: string;
    destFolder: string;
    /** Fetch archive blobs and extract from them, instead of one request per file */
    useArchives: boolean;
    removeExisting: boolean;
    keepArchives: boolean;
    /** Parallel archive downloads / extractions; 1 keeps the sequential order */
    concurrency: number;
}

/**
 * Everything a component needs about the current run, passed explicitly
 */
export interface RunContext {
    options: RunOptions;
    signal: AbortSignal;
}

export interface FileFailure {
    /** Local path or archive name the failure belongs to */
    target: string;
    error: string;
}

export interface BatchOutcome {
    completed: number;
    skipped: number;
    failures: FileFailure[];
}

export interface RunReport {
    mode: 'archives' | 'individual';
    statistics: ManifestStatistics;
    archivesTransferred: number;
    archivesRemoved: number;
    filesCompleted: number;
    filesSkipped: number;
    failures: FileFailure[];
}

export interface DownloadReleaseResponse {
    success: boolean;
    report?: RunReport;
    error?: string;
    cancelled?: boolean;
}
