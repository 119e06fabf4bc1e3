/**
 * Use case for extracting every file from its downloaded archive
 * Removes each archive once all of its files are done
 */

import { ArchiveDescriptor } from '../../domain/entities';
import { ExtractionError, errorMessage, isFatal } from '../../domain/errors';
import { ILogger, IProgressReporter } from '../../domain/interfaces';
import { ArchiveExtractor } from '../../infrastructure/extraction/ArchiveExtractor';
import { ArchiveIndex } from '../../infrastructure/manifest/ArchiveIndex';
import { throwIfCancelled } from '../../utils/cancellation';
import { removeFile } from '../../utils/files';
import { runPool } from '../../utils/pool';
import { BatchOutcome, RunContext } from '../../types';

export interface ExtractFilesResponse extends BatchOutcome {
    archivesRemoved: number;
}

export class ExtractFilesUseCase {
    constructor(
        private extractor: ArchiveExtractor,
        private reporter: IProgressReporter,
        private logger: ILogger
    ) { }

    async execute(
        index: ArchiveIndex,
        context: RunContext,
        unavailable: ReadonlySet<number> = new Set()
    ): Promise<ExtractFilesResponse> {
        const { options, signal } = context;
        const total = index.files.length;
        const response: ExtractFilesResponse = { completed: 0, skipped: 0, failures: [], archivesRemoved: 0 };

        // Files still to finish per archive, and archives with no failed file
        const pending = new Map(index.archives.map((archive) => [archive.id, archive.files.length]));
        const intact = new Set(index.archives.map((archive) => archive.id));
        let done = 0;

        this.logger.info('Extracting game files...');

        await runPool(index.files, options.concurrency, async (file) => {
            throwIfCancelled(signal);
            const archive = index.archiveFor(file);

            try {
                if (!archive || unavailable.has(file.archiveId)) {
                    throw new ExtractionError(`Archive for ${file.localName} was not downloaded`, file.finalName);
                }
                await this.extractor.extract(file, archive.localName);
                response.completed++;
            } catch (error) {
                if (isFatal(error)) {
                    throw error;
                }
                this.logger.error(`[${file.finalName}] ${errorMessage(error)}`);
                intact.delete(file.archiveId);
                response.failures.push({ target: file.finalName, error: errorMessage(error) });
            } finally {
                done++;
                this.reporter.items(done, total);
            }

            const remaining = (pending.get(file.archiveId) ?? 1) - 1;
            pending.set(file.archiveId, remaining);
            if (remaining === 0 && archive) {
                await this.releaseArchive(archive, intact.has(archive.id), context, response);
            }
        });

        this.reporter.finish();
        return response;
    }

    /**
     * Called once every file referencing the archive has finished
     */
    private async releaseArchive(
        archive: ArchiveDescriptor,
        allExtracted: boolean,
        context: RunContext,
        response: ExtractFilesResponse
    ): Promise<void> {
        if (context.options.keepArchives) {
            return;
        }
        if (!allExtracted) {
            this.logger.warn(`Keeping ${archive.localName}: some of its files failed to extract`);
            return;
        }

        try {
            await removeFile(archive.localName);
            response.archivesRemoved++;
            this.logger.debug(`Removed ${archive.localName}`);
        } catch (error) {
            this.logger.warn(`Couldn't remove ${archive.localName}: ${errorMessage(error)}`);
        }
    }
}
