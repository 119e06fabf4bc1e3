/**
 * Use case for downloading and inflating files one by one, without archives
 */

import { errorMessage, isFatal } from '../../domain/errors';
import { ILogger, IProgressReporter } from '../../domain/interfaces';
import { ArchiveExtractor } from '../../infrastructure/extraction/ArchiveExtractor';
import { ArchiveIndex } from '../../infrastructure/manifest/ArchiveIndex';
import { TransferManager } from '../../infrastructure/transfer/TransferManager';
import { throwIfCancelled } from '../../utils/cancellation';
import { pathExists, removeFile } from '../../utils/files';
import { runPool } from '../../utils/pool';
import { BatchOutcome, RunContext } from '../../types';

export class DownloadIndividualFilesUseCase {
    constructor(
        private transferManager: TransferManager,
        private extractor: ArchiveExtractor,
        private reporter: IProgressReporter,
        private logger: ILogger
    ) { }

    async execute(index: ArchiveIndex, context: RunContext): Promise<BatchOutcome> {
        const { options, signal } = context;
        const total = index.files.length;
        const response: BatchOutcome = { completed: 0, skipped: 0, failures: [] };
        let done = 0;

        this.logger.info('Downloading game files...');

        await runPool(index.files, options.concurrency, async (file) => {
            throwIfCancelled(signal);

            try {
                if (await pathExists(file.finalName)) {
                    if (!options.removeExisting) {
                        response.skipped++;
                        return;
                    }
                    await removeFile(file.finalName);
                }

                // Per-file byte progress would flood the console
                await this.transferManager.transfer(file, {
                    removeExisting: options.removeExisting,
                    showProgress: false,
                    signal
                });
                await this.extractor.inflateDownloaded(file);
                response.completed++;
            } catch (error) {
                if (isFatal(error)) {
                    throw error;
                }
                this.logger.error(`[${file.finalName}] ${errorMessage(error)}`);
                response.failures.push({ target: file.finalName, error: errorMessage(error) });
            } finally {
                done++;
                this.reporter.items(done, total);
            }
        });

        this.reporter.finish();
        return response;
    }
}
