/**
 * Use case for downloading every archive blob of a release
 */

import { ILogger } from '../../domain/interfaces';
import { errorMessage, isFatal } from '../../domain/errors';
import { ArchiveIndex } from '../../infrastructure/manifest/ArchiveIndex';
import { TransferManager } from '../../infrastructure/transfer/TransferManager';
import { throwIfCancelled } from '../../utils/cancellation';
import { runPool } from '../../utils/pool';
import { FileFailure, RunContext } from '../../types';

export interface DownloadArchivesResponse {
    transferred: number;
    /** Archives that failed to download; their files cannot be extracted */
    unavailable: Set<number>;
    failures: FileFailure[];
}

export class DownloadArchivesUseCase {
    constructor(
        private transferManager: TransferManager,
        private logger: ILogger
    ) { }

    async execute(index: ArchiveIndex, context: RunContext): Promise<DownloadArchivesResponse> {
        const { options, signal } = context;
        const total = index.archives.length;
        // Several bars redrawing one console line would garble it
        const showProgress = options.concurrency <= 1;
        const response: DownloadArchivesResponse = { transferred: 0, unavailable: new Set(), failures: [] };

        this.logger.info('Downloading archive files...');

        await runPool(index.archives, options.concurrency, async (archive, i) => {
            throwIfCancelled(signal);
            this.logger.info(`Downloading: ${archive.localName} (${i + 1}/${total})`);

            try {
                const outcome = await this.transferManager.transfer(archive, {
                    removeExisting: options.removeExisting,
                    showProgress,
                    signal
                });
                if (outcome.decision.action === 'fetch' || outcome.decision.action === 'resume') {
                    response.transferred++;
                }
                if (!showProgress) {
                    this.logger.info(`Finished: ${archive.localName} (${outcome.decision.action})`);
                }
            } catch (error) {
                if (isFatal(error)) {
                    throw error;
                }
                this.logger.error(`[${archive.name}] Download failed: ${errorMessage(error)}`);
                response.unavailable.add(archive.id);
                response.failures.push({ target: archive.localName, error: errorMessage(error) });
            }
        });

        return response;
    }
}
