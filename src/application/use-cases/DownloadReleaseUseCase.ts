/**
 * Use case for fetching one release end to end
 * manifest → archive index → archives + extraction, or individual files
 */

import { IHttpClient, ILogger } from '../../domain/interfaces';
import { RunCancelledError, errorMessage } from '../../domain/errors';
import { ArchiveIndex } from '../../infrastructure/manifest/ArchiveIndex';
import { DownloadReleaseResponse, RunContext, RunOptions, RunReport } from '../../types';
import { FetchManifestUseCase } from './FetchManifestUseCase';
import { DownloadArchivesUseCase } from './DownloadArchivesUseCase';
import { ExtractFilesUseCase } from './ExtractFilesUseCase';
import { DownloadIndividualFilesUseCase } from './DownloadIndividualFilesUseCase';

export class DownloadReleaseUseCase {
    constructor(
        private fetchManifest: FetchManifestUseCase,
        private downloadArchives: DownloadArchivesUseCase,
        private extractFiles: ExtractFilesUseCase,
        private downloadIndividualFiles: DownloadIndividualFilesUseCase,
        private http: IHttpClient,
        private logger: ILogger
    ) { }

    async execute(context: RunContext): Promise<DownloadReleaseResponse> {
        const { options, signal } = context;

        try {
            this.logOptions(options);

            const manifest = await this.fetchManifest.execute(context);
            const index = await ArchiveIndex.build(
                manifest,
                { origin: options, destFolder: options.destFolder, signal },
                this.http,
                this.logger
            );
            index.logStatistics(this.logger);

            const report = options.useArchives
                ? await this.runArchiveMode(index, context)
                : await this.runIndividualMode(index, context);

            const success = report.failures.length === 0;
            if (success) {
                this.logger.info(`Done: ${report.filesCompleted} files written, ${report.filesSkipped} already present`);
            } else {
                this.logger.warn(`Finished with ${report.failures.length} failed resources`);
                for (const failure of report.failures) {
                    this.logger.warn(`  ${failure.target}: ${failure.error}`);
                }
            }

            return { success, report };
        } catch (error) {
            if (error instanceof RunCancelledError) {
                this.logger.warn('Run cancelled, partial files were kept for a later resume');
                return { success: false, cancelled: true, error: error.message };
            }
            this.logger.error('Error in DownloadReleaseUseCase:', error);
            return {
                success: false,
                error: errorMessage(error)
            };
        }
    }

    private async runArchiveMode(index: ArchiveIndex, context: RunContext): Promise<RunReport> {
        const archives = await this.downloadArchives.execute(index, context);
        const extraction = await this.extractFiles.execute(index, context, archives.unavailable);

        return {
            mode: 'archives',
            statistics: index.statistics,
            archivesTransferred: archives.transferred,
            archivesRemoved: extraction.archivesRemoved,
            filesCompleted: extraction.completed,
            filesSkipped: extraction.skipped,
            failures: [...archives.failures, ...extraction.failures]
        };
    }

    private async runIndividualMode(index: ArchiveIndex, context: RunContext): Promise<RunReport> {
        const files = await this.downloadIndividualFiles.execute(index, context);

        return {
            mode: 'individual',
            statistics: index.statistics,
            archivesTransferred: 0,
            archivesRemoved: 0,
            filesCompleted: files.completed,
            filesSkipped: files.skipped,
            failures: files.failures
        };
    }

    private logOptions(options: RunOptions): void {
        this.logger.info('Options are:');
        this.logger.info(`  URL: ${options.downloadUrl}`);
        this.logger.info(`  Path: ${options.downloadPath}`);
        this.logger.info(`  Version: ${options.gameVersion}`);
        this.logger.info(`  Destination folder: ${options.destFolder}`);
        this.logger.info(`  Use archive files: ${options.useArchives ? 'YES' : 'NO'}`);
        this.logger.info(`  Remove existing files: ${options.removeExisting ? 'YES' : 'NO'}`);
        this.logger.info(`  Keep archive files: ${options.keepArchives ? 'YES' : 'NO'}`);
        this.logger.info(`  Parallel jobs: ${options.concurrency}`);
    }
}
