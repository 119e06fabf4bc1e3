import { IDecompressor, IHttpClient, ILogger, IProgressReporter } from '../../domain/interfaces';
import { FetchHttpClient } from '../../infrastructure/http/FetchHttpClient';
import { ZlibDecompressor } from '../../infrastructure/extraction/ZlibDecompressor';
import { ArchiveExtractor } from '../../infrastructure/extraction/ArchiveExtractor';
import { ConsoleProgressReporter } from '../../infrastructure/progress/ConsoleProgressReporter';
import { TransferManager } from '../../infrastructure/transfer/TransferManager';
import { FetchManifestUseCase } from '../../application/use-cases/FetchManifestUseCase';
import { DownloadArchivesUseCase } from '../../application/use-cases/DownloadArchivesUseCase';
import { ExtractFilesUseCase } from '../../application/use-cases/ExtractFilesUseCase';
import { DownloadIndividualFilesUseCase } from '../../application/use-cases/DownloadIndividualFilesUseCase';
import { DownloadReleaseUseCase } from '../../application/use-cases/DownloadReleaseUseCase';

export interface AppDependencies {
    logger: ILogger;
    http?: IHttpClient;
    decompressor?: IDecompressor;
    reporter?: IProgressReporter;
    clock?: () => number;
}

/**
 * Wires the fetcher together
 * Can be used both by the CLI and by tests, which swap in their own ports
 */
export function createApp(deps: AppDependencies): DownloadReleaseUseCase {
    const logger = deps.logger;
    const http = deps.http || new FetchHttpClient(logger);
    const decompressor = deps.decompressor || new ZlibDecompressor();
    const reporter = deps.reporter || new ConsoleProgressReporter();

    const transferManager = new TransferManager(http, logger, reporter, deps.clock);
    const extractor = new ArchiveExtractor(decompressor, logger);

    return new DownloadReleaseUseCase(
        new FetchManifestUseCase(transferManager, logger),
        new DownloadArchivesUseCase(transferManager, logger),
        new ExtractFilesUseCase(extractor, reporter, logger),
        new DownloadIndividualFilesUseCase(transferManager, extractor, reporter, logger),
        http,
        logger
    );
}
