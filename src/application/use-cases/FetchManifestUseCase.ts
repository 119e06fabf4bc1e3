/**
 * Use case for fetching and parsing the release manifest
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { ILogger } from '../../domain/interfaces';
import { ParsedManifest } from '../../domain/entities';
import { ManifestParser } from '../../infrastructure/manifest/ManifestParser';
import { manifestLink } from '../../infrastructure/manifest/ReleaseUrls';
import { TransferManager } from '../../infrastructure/transfer/TransferManager';
import { RunContext } from '../../types';

export class FetchManifestUseCase {
    constructor(
        private transferManager: TransferManager,
        private logger: ILogger
    ) { }

    /**
     * @throws ManifestFormatError when the manifest is malformed
     */
    async execute(context: RunContext): Promise<ParsedManifest> {
        const { options, signal } = context;
        const resource = {
            remoteLink: manifestLink(options),
            localName: path.posix.join(options.destFolder, config.MANIFEST_NAME)
        };

        this.logger.info(`Downloading: ${resource.localName}`);
        await this.transferManager.transfer(resource, {
            removeExisting: options.removeExisting,
            showProgress: true,
            signal
        });

        const text = await fs.promises.readFile(resource.localName, 'utf8');
        const manifest = new ManifestParser({ origin: options, destFolder: options.destFolder }).parse(text);
        this.logger.debug(`Parsed ${manifest.files.length} entries from ${resource.localName}`);
        return manifest;
    }
}
