import fs from 'fs';
import { IHttpClient, ILogger, IProgressReporter } from '../../domain/interfaces';
import { TransferError } from '../../domain/errors';
import { TransferDecision } from '../../domain/value-objects/TransferDecision';
import { cancellable, throwIfCancelled } from '../../utils/cancellation';
import { ensureParentDir, fileSizeOrNull, removeFile } from '../../utils/files';
import { createProgressState, sampleProgress } from '../progress/ProgressEstimator';
import { decideTransfer } from './decideTransfer';

/**
 * Anything with a source URL and a destination path: the manifest, an
 * archive blob or an individually fetched file
 */
export interface TransferResource {
  remoteLink: string;
  localName: string;
}

export interface TransferOptions {
  removeExisting: boolean;
  /** Fine-grained byte progress; off for individual files */
  showProgress: boolean;
  signal?: AbortSignal;
}

export interface TransferOutcome {
  decision: TransferDecision;
  /** Bytes written by this call */
  bytesTransferred: number;
}

/**
 * Skip / resume / fetch / mismatch for any resource, through IHttpClient
 */
export class TransferManager {
  constructor(
    private readonly http: IHttpClient,
    private readonly logger: ILogger,
    private readonly reporter: IProgressReporter,
    private readonly clock: () => number = Date.now
  ) {}

  async transfer(resource: TransferResource, options: TransferOptions): Promise<TransferOutcome> {
    throwIfCancelled(options.signal);

    let localSize = await fileSizeOrNull(resource.localName);
    if (localSize !== null && options.removeExisting) {
      this.logger.debug(`Removing existing ${resource.localName}`);
      await removeFile(resource.localName);
      localSize = null;
    }

    const decision =
      localSize === null
        ? decideTransfer(null, 0)
        : decideTransfer(
            localSize,
            await cancellable(options.signal, () => this.http.probeSize(resource.remoteLink, options.signal))
          );

    switch (decision.action) {
      case 'skip':
        this.logger.info(`${resource.localName} already exists, skipping download`);
        return { decision, bytesTransferred: 0 };

      case 'mismatch':
        this.logger.warn(
          `Local ${resource.localName} is bigger than remote file (${decision.localSize} > ${decision.remoteSize} bytes)`
        );
        return { decision, bytesTransferred: 0 };

      case 'resume':
        this.logger.info(`Resuming download of ${resource.localName} from byte ${decision.from}`);
        return { decision, bytesTransferred: await this.download(resource, decision.from, options) };

      case 'fetch':
        await ensureParentDir(resource.localName);
        return { decision, bytesTransferred: await this.download(resource, 0, options) };
    }
  }

  /**
   * Streams the body to disk, appending when resuming
   * Partial files are left in place on failure or cancellation
   */
  private async download(resource: TransferResource, startAt: number, options: TransferOptions): Promise<number> {
    return cancellable(options.signal, async () => {
      const body = await this.http.get(resource.remoteLink, { startAt, signal: options.signal });

      let offset = startAt;
      if (startAt > 0 && !body.partial) {
        this.logger.warn(`Origin ignored the range request for ${resource.localName}, restarting from zero`);
        offset = 0;
      } else if (body.partial && body.rangeStart !== startAt) {
        throw new TransferError(
          `Origin resumed ${resource.localName} at byte ${body.rangeStart}, expected ${startAt}`,
          resource.remoteLink
        );
      }

      const expected = body.contentLength;
      let state = createProgressState(this.clock(), offset);
      let received = 0;
      const handle = await fs.promises.open(resource.localName, offset > 0 ? 'a' : 'w');
      try {
        for await (const chunk of body.chunks) {
          await handle.write(chunk);
          received += chunk.byteLength;

          if (options.showProgress && expected !== null) {
            const sample = sampleProgress(state, this.clock(), received, expected);
            state = sample.state;
            if (sample.snapshot) {
              this.reporter.transfer(sample.snapshot);
            }
          }
        }
      } finally {
        await handle.close();
        if (options.showProgress) {
          this.reporter.finish();
        }
      }

      if (expected !== null && received !== expected) {
        throw new TransferError(
          `Received ${received} of ${expected} bytes for ${resource.localName}`,
          resource.remoteLink
        );
      }
      return received;
    });
  }
}
