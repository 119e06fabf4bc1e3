/**
 * IHttpClient over the global fetch API
 */

import { HttpBody, HttpGetOptions, IHttpClient, ILogger } from '../../domain/interfaces';
import { TransferError } from '../../domain/errors';
import { ContentRangeParser } from './ContentRangeParser';
import { HTTP_HEADERS, HTTP_STATUS, rangeFrom } from './HttpConstants';

type ResponseStream = NonNullable<Response['body']>;

export class FetchHttpClient implements IHttpClient {
  constructor(private readonly logger: ILogger) {}

  async probeSize(url: string, signal?: AbortSignal): Promise<number> {
    const response = await fetch(url, { method: 'HEAD', signal });
    if (!response.ok) {
      throw new TransferError(`HTTP ${response.status} ${response.statusText} for HEAD ${url}`, url, response.status);
    }

    const size = this.readLength(response);
    if (size === null) {
      throw new TransferError(`Origin reported no size for ${url}`, url, response.status);
    }
    return size;
  }

  async get(url: string, options: HttpGetOptions = {}): Promise<HttpBody> {
    const startAt = options.startAt ?? 0;
    const headers: Record<string, string> = {};
    if (startAt > 0) {
      headers[HTTP_HEADERS.RANGE] = rangeFrom(startAt);
    }

    const response = await fetch(url, { headers, signal: options.signal });
    if (response.status === HTTP_STATUS.RANGE_NOT_SATISFIABLE) {
      await response.body?.cancel();
      throw this.unsatisfiedRange(response, url, startAt);
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new TransferError(`HTTP ${response.status} ${response.statusText} for GET ${url}`, url, response.status);
    }
    if (!response.body) {
      throw new TransferError(`No response body for ${url}`, url, response.status);
    }

    const partial = response.status === HTTP_STATUS.PARTIAL_CONTENT;
    let rangeStart: number | null = null;
    if (partial) {
      const header = response.headers.get(HTTP_HEADERS.CONTENT_RANGE);
      const parsed = header === null ? null : ContentRangeParser.parse(header);
      if (!parsed || !parsed.success || parsed.value.type !== 'range') {
        await response.body.cancel();
        throw new TransferError(`Missing or invalid Content-Range in partial response for ${url}`, url, response.status);
      }
      rangeStart = parsed.value.start;
    }

    this.logger.debug(`GET ${url}: status=${response.status}, range=${startAt > 0 ? rangeFrom(startAt) : 'none'}`);

    return {
      partial,
      rangeStart,
      contentLength: this.readLength(response),
      chunks: this.readChunks(response.body, url)
    };
  }

  /**
   * A 416 may carry the remote size as its Content-Range total
   */
  private unsatisfiedRange(response: Response, url: string, startAt: number): TransferError {
    const header = response.headers.get(HTTP_HEADERS.CONTENT_RANGE);
    const parsed = header === null ? null : ContentRangeParser.parse(header);
    if (parsed && parsed.success && parsed.value.type === 'unsatisfied') {
      return new TransferError(
        `Cannot resume ${url} at byte ${startAt}: origin has only ${parsed.value.total} bytes`,
        url,
        response.status
      );
    }
    return new TransferError(`Cannot resume ${url} at byte ${startAt}: range not satisfiable`, url, response.status);
  }

  private readLength(response: Response): number | null {
    const header = response.headers.get(HTTP_HEADERS.CONTENT_LENGTH);
    if (header === null || !/^\d+$/.test(header.trim())) {
      return null;
    }
    return Number(header.trim());
  }

  /**
   * Yields body chunks; a consumer that stops early cancels the body
   */
  private async *readChunks(body: ResponseStream, url: string): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          return;
        }
        yield value;
      }
    } finally {
      if (!finished) {
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug(`[${url}] Could not cancel response body:`, error);
        });
      }
      reader.releaseLock();
    }
  }
}
