/**
 * In-process origin for tests: serves byte buffers by URL, honours
 * resume offsets and records every request
 */

import { HttpBody, HttpGetOptions, IHttpClient } from '../domain/interfaces';
import { TransferError } from '../domain/errors';

export interface RecordedRequest {
    method: 'HEAD' | 'GET';
    url: string;
    startAt: number;
}

async function* halves(content: Buffer): AsyncGenerator<Uint8Array> {
    const middle = Math.floor(content.length / 2);
    if (middle > 0) {
        yield content.subarray(0, middle);
    }
    if (content.length > middle) {
        yield content.subarray(middle);
    }
}

export class InMemoryHttpClient implements IHttpClient {
    private readonly resources = new Map<string, Buffer>();
    private readonly broken = new Set<string>();
    readonly requests: RecordedRequest[] = [];

    serve(url: string, content: Buffer | string): this {
        this.resources.set(url, Buffer.isBuffer(content) ? content : Buffer.from(content));
        return this;
    }

    /**
     * Keeps answering HEAD for the URL but fails every GET with a 500
     */
    failDownloads(url: string): this {
        this.broken.add(url);
        return this;
    }

    async probeSize(url: string): Promise<number> {
        this.requests.push({ method: 'HEAD', url, startAt: 0 });
        return this.lookup(url).length;
    }

    async get(url: string, options: HttpGetOptions = {}): Promise<HttpBody> {
        const startAt = options.startAt ?? 0;
        this.requests.push({ method: 'GET', url, startAt });
        const content = this.lookup(url);
        if (this.broken.has(url)) {
            throw new TransferError(`HTTP 500 Internal Server Error for GET ${url}`, url, 500);
        }

        if (startAt > 0 && startAt < content.length) {
            return {
                partial: true,
                rangeStart: startAt,
                contentLength: content.length - startAt,
                chunks: halves(content.subarray(startAt))
            };
        }
        return { partial: false, rangeStart: null, contentLength: content.length, chunks: halves(content) };
    }

    private lookup(url: string): Buffer {
        const content = this.resources.get(url);
        if (!content) {
            throw new TransferError(`HTTP 404 Not Found for ${url}`, url, 404);
        }
        return content;
    }
}
