/**
 * HTTP transport port
 * Only the two operations the transfer logic needs: a size probe and a
 * (possibly ranged) streaming GET
 */

export interface HttpGetOptions {
  /** Byte offset to resume from; 0 or undefined requests the whole resource */
  startAt?: number;
  signal?: AbortSignal;
}

export interface HttpBody {
  /** True when the origin answered 206 Partial Content */
  partial: boolean;
  /** First byte reported by Content-Range, or null for a full response */
  rangeStart: number | null;
  /** Bytes in this response body, when the origin declared it */
  contentLength: number | null;
  chunks: AsyncIterable<Uint8Array>;
}

export interface IHttpClient {
  /**
   * Returns the remote size of a resource without fetching its body
   * @throws TransferError when the origin rejects the request or reports no size
   */
  probeSize(url: string, signal?: AbortSignal): Promise<number>;

  /**
   * Starts a GET and hands back the body as a chunk stream
   * @throws TransferError on a non-success status
   */
  get(url: string, options?: HttpGetOptions): Promise<HttpBody>;
}
