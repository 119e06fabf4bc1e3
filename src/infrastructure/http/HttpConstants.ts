/**
 * HTTP status codes used by transfers
 */
export const HTTP_STATUS = {
  PARTIAL_CONTENT: 206,
  RANGE_NOT_SATISFIABLE: 416
} as const;

/**
 * HTTP headers read or sent by transfers
 */
export const HTTP_HEADERS = {
  CONTENT_LENGTH: 'content-length',
  CONTENT_RANGE: 'content-range',
  RANGE: 'Range',
  ACCEPT_RANGES: 'bytes'
} as const;

/**
 * Builds an open-ended Range header value: bytes=START-
 */
export function rangeFrom(start: number): string {
  return `${HTTP_HEADERS.ACCEPT_RANGES}=${start}-`;
}
