/**
 * Streaming decompress-to-file port
 */

export interface IDecompressor {
  /**
   * Inflates `source` into `destination`, overwriting it
   */
  decompress(source: string, destination: string): Promise<void>;
}
