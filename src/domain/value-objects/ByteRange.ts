/**
 * Immutable value object representing a byte range inside an archive blob
 * Start is inclusive, end is exclusive, so an empty range is representable
 */
export class ByteRange {
  constructor(
    public readonly start: number,
    public readonly length: number
  ) {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(length)) {
      throw new Error(`ByteRange: start and length must be integers, got start=${start}, length=${length}`);
    }
    if (start < 0 || length < 0) {
      throw new Error(`ByteRange: start and length must be non-negative, got start=${start}, length=${length}`);
    }
  }

  /**
   * First byte offset past the range
   */
  get end(): number {
    return this.start + this.length;
  }

  /**
   * Formats the range for diagnostics, e.g. `[10, 30)`
   */
  toString(): string {
    return `[${this.start}, ${this.end})`;
  }

  /**
   * Creates a range from a manifest offset/size pair
   */
  static at(offset: number, size: number): ByteRange {
    return new ByteRange(offset, size);
  }
}
