/**
 * Utility for formatting byte values
 *
 * Each string picks the largest binary unit that keeps its magnitude below 1024.
 */
export class ByteFormatter {
  private static readonly KiB = 1024;
  private static readonly MiB = 1024 * 1024;
  private static readonly GiB = 1024 * 1024 * 1024;

  /**
   * Formats transferred/total, with the unit chosen from the total
   *
   * @example
   * ByteFormatter.toProgress(512, 2048) // '(0.50/2.00 KiB)'
   */
  static toProgress(bytesNow: number, bytesTotal: number): string {
    if (bytesTotal < this.KiB) {
      return `(${bytesNow}/${bytesTotal} B)`;
    }
    const [divisor, unit] = this.unitFor(bytesTotal);
    return `(${(bytesNow / divisor).toFixed(2)}/${(bytesTotal / divisor).toFixed(2)} ${unit})`;
  }

  /**
   * Formats a transfer rate; precision grows with the unit
   */
  static toSpeed(bytesPerSecond: number): string {
    const speed = Math.max(0, Math.floor(bytesPerSecond));
    if (speed < this.KiB) {
      return `${speed} B/s`;
    }
    if (speed < this.MiB) {
      return `${Math.floor(speed / this.KiB)} KiB/s`;
    }
    if (speed < this.GiB) {
      return `${(speed / this.MiB).toFixed(1)} MiB/s`;
    }
    return `${(speed / this.GiB).toFixed(2)} GiB/s`;
  }

  /**
   * Formats a size in every unit, for statistics output
   *
   * @example
   * ByteFormatter.toSummary(1536) // '1536 B, 1.50 KiB, 0.00 MiB, 0.00 GiB'
   */
  static toSummary(bytes: number): string {
    return [
      `${bytes} B`,
      `${(bytes / this.KiB).toFixed(2)} KiB`,
      `${(bytes / this.MiB).toFixed(2)} MiB`,
      `${(bytes / this.GiB).toFixed(2)} GiB`
    ].join(', ');
  }

  /**
   * Formats a 0..1 fraction as a right-aligned integer percentage
   */
  static toPercentage(fraction: number): string {
    const clamped = Math.min(Math.max(fraction, 0), 1);
    return `${Math.floor(clamped * 100).toString().padStart(3, ' ')}%`;
  }

  private static unitFor(bytes: number): [number, string] {
    if (bytes < this.MiB) {
      return [this.KiB, 'KiB'];
    }
    if (bytes < this.GiB) {
      return [this.MiB, 'MiB'];
    }
    return [this.GiB, 'GiB'];
  }
}
