import config from '../../config';

/**
 * Renders `[=====>    ]` bars
 */
export class ProgressBar {
  /**
   * @param fraction - 0..1, clamped
   * @param width - cells between the brackets, capped at MAX_BAR_WIDTH
   */
  static render(fraction: number, width: number): string {
    const cells = Math.max(0, Math.min(Math.floor(width), config.MAX_BAR_WIDTH));
    const clamped = Math.min(Math.max(fraction, 0), 1);
    const filled = Math.floor(cells * clamped);
    const head = filled > 0 ? `${'='.repeat(filled - 1)}>` : '';
    return `[${head}${' '.repeat(cells - filled)}]`;
  }

  /**
   * Bar width for a console of the given column count
   */
  static widthFor(columns: number): number {
    return Math.floor(columns / 4);
  }
}
