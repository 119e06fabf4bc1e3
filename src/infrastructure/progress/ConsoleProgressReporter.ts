/**
 * Console progress reporter
 * Redraws one line in place with carriage returns
 */

import { IProgressReporter, ProgressSnapshot } from '../../domain/interfaces';
import { ByteFormatter } from './ByteFormatter';
import { ProgressBar } from './ProgressBar';

export interface ConsoleOutput {
  write(text: string): unknown;
  columns?: number;
}

const DEFAULT_COLUMNS = 80;

export class ConsoleProgressReporter implements IProgressReporter {
  private lastWidth = 0;

  constructor(private readonly out: ConsoleOutput = process.stdout) {}

  transfer(snapshot: ProgressSnapshot): void {
    const bar = ProgressBar.render(snapshot.fraction, this.barWidth());
    this.redraw(
      `${ByteFormatter.toPercentage(snapshot.fraction)} ${bar} ${snapshot.progress}` +
      ` | Speed: ${snapshot.speed} | ETA: ${snapshot.eta}`
    );
  }

  items(done: number, total: number): void {
    const fraction = total > 0 ? done / total : 1;
    const bar = ProgressBar.render(fraction, this.barWidth());
    this.redraw(`${ByteFormatter.toPercentage(fraction)} ${bar} (${done}/${total})`);
  }

  finish(): void {
    if (this.lastWidth > 0) {
      this.out.write('\n');
      this.lastWidth = 0;
    }
  }

  private redraw(line: string): void {
    const padding = ' '.repeat(Math.max(this.lastWidth - line.length, 0));
    this.out.write(`\r${line}${padding}`);
    this.lastWidth = line.length;
  }

  private barWidth(): number {
    return ProgressBar.widthFor(this.out.columns ?? DEFAULT_COLUMNS);
  }
}

/**
 * Reporter for transfers that must not print fine-grained progress
 */
export class SilentProgressReporter implements IProgressReporter {
  transfer(): void {}

  items(): void {}

  finish(): void {}
}
