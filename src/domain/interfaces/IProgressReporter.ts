/**
 * Progress output port
 */

export interface ProgressSnapshot {
  /** Bytes present locally, including any bytes from before a resume */
  bytesNow: number;
  bytesTotal: number;
  /** 0..1, guarded against a zero total */
  fraction: number;
  /** e.g. `(1.50/3.00 MiB)` */
  progress: string;
  /** e.g. `512 KiB/s` */
  speed: string;
  /** `HH:MM:SS`, or `--:--:--` when no speed estimate exists */
  eta: string;
}

export interface IProgressReporter {
  /** Redraws the byte-level progress of the current transfer */
  transfer(snapshot: ProgressSnapshot): void;
  /** Redraws the item-level progress of a batch (files extracted, files downloaded) */
  items(done: number, total: number): void;
  /** Ends the current progress line */
  finish(): void;
}
