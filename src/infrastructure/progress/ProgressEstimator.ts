/**
 * Throughput and ETA estimation for a single transfer
 *
 * Pure functions: the transfer loop owns the state and feeds it samples.
 */

import config from '../../config';
import { ProgressSnapshot } from '../../domain/interfaces/IProgressReporter';
import { ByteFormatter } from './ByteFormatter';

export interface ProgressState {
  readonly lastSampleTime: number;
  readonly lastSampleBytes: number;
  /** Smoothed bytes per second, null until the first sample */
  readonly averageSpeed: number | null;
  /** Bytes present locally before this transfer started (resume) */
  readonly bytesAlreadyPresent: number;
}

export interface ProgressSample {
  state: ProgressState;
  /** Null when the callback was coalesced */
  snapshot: ProgressSnapshot | null;
}

export interface EstimatorSettings {
  sampleIntervalMs: number;
  smoothingFactor: number;
}

const DEFAULT_SETTINGS: EstimatorSettings = {
  sampleIntervalMs: config.SAMPLE_INTERVAL_MS,
  smoothingFactor: config.SMOOTHING_FACTOR
};

export const UNKNOWN_ETA = '--:--:--';

export function createProgressState(now: number, bytesAlreadyPresent: number = 0): ProgressState {
  return {
    lastSampleTime: now,
    lastSampleBytes: bytesAlreadyPresent,
    averageSpeed: null,
    bytesAlreadyPresent
  };
}

/**
 * Folds one instantaneous speed into the moving average
 */
export function smoothSpeed(previous: number | null, instant: number, smoothingFactor: number): number {
  if (previous === null) {
    return instant;
  }
  return smoothingFactor * instant + (1 - smoothingFactor) * previous;
}

/**
 * Feeds one (received, expected) callback into the estimator
 *
 * `received` and `expected` count this response's bytes only; bytes that
 * were already on disk are added from the state.
 */
export function sampleProgress(
  state: ProgressState,
  now: number,
  received: number,
  expected: number,
  settings: EstimatorSettings = DEFAULT_SETTINGS
): ProgressSample {
  const bytesNow = received + state.bytesAlreadyPresent;
  const bytesTotal = expected + state.bytesAlreadyPresent;
  const elapsedMs = now - state.lastSampleTime;

  let next = state;
  if (elapsedMs >= settings.sampleIntervalMs) {
    const instant = ((bytesNow - state.lastSampleBytes) * 1000) / elapsedMs;
    next = {
      ...state,
      lastSampleTime: now,
      lastSampleBytes: bytesNow,
      averageSpeed: smoothSpeed(state.averageSpeed, instant, settings.smoothingFactor)
    };
  } else if (bytesNow < bytesTotal) {
    return { state, snapshot: null };
  }

  return { state: next, snapshot: buildSnapshot(bytesNow, bytesTotal, next.averageSpeed) };
}

export function buildSnapshot(bytesNow: number, bytesTotal: number, averageSpeed: number | null): ProgressSnapshot {
  const fraction = bytesTotal > 0 ? Math.min(bytesNow / bytesTotal, 1) : 1;
  return {
    bytesNow,
    bytesTotal,
    fraction,
    progress: ByteFormatter.toProgress(bytesNow, bytesTotal),
    speed: ByteFormatter.toSpeed(averageSpeed ?? 0),
    eta: formatEta(bytesTotal - bytesNow, averageSpeed)
  };
}

/**
 * Remaining time as HH:MM:SS; no usable speed renders UNKNOWN_ETA
 */
export function formatEta(bytesRemaining: number, averageSpeed: number | null): string {
  if (averageSpeed === null || !Number.isFinite(averageSpeed) || averageSpeed <= 0) {
    return UNKNOWN_ETA;
  }
  const seconds = Math.floor(Math.max(bytesRemaining, 0) / averageSpeed);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return [hours, minutes, secs].map((part) => part.toString().padStart(2, '0')).join(':');
}
