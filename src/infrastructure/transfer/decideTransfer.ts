import { TransferDecision } from '../../domain/value-objects/TransferDecision';

/**
 * The single resumability rule for every downloadable resource
 *
 * - absent              → fetch
 * - local < remote      → resume from local
 * - local == remote     → skip
 * - local > remote      → mismatch (never truncated)
 *
 * @param localSize - null when no local file exists
 */
export function decideTransfer(localSize: number | null, remoteSize: number): TransferDecision {
  if (localSize === null) {
    return { action: 'fetch' };
  }
  if (localSize < remoteSize) {
    return { action: 'resume', from: localSize, remoteSize };
  }
  if (localSize === remoteSize) {
    return { action: 'skip', size: localSize };
  }
  return { action: 'mismatch', localSize, remoteSize };
}
