/**
 * Outcome of comparing a local file against its remote counterpart
 */
export type TransferDecision =
  | { action: 'fetch' }
  | { action: 'resume'; from: number; remoteSize: number }
  | { action: 'skip'; size: number }
  | { action: 'mismatch'; localSize: number; remoteSize: number };
