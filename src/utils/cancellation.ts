import { RunCancelledError } from '../domain/errors';

/**
 * Coarse cancellation check, called between resources
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

/**
 * Runs `work` and reports any failure caused by an abort as a cancellation;
 * fetch rejects with a DOMException AbortError that would otherwise look local
 */
export async function cancellable<T>(signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    throw error;
  }
}
