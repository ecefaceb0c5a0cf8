import { ConflictError } from "../errors";
import { sleep } from "../utils/concurrency";

export interface ConflictRetryOptions {
  maxAttempts: number;
  initialDelayMs?: number;
  onRetry?: (attempt: number, error: ConflictError) => void;
}

/**
 * Re-runs a read-modify-write after a {@link ConflictError}, with exponential
 * backoff. `fn` must re-read the entry on every attempt. Other errors propagate
 * immediately; the last ConflictError propagates once attempts run out.
 */
export async function withConflictRetry<T>(fn: () => Promise<T>, options: ConflictRetryOptions): Promise<T> {
  const initialDelayMs = options.initialDelayMs ?? 0;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ConflictError) || attempt >= options.maxAttempts) {
        throw error;
      }
      options.onRetry?.(attempt, error);
      if (initialDelayMs > 0) {
        await sleep(initialDelayMs * Math.pow(2, attempt - 1));
      }
    }
  }
}
