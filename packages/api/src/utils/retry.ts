import { isTransient } from '../errors';

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

/**
 * Run `operation`, retrying immediately on transient failures.
 * A cancelled signal stops further attempts and the last error propagates.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  { retries, shouldRetry = isTransient, onRetry, signal }: RetryOptions
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= retries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }
      attempt++;
      onRetry?.(error, attempt);
    }
  }
}
