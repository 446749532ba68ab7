/**
 * Retry utility with exponential backoff
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles afterwards */
  baseDelay?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  sleep?: Sleep;
}

/**
 * Retry mechanism with exponential backoff. The last error is rethrown.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, baseDelay = 1000, shouldRetry = () => true, onRetry, sleep: wait = sleep } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      onRetry?.(error, attempt);
      const delay = baseDelay * Math.pow(2, attempt - 1);
      if (delay > 0) {
        await wait(delay);
      }
    }
  }
}
