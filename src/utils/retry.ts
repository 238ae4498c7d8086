// Exponential backoff around a whole provider call

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const IMAGE_RETRY_POLICY = {
  attempts: 3,
  minDelayMs: 2000,
  maxDelayMs: 20000,
} as const;

export function backoffDelay(attempt: number, minDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, minDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `fn` up to `attempts` times. Errors rejected by `shouldRetry` are
 * rethrown immediately; otherwise the last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!options.shouldRetry(error) || attempt === attempts) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options.minDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}
