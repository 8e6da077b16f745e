// packages/core/src/utils/retry.ts

export interface RetryOptions {
  attempts: number;
  /** Base delay in ms, doubled on every further attempt */
  backoff: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 1000,
};

/** Promise-based delay. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry an async function with exponential backoff.
 * Returns the result on success, throws the last error after all attempts exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (opts.retryOn && !opts.retryOn(error)) {
        throw error;
      }

      if (attempt < opts.attempts) {
        const delay = opts.backoff * 2 ** (attempt - 1);
        opts.onRetry?.(error, attempt, delay);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
