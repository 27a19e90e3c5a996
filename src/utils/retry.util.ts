// Backoff for calls that leave the process. The calculation core never retries.

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;      // ms, doubled on every attempt
  maxDelay: number;       // ms
  jitterFactor: number;   // 0-1 share of the delay added or removed at random
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetryExhaustedError';
  }
}

export function backoffDelay(retry: number, { baseDelay, maxDelay, jitterFactor }: RetryOptions): number {
  const capped = Math.min(baseDelay * 2 ** retry, maxDelay);
  const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, capped + jitter);
}

const NETWORK_FAILURE = /timeout|timed out|econnrefused|econnreset|enotfound|network/i;

export function isNetworkError(error: Error): boolean {
  return NETWORK_FAILURE.test(error.message);
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  isRetryable: (error: Error) => boolean
): Promise<T> {
  const attempts = options.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= attempts) {
        throw new RetryExhaustedError(attempts, error);
      }
      await new Promise(resolve => setTimeout(resolve, backoffDelay(attempt - 1, options)));
    }
  }
}
