import type { AxiosResponse } from 'axios';
import { GeminiRateLimitError, isTransient } from './errors';

export type RetryListener = (error: unknown, attempt: number, delayMs: number) => void;

/** Exponential backoff for transient failures: base, 2 × base, 4 × base, ... */
export class RetryPolicy {
  constructor(
    private maxRetries: number,
    private baseDelayMs: number,
  ) {}

  static async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /** Retry-After header in milliseconds, if the server sent one */
  static getRetryAfter(response: AxiosResponse): number | undefined {
    const header: unknown = response.headers['retry-after'];
    if (typeof header !== 'string') return undefined;
    const seconds = parseInt(header, 10);
    return Number.isNaN(seconds) ? undefined : seconds * 1000;
  }

  delayFor(attempt: number, error: unknown): number {
    if (error instanceof GeminiRateLimitError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    return this.baseDelayMs * 2 ** attempt;
  }

  async run<T>(task: () => Promise<T>, onRetry?: RetryListener): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await task();
      } catch (error) {
        if (attempt >= this.maxRetries || !isTransient(error)) throw error;
        const delay = this.delayFor(attempt, error);
        onRetry?.(error, attempt + 1, delay);
        await RetryPolicy.sleep(delay);
      }
    }
  }
}
