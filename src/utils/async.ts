export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  retries: number; // extra attempts after the first
  delayMs: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `operation`, retrying a bounded number of times with a fixed delay.
 * The last error is rethrown.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.retries) throw error;
      options.onRetry?.(error, attempt + 1);
      if (options.delayMs > 0) await sleep(options.delayMs);
    }
  }
}
