import { sleep } from '../utils/async.js';

function parseRetryAfterMs(value: string | null): number | null {
  if (!value) return null;

  // Retry-After can be either seconds or an HTTP date.
  const asSeconds = Number(value);
  if (!Number.isNaN(asSeconds) && asSeconds >= 0) return asSeconds * 1000;

  const asDate = Date.parse(value);
  if (!Number.isNaN(asDate)) {
    const ms = asDate - Date.now();
    return ms > 0 ? ms : 0;
  }

  return null;
}

export interface FetchRetryOptions {
  timeoutMs: number; // per attempt
  maxRetries: number;
  retryDelayMs: number;
  maxRetryAfterMs?: number;
  onRetry?: (info: { attempt: number; status?: number; error?: unknown; waitMs: number }) => void;
}

/**
 * fetch with a timeout on every attempt and a bounded number of retries on
 * network errors, timeouts, 429 and 5xx. Other statuses are returned as-is.
 * The last network error is rethrown once retries run out.
 */
export async function fetchWithRetry(
  input: string | URL,
  init: RequestInit,
  options: FetchRetryOptions
): Promise<Response> {
  const { timeoutMs, maxRetries, retryDelayMs, maxRetryAfterMs = 60_000, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    let res: Response;
    try {
      res = await fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (attempt >= maxRetries) throw error;
      onRetry?.({ attempt: attempt + 1, error, waitMs: retryDelayMs });
      await sleep(retryDelayMs);
      continue;
    }

    if (res.ok) return res;

    const status = res.status;
    const shouldRetry = status === 429 || (status >= 500 && status <= 599);
    if (!shouldRetry || attempt >= maxRetries) {
      return res;
    }

    // Respect Retry-After when present (especially for 429)
    const retryAfter = parseRetryAfterMs(res.headers.get('retry-after'));
    const waitMs = Math.min(retryAfter ?? retryDelayMs, maxRetryAfterMs);

    // Drain body before retrying
    await res.text().catch(() => '');

    onRetry?.({ attempt: attempt + 1, status, waitMs });
    await sleep(waitMs);
  }
}
