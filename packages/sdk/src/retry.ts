/**
 * @clusterops/sdk — Retry/Backoff Scheduler
 *
 * wait = max(baseDelay * 2^(retryIndex - 1), Retry-After)
 *
 * retryIndex counts retries: 1 for the first retry, 2 for the second, …
 * A server's Retry-After is never shortened by the client's own schedule.
 */
import { DEFAULT_BASE_DELAY_MS } from '@clusterops/core';
import { CancelledError } from './errors.js';

export interface RetryDecision {
  retry: boolean;
  waitMs: number;
}

const DELTA_SECONDS = /^\d+$/;
const IMF_FIXDATE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

export function exponentialBackoffMs(retryIndex: number, baseDelayMs = DEFAULT_BASE_DELAY_MS): number {
  return baseDelayMs * Math.pow(2, Math.max(retryIndex, 1) - 1);
}

/**
 * Parse a Retry-After header value into a wait in milliseconds.
 *
 * Accepts delta-seconds (`"120"`) or an RFC 7231 HTTP-date
 * (`"Wed, 21 Oct 2015 07:28:00 GMT"`). Returns null when the header is absent,
 * malformed, or names a moment that is not in the future.
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | null {
  if (header == null) return null;
  const value = header.trim();

  if (DELTA_SECONDS.test(value)) {
    const seconds = Number(value);
    return Number.isSafeInteger(seconds) ? seconds * 1_000 : null;
  }

  if (IMF_FIXDATE.test(value)) {
    const at = Date.parse(value);
    if (Number.isNaN(at)) return null;
    const diff = at - now;
    return diff > 0 ? diff : null;
  }

  return null;
}

export function computeRetryDelay(
  retryIndex: number,
  retryAfterMs: number | null,
  baseDelayMs = DEFAULT_BASE_DELAY_MS,
): number {
  const backoff = exponentialBackoffMs(retryIndex, baseDelayMs);
  return retryAfterMs === null ? backoff : Math.max(backoff, retryAfterMs);
}

/**
 * Decide whether attempt `attempt + 1` happens and how long to wait first.
 *
 * @param attempt - attempts made so far (1 after the initial attempt)
 */
export function decideRetry(options: {
  retryable: boolean;
  attempt: number;
  maxRetries: number;
  retryAfterMs?: number | null;
  baseDelayMs?: number;
}): RetryDecision {
  const { retryable, attempt, maxRetries } = options;
  if (!retryable || attempt > maxRetries) {
    return { retry: false, waitMs: 0 };
  }
  return {
    retry: true,
    waitMs: computeRetryDelay(attempt, options.retryAfterMs ?? null, options.baseDelayMs),
  };
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-based wait that rejects with CancelledError as soon as `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
