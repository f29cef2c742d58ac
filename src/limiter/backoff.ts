import { QuotaExceededError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep';

const log = createLogger('backoff');

export const FALLBACK_RETRY_SECONDS = 30;

export interface RetryPolicy {
  /** Attempts in total, the first call included. Infinity retries until success. */
  maxAttempts: number;

  /** Upper bound for a single wait (ms). Unset: no cap. */
  maxDelayMs?: number;

  /** Added to every computed wait (ms) */
  safetyMarginMs: number;

  /** Long waits are slept in chunks of this size, checking for cancellation in between (ms) */
  progressChunkMs: number;
}

// Synchronous callers: a few short waits, then the quota error surfaces.
export const INTERACTIVE_RETRY: RetryPolicy = {
  maxAttempts: 3,
  maxDelayMs: 120_000,
  safetyMarginMs: 5_000,
  progressChunkMs: 60_000,
};

// Long-running batches outlive the quota window, so they keep waiting.
export const BATCH_RETRY: RetryPolicy = {
  maxAttempts: Infinity,
  safetyMarginMs: 5_000,
  progressChunkMs: 60_000,
};

const QUOTA_PATTERN = /\b429\b|quota|rate[ -]?limit|resource[ _]?exhausted|too many requests/i;

export function isQuotaExceeded(err: unknown): boolean {
  return err instanceof QuotaExceededError || QUOTA_PATTERN.test(errorMessage(err));
}

/** Seconds suggested by a "retry in N s" hint, rounded up; 30 when absent. */
export function extractRetryDelay(detail: string): number {
  const match = /retry in (\d+(?:\.\d+)?)/i.exec(detail);
  if (!match) return FALLBACK_RETRY_SECONDS;
  return Math.floor(Number(match[1])) + 1;
}

export function backoffDelayMs(baseSeconds: number, attempt: number, policy: RetryPolicy): number {
  const delay = baseSeconds * 2 ** attempt * 1000 + policy.safetyMarginMs;
  return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: Sleeper;
  label?: string;
  onWait?: (info: { attempt: number; delayMs: number }) => void;
}

export class RetryAbortedError extends Error {
  constructor(label: string) {
    super(`${label}: retry cancelled`);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Runs `fn`, waiting out quota failures according to `policy`. Other errors
 * are rethrown at once.
 */
export async function withQuotaRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'request';

  for (let attempt = 0; ; attempt++) {
    if (options.signal?.aborted) throw new RetryAbortedError(label);
    try {
      return await fn();
    } catch (err) {
      if (!isQuotaExceeded(err)) throw err;
      if (attempt + 1 >= policy.maxAttempts) {
        log.error(`${label}: quota still exceeded after ${attempt + 1} attempts`);
        throw new QuotaExceededError(`${label}: quota exceeded after ${attempt + 1} attempts: ${errorMessage(err)}`);
      }

      const delayMs = backoffDelayMs(extractRetryDelay(errorMessage(err)), attempt, policy);
      options.onWait?.({ attempt: attempt + 1, delayMs });
      log.warn(`${label}: quota exceeded, waiting ${Math.round(delayMs / 1000)}s (attempt ${attempt + 1})`);
      await waitInChunks(delayMs, policy.progressChunkMs, sleep, label, options.signal);
    }
  }
}

async function waitInChunks(total: number, chunk: number, sleep: Sleeper, label: string, signal?: AbortSignal) {
  let waited = 0;
  while (waited < total) {
    const step = Math.min(chunk, total - waited);
    await sleep(step, signal);
    if (signal?.aborted) throw new RetryAbortedError(label);
    waited += step;
    const left = total - waited;
    if (left > chunk) log.info(`${label}: ${(left / 60_000).toFixed(1)} min left before retrying`);
  }
}
