/**
 * Retry loop for TES HTTP calls: a bounded number of retries with
 * exponential backoff on transient statuses and network errors.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../utils/logger.js";

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const MAX_BACKOFF_SECONDS = 120;

export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying. */
  maxRetries: number;
  /** Seconds; the nth retry waits backoffFactor * 2^(n-1). */
  backoffFactor: number;
  retryableStatuses: ReadonlySet<number>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export function backoffMs(policy: RetryPolicy, retry: number): number {
  const seconds = policy.backoffFactor * 2 ** (retry - 1);
  return Math.min(seconds, MAX_BACKOFF_SECONDS) * 1000;
}

/**
 * Run `attempt` until it yields a non-retryable response or retries run out.
 * When the last attempt still returns a retryable status, that response is
 * returned so the caller maps it like any other status.
 */
export async function fetchWithRetry<T extends { status: number }>(
  attempt: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  sleep: Sleep = defaultSleep
): Promise<T> {
  for (let retry = 0; ; retry++) {
    const canRetry = retry < policy.maxRetries;

    let response: T;
    try {
      response = await attempt();
    } catch (err) {
      if (!canRetry || !isTransientError(err)) {
        throw err;
      }
      const waitMs = backoffMs(policy, retry + 1);
      logger.debug(
        { retry: retry + 1, waitMs, error: err instanceof Error ? err.message : String(err) },
        "Retrying TES request after network error"
      );
      await sleep(waitMs);
      continue;
    }

    if (!canRetry || !policy.retryableStatuses.has(response.status)) {
      return response;
    }

    const waitMs = backoffMs(policy, retry + 1);
    logger.debug(
      { retry: retry + 1, waitMs, status: response.status },
      "Retrying TES request after retryable status"
    );
    await sleep(waitMs);
  }
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  // AbortError is our timeout firing; fetch() reports connection failures as
  // TypeError("fetch failed"). Other TypeErrors (a malformed URL) are not retried.
  if (error.name === "AbortError" || error.name === "TimeoutError") return true;
  if (error instanceof TypeError && error.message === "fetch failed") return true;

  const code = "code" in error ? error.code : undefined;
  if (code === "ECONNREFUSED") return true;
  if (code === "ETIMEDOUT") return true;
  if (code === "ENOTFOUND") return true;
  if (code === "ECONNRESET") return true;

  return false;
}
