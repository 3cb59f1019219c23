/**
 * Retry Policy
 * Re-runs an attempt on retryable transient failures with exponential backoff
 */

import type { FailureCause, FetchOutcome } from "../types";
import { sleep, type Sleeper } from "./sleep";

export interface RetryEvent {
  attempt: number; // The attempt that just failed (1-based)
  delay: number; // Milliseconds before the next attempt
  cause: FailureCause;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelay: number; // In milliseconds
  maxDelay: number; // In milliseconds
  sleep?: Sleeper;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryResult {
  outcome: FetchOutcome;
  attempts: number;
}

/**
 * Delay before the attempt following `attempt`: 1x, 2x, 4x... the base, capped
 */
export function backoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
): number {
  return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
}

function retryableCause(outcome: FetchOutcome): FailureCause | null {
  if (outcome.type === "transient-failure" && outcome.cause.retryable) {
    return outcome.cause;
  }
  return null;
}

/**
 * Run `operation` up to `maxAttempts` times
 *
 * Success, not-found, permanent skips and non-retryable failures return at
 * once. After the last attempt the final transient failure is returned.
 */
export async function withRetry(
  operation: (attempt: number) => Promise<FetchOutcome>,
  options: RetryOptions,
): Promise<RetryResult> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const wait = options.sleep ?? sleep;

  let attempts = 1;
  let outcome = await operation(attempts);
  let cause = retryableCause(outcome);

  while (cause && attempts < maxAttempts) {
    const delay = backoffDelay(attempts, options.baseDelay, options.maxDelay);
    options.onRetry?.({ attempt: attempts, delay, cause });
    await wait(delay);

    attempts++;
    outcome = await operation(attempts);
    cause = retryableCause(outcome);
  }

  return { outcome, attempts };
}
