import type { FetchResult, SettledFetchResult } from "../types";
import { sleep as defaultSleep, type SleepFn } from "./sleep";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  sleep?: SleepFn;
  /** Called once per attempt; `retryInMs` is set when another attempt follows. */
  onAttempt?: (result: FetchResult, attempt: number, retryInMs?: number) => void;
}

/** Wait between attempt `attempt` (1-based) and the next one. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Runs `task` until it yields a success or a permanent failure. Transient
 * failures are retried with exponential backoff and become permanent once
 * `maxAttempts` is used up, keeping the last reason.
 */
export async function withRetry(
  task: (attempt: number) => Promise<FetchResult>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<SettledFetchResult> {
  const sleep = hooks.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    const result = await task(attempt);

    if (result.kind !== "transient_failure") {
      hooks.onAttempt?.(result, attempt);
      return { ...result, attemptCount: attempt };
    }

    if (attempt >= maxAttempts) {
      hooks.onAttempt?.(result, attempt);
      return {
        kind: "permanent_failure",
        reason: result.reason,
        statusCode: result.statusCode,
        attemptCount: attempt,
      };
    }

    const delayMs = backoffDelay(attempt, policy);
    hooks.onAttempt?.(result, attempt, delayMs);
    await sleep(delayMs);
  }
}
