/**
 * Bounded exponential backoff for calls into external capabilities.
 *
 * Only errors flagged `retryable` (ExternalServiceError) are retried.
 * Everything else, including an abort, propagates immediately.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { AuditError } from "./errors.js";

export interface RetryPolicy {
  maxRetries: number;
  backoffMs: number;
  /** Upper bound for a single delay. Defaults to 30 s. */
  maxBackoffMs?: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (err: AuditError, attempt: number, delayMs: number) => void;
}

const DEFAULT_MAX_BACKOFF_MS = 30_000;

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const cap = policy.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  return Math.min(policy.backoffMs * 2 ** attempt, cap);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, onRetry } = options;
  let attempt = 0;

  for (;;) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (err: unknown) {
      if (!(err instanceof AuditError) || !err.retryable || attempt >= policy.maxRetries) {
        throw err;
      }
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(err, attempt + 1, delayMs);
      try {
        await sleep(delayMs, undefined, signal ? { signal } : undefined);
      } catch (sleepErr: unknown) {
        signal?.throwIfAborted();
        throw sleepErr;
      }
      attempt++;
    }
  }
}
