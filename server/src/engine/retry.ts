import {
  ChunkTimeoutError,
  TransferCancelledError,
  isRetryable,
} from "../errors/transfer.errors";
import type { RetryPolicy } from "../models/transfer.model";

export interface RetryOptions extends RetryPolicy {
  /** Per-attempt timeout; 0 disables it. */
  timeoutMs: number;
  /** Cancellation: checked before each attempt and ends backoff sleeps early. */
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `operation` with a deadline. The operation receives a signal that is
 * aborted when the deadline passes; the returned promise rejects with
 * ChunkTimeoutError at that point even if the operation ignores the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return operation(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ChunkTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Exponential backoff retry. Throws the last error once attempts are
 * exhausted or a non-retryable error is seen, and TransferCancelledError if
 * the signal fires between attempts.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new TransferCancelledError();
    }

    try {
      return await withTimeout(
        (signal) => operation(signal, attempt),
        options.timeoutMs,
      );
    } catch (error) {
      lastError = error;
      if (attempt === options.maxAttempts || !shouldRetry(error)) {
        break;
      }

      const delay = backoffDelay(attempt, options);
      options.onRetry?.(attempt, error, delay);
      await sleep(delay, options.signal);
    }
  }

  if (options.signal?.aborted) {
    throw new TransferCancelledError();
  }
  throw lastError;
}
