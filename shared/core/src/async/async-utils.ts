/**
 * Shared Async Utilities
 *
 * Retry with backoff, cancellable sleep and bounded polling.
 * Used by the chain client (RPC retries, receipt polling) and the marker
 * tracker (waiting out another provider's turn).
 */

import { toError } from '../resilience/error-handling';

// =============================================================================
// Retry Utilities
// =============================================================================

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Use exponential backoff */
  exponential: boolean;
  isRetryable: (error: Error) => boolean;
  onRetry: (error: Error, attempt: number, nextDelayMs: number) => void;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  exponential: true,
  isRetryable: () => true,
  onRetry: () => {},
};

/**
 * Execute an async function with retry logic.
 *
 * @throws The last error if all attempts fail or the error is not retryable
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };

  if (!Number.isFinite(cfg.maxAttempts) || cfg.maxAttempts < 1) {
    throw new TypeError(`withRetry: maxAttempts must be a finite number >= 1, got ${cfg.maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);
      if (attempt >= cfg.maxAttempts || !cfg.isRetryable(lastError)) {
        throw lastError;
      }

      const delay = cfg.exponential
        ? Math.min(cfg.baseDelayMs * Math.pow(2, attempt - 1), cfg.maxDelayMs)
        : cfg.baseDelayMs;

      cfg.onRetry(lastError, attempt, delay);
      await sleep(delay);
    }
  }
}

// =============================================================================
// Delay Utilities
// =============================================================================

/**
 * Sleep for a specified duration. Rejects with the signal's reason when
 * aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Call check() every intervalMs until it returns a non-null value or the
 * timeout elapses. Resolves null on timeout.
 */
export async function pollUntil<T>(
  check: () => Promise<T | null>,
  options: PollOptions
): Promise<T | null> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== null) {
      return value;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return null;
    }
    await sleep(Math.min(options.intervalMs, remaining), options.signal);
  }
}
