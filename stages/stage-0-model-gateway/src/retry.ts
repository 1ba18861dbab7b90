import { ProviderError } from "./providers/types.js";
import type { RetryOptions } from "./types.js";

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

const RETRYABLE_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"]);

export interface RetryHooks {
  /** Stops the backoff wait; no attempt starts after the signal aborts. */
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Transport failures worth another attempt: 429/5xx, connection failures
 * and network resets.
 * An abort is not retried: it is either the caller cancelling or the
 * per-request timeout, and both must surface.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    if (error.status === undefined) {
      return error.code === "connection_error";
    }
    return error.status === 429 || error.status >= 500;
  }
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return typeof error.code === "string" && RETRYABLE_CODES.has(error.code);
}

/** Backoff before retry `attempt` (1-based), capped and jittered. */
export function backoffDelay(attempt: number, retry: RetryOptions): number {
  const raw = retry.backoffMs * 2 ** (attempt - 1);
  const capped = retry.maxBackoffMs === undefined ? raw : Math.min(raw, retry.maxBackoffMs);
  const spread = capped * (retry.jitter ?? 0);
  return Math.max(0, Math.round(capped + (Math.random() * 2 - 1) * spread));
}

function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// retry 仅负责策略包装，超时等机制由调用方注入
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
  hooks: RetryHooks = {}
): Promise<T> {
  const retry = { ...DEFAULT_RETRY, ...(options ?? {}) };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (
        attempt > retry.maxRetries ||
        hooks.signal?.aborted ||
        !isRetryableError(error)
      ) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, retry);
      hooks.onRetry?.({ attempt, delayMs, error });
      await pause(delayMs, hooks.signal);
    }
  }
}
