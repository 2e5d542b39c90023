import { logger } from "../observability/logger.js";

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffFactor?: number;
  /** Return false to fail immediately (e.g. on a 4xx response) */
  shouldRetry?: (err: Error) => boolean;
  /** Included in retry logs */
  label?: string;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, delayMs = 100, backoffFactor = 2, shouldRetry = () => true, label = "call" } = options;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxRetries || !shouldRetry(lastError)) break;

      const delay = delayMs * Math.pow(backoffFactor, attempt);
      logger.warn({ event: "retry", label, attempt: attempt + 1, delayMs: delay, err: lastError.message }, "retrying");
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error(`${label} failed`);
}
