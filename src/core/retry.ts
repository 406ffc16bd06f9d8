import type { Logger } from "./logger";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  shouldRetry?: (error: unknown) => boolean;
  logger?: Logger;
}

/** Delay after the failed attempt numbered `attempt` (zero-based): `baseDelayMs * 2^attempt`, capped. */
export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs = Number.POSITIVE_INFINITY): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
  context?: string
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs } = options;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (options.shouldRetry && !options.shouldRetry(error)) break;
      if (attempt === maxAttempts - 1) break;

      const delay = backoffDelayMs(attempt, baseDelayMs, maxDelayMs);
      options.logger?.debug({ attempt: attempt + 1, delay, context }, "Retrying after error");
      await wait(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
