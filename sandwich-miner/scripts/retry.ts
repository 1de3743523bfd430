import { RetryableError, SandwichError, errorMessage } from "./errors";
import { sleep as defaultSleep } from "./sources/base";

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  retryOn?: (err: unknown) => boolean;
  onRetry?: (meta: { attempt: number; error: unknown }) => void;
  onGiveup?: (meta: { attempt: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function isRetryableFailure(err: unknown): boolean {
  return err instanceof SandwichError && err.kind === "retryable";
}

export function backoff(base: number, max: number, attempt: number, jitter: boolean): number {
  const raw = Math.min(max, base * Math.pow(2, attempt));
  if (!jitter) return raw;
  const delta = Math.floor(raw * 0.2);
  return raw - delta + Math.floor(Math.random() * (2 * delta + 1));
}

function exhausted(error: unknown, attempts: number): RetryableError {
  if (error instanceof RetryableError) return error;
  return new RetryableError(
    `Gave up after ${attempts} attempts: ${errorMessage(error)}`,
    "retries_exhausted",
    { cause: error },
  );
}

/**
 * Errors that `retryOn` rejects are rethrown untouched. A retryable error that
 * outlives the budget surfaces as a RetryableError.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const retryOn = opts.retryOn ?? isRetryableFailure;
  const wait = opts.sleep ?? defaultSleep;
  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!retryOn(error)) {
        opts.onGiveup?.({ attempt: attempt + 1, error });
        throw error;
      }
      if (attempt >= opts.retries) {
        opts.onGiveup?.({ attempt: attempt + 1, error });
        throw exhausted(error, attempt + 1);
      }
      opts.onRetry?.({ attempt: attempt + 1, error });
      await wait(backoff(opts.baseDelayMs, opts.maxDelayMs, attempt, opts.jitter));
    }
  }
  throw exhausted(lastError, opts.retries + 1);
}
