import type { SourceResult } from "../types";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket of one: at most one request per `60000 / maxPerMinute` ms.
 * Concurrent callers each reserve the next free slot, so waits queue up
 * instead of firing together.
 */
export function createRateLimiter(maxPerMinute: number, options: RateLimiterOptions = {}) {
  if (!Number.isFinite(maxPerMinute) || maxPerMinute <= 0) {
    throw new Error(`maxPerMinute must be positive, got ${maxPerMinute}`);
  }
  const now = options.now ?? (() => performance.now());
  const wait = options.sleep ?? sleep;
  const intervalMs = 60_000 / maxPerMinute;
  let lastSlot = Number.NEGATIVE_INFINITY;

  return {
    intervalMs,
    /** Resolves with the number of milliseconds the caller was held back. */
    async waitIfNeeded(): Promise<number> {
      const current = now();
      const slot = Math.max(current, lastSlot + intervalMs);
      lastSlot = slot;
      const delay = slot - current;
      if (delay > 0) {
        await wait(delay);
      }
      return delay;
    },
  };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;

export function emptyResult(metadata: Record<string, unknown>, extra: Partial<SourceResult> = {}): SourceResult {
  return {
    content: "",
    url: null,
    title: null,
    content_type: "text",
    ...extra,
    metadata,
  };
}

export function truncateContent(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars);
}
