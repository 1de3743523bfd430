import assert from "node:assert/strict";
import { createRateLimiter, emptyResult, truncateContent } from "./base";

async function run() {
  let clock = 0;
  const slept: number[] = [];
  const limiter = createRateLimiter(60, {
    now: () => clock,
    sleep: async (ms) => {
      slept.push(ms);
      clock += ms;
    },
  });
  assert.equal(limiter.intervalMs, 1000);
  assert.equal(await limiter.waitIfNeeded(), 0);
  clock = 200;
  assert.equal(await limiter.waitIfNeeded(), 800);
  assert.equal(clock, 1000);
  clock = 5000;
  assert.equal(await limiter.waitIfNeeded(), 0);
  assert.deepEqual(slept, [800]);

  // concurrent callers queue behind each other's reserved slots
  const frozen = createRateLimiter(120, { now: () => 0, sleep: async () => {} });
  const delays = await Promise.all([frozen.waitIfNeeded(), frozen.waitIfNeeded(), frozen.waitIfNeeded()]);
  assert.deepEqual(delays, [0, 500, 1000]);

  assert.throws(() => createRateLimiter(0), /maxPerMinute must be positive/);
  assert.throws(() => createRateLimiter(Number.NaN), /maxPerMinute must be positive/);

  assert.deepEqual(emptyResult({ query: "entropy", error: "no_results" }), {
    content: "",
    url: null,
    title: null,
    content_type: "text",
    metadata: { query: "entropy", error: "no_results" },
  });
  assert.deepEqual(emptyResult({ error: "HTTP 500" }, { url: "https://example.test/a", content_type: "html" }), {
    content: "",
    url: "https://example.test/a",
    title: null,
    content_type: "html",
    metadata: { error: "HTTP 500" },
  });
  assert.equal(truncateContent("abcdef", 4), "abcd");
  assert.equal(truncateContent("abc", 4), "abc");
}

void run().then(() => console.log("sources/base.test.ts passed"));
