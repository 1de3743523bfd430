import assert from "node:assert/strict";
import { createLogger, formatEventLine, safeData } from "./logger";
import type { SessionEvent } from "./types";

async function run() {
  assert.equal(safeData(undefined), undefined);
  assert.equal(safeData("plain string"), undefined);

  assert.deepEqual(
    safeData({
      api_key: "test-secret",
      nested: { Authorization: "Bearer test-secret", source_content: "full page", kept: 1 },
      content: "raw page",
      title: "x".repeat(250),
      deep: { a: { b: { c: { d: 1 } } } },
      list: Array.from({ length: 25 }, (_, i) => i),
    }),
    {
      api_key: "[redacted]",
      nested: { Authorization: "[redacted]", source_content: "[redacted]", kept: 1 },
      content: "[redacted]",
      title: `${"x".repeat(200)}…`,
      deep: { a: { b: { c: "[truncated-depth]" } } },
      list: Array.from({ length: 20 }, (_, i) => i),
    },
  );

  const echoed: SessionEvent[] = [];
  const logger = createLogger("logger-test", { echo: (event) => echoed.push(event) });
  logger.log({ node: "forager", level: "info", event: "SOURCE_OK", data: { source: "wikipedia" } });
  logger.log({ node: "session", level: "warn", event: "NO_DATA" });
  const events = logger.getEvents();
  assert.equal(events.length, 2);
  assert.equal(echoed.length, 2);
  assert.equal(events[0].session_id, "logger-test");
  assert.deepEqual(events[0].data, { source: "wikipedia" });
  assert.equal(events[1].data, undefined);

  // getEvents hands out a copy
  logger.getEvents().pop();
  assert.equal(logger.getEvents().length, 2);

  assert.equal(
    formatEventLine({
      ts: "2026-01-02T03:04:05.000Z",
      session_id: "s",
      node: "forager",
      level: "warn",
      event: "SOURCE_FAILED",
      data: { source: "web_search" },
    }),
    '2026-01-02T03:04:05.000Z [forager] WARN SOURCE_FAILED {"source":"web_search"}',
  );
  assert.equal(
    formatEventLine({ ts: "t", session_id: "s", node: "session", level: "info", event: "SESSION_START" }),
    "t [session] INFO SESSION_START",
  );
}

void run().then(() => console.log("logger.test.ts passed"));
