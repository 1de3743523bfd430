import assert from "node:assert/strict";
import { createSessionBudget } from "./budget";
import { createLogger } from "./logger";

async function run() {
  let clock = 0;
  const logger = createLogger("budget-test");
  const budget = createSessionBudget(
    { maxSandwiches: 2, maxDurationMinutes: 1, maxForagingAttempts: 10 },
    logger,
    () => clock,
  );
  assert.deepEqual(budget.shouldStop(), { stop: false });
  budget.recordSandwich();
  assert.deepEqual(budget.shouldStop(), { stop: false });
  budget.recordSandwich();
  assert.deepEqual(budget.shouldStop(), { stop: true, reason: "max_sandwiches" });
  assert.deepEqual(budget.shouldStop(), { stop: true, reason: "max_sandwiches" });
  // the stop is logged once
  assert.equal(logger.getEvents().filter((event) => event.event === "BUDGET_STOP_SESSION").length, 1);
  assert.equal(budget.snapshot().stopReason, "max_sandwiches");

  const timed = createSessionBudget(
    { maxSandwiches: null, maxDurationMinutes: 1, maxForagingAttempts: 10 },
    undefined,
    () => clock,
  );
  clock = 59_999;
  assert.equal(timed.shouldStop().stop, false);
  clock = 60_000;
  assert.deepEqual(timed.shouldStop(), { stop: true, reason: "max_duration" });

  const attempts = createSessionBudget({ maxSandwiches: null, maxDurationMinutes: null, maxForagingAttempts: 2 });
  attempts.recordForagingAttempt();
  assert.equal(attempts.shouldStop().stop, false);
  attempts.recordForagingAttempt();
  assert.deepEqual(attempts.shouldStop(), { stop: true, reason: "max_foraging_attempts" });
  assert.equal(attempts.snapshot().foragingAttempts, 2);
}

void run().then(() => console.log("budget.test.ts passed"));
