import type { SessionLogger } from "./logger";

export interface SessionBudgetConfig {
  maxSandwiches: number | null;
  maxDurationMinutes: number | null;
  maxForagingAttempts: number;
}

export interface SessionBudgetState {
  startedAtMs: number;
  sandwichesMade: number;
  foragingAttempts: number;
  stopReason: string | null;
}

export function createSessionBudget(
  config: SessionBudgetConfig,
  logger?: SessionLogger,
  now: () => number = Date.now,
): {
  recordForagingAttempt: () => void;
  recordSandwich: () => void;
  shouldStop: () => { stop: boolean; reason?: string };
  snapshot: () => SessionBudgetState;
} {
  const state: SessionBudgetState = {
    startedAtMs: now(),
    sandwichesMade: 0,
    foragingAttempts: 0,
    stopReason: null,
  };

  const stopWith = (reason: string): { stop: boolean; reason: string } => {
    if (!state.stopReason) {
      state.stopReason = reason;
      logger?.log({
        node: "budget",
        level: "info",
        event: "BUDGET_STOP_SESSION",
        data: { reason, sandwiches_made: state.sandwichesMade, foraging_attempts: state.foragingAttempts },
      });
    }
    return { stop: true, reason };
  };

  return {
    recordForagingAttempt() {
      state.foragingAttempts += 1;
    },
    recordSandwich() {
      state.sandwichesMade += 1;
    },
    shouldStop() {
      if (config.maxSandwiches !== null && state.sandwichesMade >= config.maxSandwiches) {
        return stopWith("max_sandwiches");
      }
      if (config.maxDurationMinutes !== null && now() - state.startedAtMs >= config.maxDurationMinutes * 60_000) {
        return stopWith("max_duration");
      }
      if (state.foragingAttempts >= config.maxForagingAttempts) {
        return stopWith("max_foraging_attempts");
      }
      return { stop: false };
    },
    snapshot() {
      return { ...state };
    },
  };
}

export type SessionBudget = ReturnType<typeof createSessionBudget>;
