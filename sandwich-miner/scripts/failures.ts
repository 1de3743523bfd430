import { toSandwichError, type FailureKind } from "./errors";
import type { SessionLogger } from "./logger";

export type RecoveryEvent = "fatal" | "recovered";

const LABELS: Record<FailureKind, string> = {
  fatal: "Fatal error",
  content: "Content error",
  parse: "Parse error",
  retryable: "Retryable error (after max retries)",
  other: "Unrecognized error",
};

/**
 * Maps a failure onto the event that leaves `error_recovery`. Only an
 * explicitly fatal failure ends the session; every other kind returns the
 * pipeline to idle.
 */
export function routeFailure(failure: unknown, logger?: SessionLogger): RecoveryEvent {
  const error = toSandwichError(failure);
  const outcome: RecoveryEvent = error.kind === "fatal" ? "fatal" : "recovered";

  logger?.log({
    node: "error_router",
    level: outcome === "fatal" ? "error" : "warn",
    event: "FAILURE_CLASSIFIED",
    data: {
      label: LABELS[error.kind],
      kind: error.kind,
      reason: error.reason,
      error_name: error.name,
      message: error.message,
      outcome,
    },
  });

  return outcome;
}
