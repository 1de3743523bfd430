import { createSessionBudget, type SessionBudget } from "./budget";
import type { ReplayableSink } from "./checkpointStore";
import { ConfigurationError } from "./errors";
import type { ForagerSnapshot } from "./forager";
import { createIterationGraph, runIteration, type PipelineDeps } from "./graph";
import type { SessionLogger } from "./logger";
import { createStateMachine, replayCheckpoints, type StateMachine } from "./stateMachine";
import type { CheckpointDataByState, SessionSummary } from "./types";

export interface SessionOptions extends PipelineDeps {
  budget?: SessionBudget;
}

/**
 * Runs pipeline iterations while the machine is idle and the budget allows,
 * then closes the session with `end_session` (unless a fatal failure already
 * ended it).
 */
export async function runSession(options: SessionOptions): Promise<SessionSummary> {
  const { machine, forager, config } = options;
  const emit = options.logger?.log ?? (() => {});
  const now = options.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const budget = options.budget ?? createSessionBudget(config.session, options.logger);
  const graph = createIterationGraph(options);

  if (machine.currentState !== "idle") {
    throw new ConfigurationError(`Cannot start a session from state ${machine.currentState}`);
  }

  const recentTopics: string[] = [];
  const outcomes: Record<string, number> = {};
  const sandwiches: SessionSummary["sandwiches"] = [];
  let iterations = 0;
  let stopReason = "";

  emit({
    node: "session",
    level: "info",
    event: "SESSION_START",
    data: { session_id: machine.sessionId, tier: forager.currentTier },
  });

  while (machine.currentState === "idle") {
    const check = budget.shouldStop();
    if (check.stop) {
      stopReason = check.reason ?? "budget";
      break;
    }
    budget.recordForagingAttempt();
    iterations += 1;

    const result = await runIteration(graph, [...recentTopics], config.session.recursionLimit);
    const outcome = result.outcome ?? "unknown";
    outcomes[outcome] = (outcomes[outcome] ?? 0) + 1;

    if (outcome === "stored" && result.stored && result.stored_path) {
      forager.recordSuccess();
      budget.recordSandwich();
      sandwiches.push({
        name: result.stored.assembled.name,
        verdict: result.stored.validation.verdict,
        overall_score: result.stored.validation.overall_score,
        path: result.stored_path,
      });
    } else if (outcome === "fatal") {
      stopReason = `fatal:${result.failure?.reason ?? "unknown"}`;
    } else {
      forager.recordFailure();
    }

    const topic = result.foraged?.source_result.title;
    if (topic) {
      recentTopics.push(topic);
      const window = config.foraging.recentTopicsWindow;
      if (recentTopics.length > window) recentTopics.splice(0, recentTopics.length - window);
    }
  }

  if (machine.currentState === "idle") {
    machine.transition("end_session", { reason: stopReason } satisfies CheckpointDataByState["session_end"]);
  }

  const summary: SessionSummary = {
    session_id: machine.sessionId,
    started_at: startedAt,
    ended_at: now().toISOString(),
    final_state: machine.currentState,
    stop_reason: stopReason,
    iterations,
    foraging_attempts: budget.snapshot().foragingAttempts,
    sandwiches_made: sandwiches.length,
    sandwiches,
    outcomes,
    forager: forager.snapshot(),
    checkpoints: machine.checkpoints().length,
  };

  emit({
    node: "session",
    level: stopReason.startsWith("fatal") ? "error" : "info",
    event: "SESSION_END",
    data: { stop_reason: stopReason, iterations, sandwiches_made: sandwiches.length },
  });
  return summary;
}

/**
 * Rebuilds a machine from the sink's latest checkpoint for `sessionId`, after
 * checking the whole log replays under the transition table. A
 * session interrupted mid-iteration is walked through `error` and `recovered`
 * so it resumes from idle.
 */
export function resumeMachine(sessionId: string, sink: ReplayableSink, logger?: SessionLogger): StateMachine {
  const latest = sink.latest(sessionId);
  if (!latest) throw new ConfigurationError(`No checkpoints recorded for session ${sessionId}`);
  if (latest.state === "session_end") throw new ConfigurationError(`Session ${sessionId} has already ended`);
  const replay = replayCheckpoints(sink.all(sessionId));
  if (!replay.ok) {
    throw new ConfigurationError(`Checkpoint log for session ${sessionId} does not replay: ${replay.error}`);
  }

  const machine = createStateMachine({ sessionId, sink, logger });
  machine.recoverFromCheckpoint(latest);

  if (latest.state !== "idle" && latest.state !== "error_recovery") {
    machine.transition("error", {
      kind: "other",
      reason: "interrupted",
      message: `session resumed from ${latest.state}`,
      failed_in: latest.state,
    } satisfies CheckpointDataByState["error_recovery"]);
  }
  if (machine.currentState === "error_recovery") {
    machine.transition("recovered", {
      outcome: "recovered",
      reason: "interrupted",
    } satisfies CheckpointDataByState["idle"]);
  }
  return machine;
}

export interface ResumeOptions extends Omit<SessionOptions, "machine"> {
  sessionId: string;
  sink: ReplayableSink;
  foragerSnapshot?: ForagerSnapshot | null;
}

export async function resumeSession(options: ResumeOptions): Promise<SessionSummary> {
  const machine = resumeMachine(options.sessionId, options.sink, options.logger);
  if (options.foragerSnapshot) options.forager.restore(options.foragerSnapshot);
  options.logger?.log({
    node: "session",
    level: "info",
    event: "SESSION_RESUMED",
    data: { session_id: options.sessionId, tier: options.forager.currentTier },
  });
  return runSession({ ...options, machine });
}
