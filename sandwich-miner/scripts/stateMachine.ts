import { randomUUID } from "node:crypto";
import { InvalidTransitionError } from "./errors";
import type { SessionLogger } from "./logger";
import { PIPELINE_EVENTS } from "./types";
import type {
  Checkpoint,
  CheckpointData,
  CheckpointSink,
  PipelineEvent,
  PipelineState,
} from "./types";

export const TRANSITIONS: Readonly<
  Record<PipelineState, Readonly<Partial<Record<PipelineEvent, PipelineState>>>>
> = {
  idle: {
    start_foraging: "foraging",
    end_session: "session_end",
  },
  foraging: {
    content_found: "preprocessing",
    forage_failed: "idle",
    error: "error_recovery",
  },
  preprocessing: {
    content_accepted: "identifying",
    content_rejected: "idle",
    error: "error_recovery",
  },
  identifying: {
    candidates_found: "selecting",
    no_candidates: "idle",
    error: "error_recovery",
  },
  selecting: {
    candidate_selected: "assembling",
    none_viable: "idle",
    error: "error_recovery",
  },
  assembling: {
    assembly_complete: "validating",
    error: "error_recovery",
  },
  validating: {
    accepted: "storing",
    review: "storing",
    rejected: "idle",
    error: "error_recovery",
  },
  storing: {
    stored: "idle",
    error: "error_recovery",
  },
  error_recovery: {
    recovered: "idle",
    fatal: "session_end",
  },
  session_end: {},
};

export const INITIAL_STATE: PipelineState = "idle";

export function validEventsFor(state: PipelineState): PipelineEvent[] {
  const row = TRANSITIONS[state];
  return PIPELINE_EVENTS.filter((event) => row[event] !== undefined);
}

export function nextStateFor(state: PipelineState, event: PipelineEvent): PipelineState | null {
  return TRANSITIONS[state][event] ?? null;
}

function isPipelineEvent(value: string): value is PipelineEvent {
  return PIPELINE_EVENTS.some((event) => event === value);
}

export function describeTransition(from: PipelineState, event: PipelineEvent, to: PipelineState): string {
  return `${from} --[${event}]--> ${to}`;
}

const REASON_PATTERN = /^(\w+) --\[(\w+)\]--> (\w+)$/;

/**
 * Checks that a checkpoint log could have been produced by this table when
 * started from `idle`. A recovered checkpoint (whose reason does not parse)
 * re-anchors the walk at its own state.
 */
export function replayCheckpoints(checkpoints: readonly Checkpoint[]): {
  ok: boolean;
  state: PipelineState;
  error?: string;
} {
  let state: PipelineState = INITIAL_STATE;
  for (const [index, checkpoint] of checkpoints.entries()) {
    const match = REASON_PATTERN.exec(checkpoint.transition_reason);
    if (!match) {
      state = checkpoint.state;
      continue;
    }
    const [, from, event, to] = match;
    const reachable = isPipelineEvent(event) && nextStateFor(state, event) === checkpoint.state;
    if (from !== state || to !== checkpoint.state || !reachable) {
      return {
        ok: false,
        state,
        error: `checkpoint ${index} (${checkpoint.transition_reason}) is not reachable from ${state}`,
      };
    }
    state = checkpoint.state;
  }
  return { ok: true, state };
}

export interface StateMachineOptions {
  sessionId?: string;
  sink?: CheckpointSink;
  logger?: SessionLogger;
}

export function createStateMachine(options: StateMachineOptions = {}) {
  let sessionId = options.sessionId ?? randomUUID();
  let currentState: PipelineState = INITIAL_STATE;
  const log: Checkpoint[] = [];

  const canTransition = (event: PipelineEvent): boolean => nextStateFor(currentState, event) !== null;

  return {
    get sessionId(): string {
      return sessionId;
    },
    get currentState(): PipelineState {
      return currentState;
    },
    canTransition,
    // Synchronous from check to mutation: no other caller can interleave.
    transition(event: PipelineEvent, data: CheckpointData = {}): PipelineState {
      const from = currentState;
      const to = nextStateFor(from, event);
      if (to === null) {
        throw new InvalidTransitionError(from, event, validEventsFor(from));
      }
      const checkpoint: Checkpoint = Object.freeze({
        checkpoint_id: randomUUID(),
        session_id: sessionId,
        state: to,
        created_at: new Date().toISOString(),
        data: Object.freeze({ ...data }),
        transition_reason: describeTransition(from, event, to),
      });
      options.sink?.append(checkpoint);
      log.push(checkpoint);
      currentState = to;
      options.logger?.log({
        node: "state_machine",
        level: "info",
        event: "STATE_TRANSITION",
        data: { from, event, to, checkpoint_id: checkpoint.checkpoint_id },
      });
      return to;
    },
    recoverFromCheckpoint(checkpoint: Checkpoint): void {
      currentState = checkpoint.state;
      sessionId = checkpoint.session_id;
      log.push(checkpoint);
      options.logger?.log({
        node: "state_machine",
        level: "info",
        event: "STATE_RECOVERED",
        data: { state: checkpoint.state, checkpoint_id: checkpoint.checkpoint_id },
      });
    },
    latestCheckpoint(): Checkpoint | null {
      return log.length > 0 ? log[log.length - 1] : null;
    },
    checkpoints(): Checkpoint[] {
      return [...log];
    },
  };
}

export type StateMachine = ReturnType<typeof createStateMachine>;
