import { randomUUID } from "node:crypto";
import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { SandwichConfig } from "./config";
import type { SandwichCorpus } from "./corpus";
import { candidateConcept } from "./embeddings";
import {
  errorMessage,
  FatalError,
  isStructuralError,
  OtherFailure,
  toSandwichError,
  type SandwichError,
} from "./errors";
import { routeFailure } from "./failures";
import type { Forager } from "./forager";
import type { SessionLogger } from "./logger";
import { preprocessContent } from "./preprocess";
import { selectCandidate } from "./selector";
import type { StateMachine } from "./stateMachine";
import type {
  AssembledSandwich,
  CandidateStructure,
  CheckpointDataByState,
  EmbeddingService,
  ForagingResult,
  PipelineState,
  SandwichLlm,
  SandwichStore,
  SelectedCandidate,
  StoredSandwich,
  ValidationResult,
  ValidationVerdict,
} from "./types";

/** The event that brought the machine back to idle (or to session_end). */
export type IterationOutcome =
  | "stored"
  | "forage_failed"
  | "content_rejected"
  | "no_candidates"
  | "none_viable"
  | "rejected"
  | "recovered"
  | "fatal";

const IterationAnnotation = Annotation.Root({
  recent_topics: Annotation<string[]>(),
  foraged: Annotation<ForagingResult | null>(),
  content: Annotation<string | null>(),
  candidates: Annotation<CandidateStructure[]>(),
  candidate_embeddings: Annotation<Array<number[] | null>>(),
  selected: Annotation<SelectedCandidate | null>(),
  assembled: Annotation<AssembledSandwich | null>(),
  embedding: Annotation<number[] | null>(),
  validation: Annotation<ValidationResult | null>(),
  stored: Annotation<StoredSandwich | null>(),
  stored_path: Annotation<string | null>(),
  failure: Annotation<SandwichError | null>(),
  outcome: Annotation<IterationOutcome | null>(),
});

export type IterationState = typeof IterationAnnotation.State;
type IterationUpdate = typeof IterationAnnotation.Update;

export function initialIterationState(recentTopics: string[] = []): IterationState {
  return {
    recent_topics: recentTopics,
    foraged: null,
    content: null,
    candidates: [],
    candidate_embeddings: [],
    selected: null,
    assembled: null,
    embedding: null,
    validation: null,
    stored: null,
    stored_path: null,
    failure: null,
    outcome: null,
  };
}

export interface PipelineDeps {
  machine: StateMachine;
  forager: Forager;
  llm: SandwichLlm;
  corpus: SandwichCorpus;
  store: SandwichStore;
  config: SandwichConfig;
  embeddings?: EmbeddingService | null;
  logger?: SessionLogger;
  /** Uniform draw in [0, 1); decides whether to forage from a curiosity prompt. */
  random?: () => number;
  now?: () => Date;
}

export function verdictFor(
  overallScore: number,
  thresholds: { acceptThreshold: number; reviewThreshold: number },
): ValidationVerdict {
  if (overallScore >= thresholds.acceptThreshold) return "accepted";
  if (overallScore >= thresholds.reviewThreshold) return "review";
  return "rejected";
}

type NodeName = "forage" | "preprocess" | "identify" | "select" | "assemble" | "validate" | "store" | "recover";

const NODE_FOR_STATE: Partial<Record<PipelineState, NodeName>> = {
  preprocessing: "preprocess",
  identifying: "identify",
  selecting: "select",
  assembling: "assemble",
  validating: "validate",
  storing: "store",
  error_recovery: "recover",
};

function requireValue<T>(value: T | null, what: string): T {
  if (value === null) throw new OtherFailure(`${what} missing from iteration state`, "missing_state");
  return value;
}

/**
 * One pipeline iteration, from idle back to idle (or session_end). Each node
 * does one step and fires the matching machine event; edges follow the
 * machine's state, so the graph cannot route anywhere the transition table
 * does not allow.
 */
export function createIterationGraph(deps: PipelineDeps) {
  const { machine, forager, llm, corpus, store, config } = deps;
  const emit = deps.logger?.log ?? (() => {});
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());

  const guarded =
    (node: NodeName, step: (state: IterationState) => Promise<IterationUpdate>) =>
    async (state: IterationState): Promise<IterationUpdate> => {
      try {
        return await step(state);
      } catch (error) {
        if (isStructuralError(error)) throw error;
        // a failed transition (e.g. the checkpoint sink) leaves nothing to recover from
        if (!machine.canTransition("error")) throw error;
        const failure = toSandwichError(error);
        const failedIn = machine.currentState;
        emit({
          node,
          level: "warn",
          event: "STEP_FAILED",
          data: { state: failedIn, kind: failure.kind, reason: failure.reason, message: failure.message },
        });
        machine.transition("error", {
          kind: failure.kind,
          reason: failure.reason,
          message: failure.message,
          failed_in: failedIn,
        } satisfies CheckpointDataByState["error_recovery"]);
        return { failure };
      }
    };

  const curiosityFor = async (recentTopics: string[]): Promise<string | null> => {
    if (random() >= config.foraging.curiosityProbability) return null;
    try {
      return await forager.generateCuriosity(recentTopics);
    } catch (error) {
      if (error instanceof FatalError) throw error;
      emit({
        node: "forage",
        level: "warn",
        event: "CURIOSITY_FAILED",
        data: { error: errorMessage(error) },
      });
      return null;
    }
  };

  const embedOrNull = async (texts: string[]): Promise<Array<number[] | null>> => {
    if (!deps.embeddings || texts.length === 0) return texts.map(() => null);
    try {
      return await deps.embeddings.embed(texts);
    } catch (error) {
      if (error instanceof FatalError) throw error;
      emit({
        node: "embeddings",
        level: "warn",
        event: "EMBEDDING_FAILED",
        data: { count: texts.length, error: errorMessage(error) },
      });
      return texts.map(() => null);
    }
  };

  const routeByMachineState = (): NodeName | typeof END => {
    const current = machine.currentState;
    if (current === "idle" || current === "session_end") return END;
    const next = NODE_FOR_STATE[current];
    if (!next) throw new Error(`No pipeline node handles state ${current}`);
    return next;
  };

  return new StateGraph(IterationAnnotation)
    .addNode(
      "forage",
      guarded("forage", async (state) => {
        machine.transition("start_foraging", {
          tier: forager.currentTier,
        } satisfies CheckpointDataByState["foraging"]);
        const curiosity = await curiosityFor(state.recent_topics);
        const foraged = await forager.forage(curiosity ?? undefined);
        if (!foraged) {
          machine.transition("forage_failed", {
            outcome: "forage_failed",
          } satisfies CheckpointDataByState["idle"]);
          return { outcome: "forage_failed" };
        }
        machine.transition("content_found", {
          source_name: foraged.source_name,
          title: foraged.source_result.title,
          url: foraged.source_result.url,
          curiosity_prompt: foraged.curiosity_prompt,
        } satisfies CheckpointDataByState["preprocessing"]);
        return { foraged };
      }),
    )
    .addNode(
      "preprocess",
      guarded("preprocess", async (state) => {
        const foraged = requireValue(state.foraged, "foraged content");
        const outcome = preprocessContent(foraged.source_result, config.preprocess);
        if (!outcome.accepted) {
          emit({
            node: "preprocess",
            level: "info",
            event: "CONTENT_REJECTED",
            data: { reason: outcome.reason, chars: outcome.chars, source: foraged.source_name },
          });
          machine.transition("content_rejected", {
            outcome: "content_rejected",
            reason: outcome.reason,
          } satisfies CheckpointDataByState["idle"]);
          return { outcome: "content_rejected" };
        }
        machine.transition("content_accepted", {
          content_chars: outcome.content.length,
        } satisfies CheckpointDataByState["identifying"]);
        return { content: outcome.content };
      }),
    )
    .addNode(
      "identify",
      guarded("identify", async (state) => {
        const content = requireValue(state.content, "content");
        const candidates = await llm.identifyCandidates(content);
        if (candidates.length === 0) {
          machine.transition("no_candidates", {
            outcome: "no_candidates",
          } satisfies CheckpointDataByState["idle"]);
          return { candidates, outcome: "no_candidates" };
        }
        const candidateEmbeddings = await embedOrNull(candidates.map(candidateConcept));
        machine.transition("candidates_found", {
          candidate_count: candidates.length,
        } satisfies CheckpointDataByState["selecting"]);
        return { candidates, candidate_embeddings: candidateEmbeddings };
      }),
    )
    .addNode(
      "select",
      guarded("select", async (state) => {
        const selected = selectCandidate(state.candidates, {
          corpusEmbeddings: corpus.embeddings(),
          candidateEmbeddings: state.candidate_embeddings,
          typeFrequencies: corpus.typeFrequencies(),
          config: config.selection,
          logger: deps.logger,
        });
        if (!selected) {
          machine.transition("none_viable", {
            outcome: "none_viable",
          } satisfies CheckpointDataByState["idle"]);
          return { outcome: "none_viable" };
        }
        machine.transition("candidate_selected", {
          structure_type: selected.candidate.structure_type,
          final_score: selected.final_score,
          rationale: selected.rationale,
        } satisfies CheckpointDataByState["assembling"]);
        const index = state.candidates.indexOf(selected.candidate);
        return { selected, embedding: state.candidate_embeddings[index] ?? null };
      }),
    )
    .addNode(
      "assemble",
      guarded("assemble", async (state) => {
        const selected = requireValue(state.selected, "selected candidate");
        const assembled = await llm.assembleSandwich(selected, requireValue(state.content, "content"));
        machine.transition("assembly_complete", {
          name: assembled.name,
        } satisfies CheckpointDataByState["validating"]);
        return { assembled };
      }),
    )
    .addNode(
      "validate",
      guarded("validate", async (state) => {
        const assembled = requireValue(state.assembled, "assembled sandwich");
        const scores = await llm.validateSandwich(assembled);
        let verdict = verdictFor(scores.overall_score, config.validation);
        let reason = `overall_score=${scores.overall_score.toFixed(2)}`;
        if (verdict !== "rejected" && state.embedding) {
          const similarity = corpus.maxSimilarity(state.embedding);
          if (similarity >= config.validation.duplicateThreshold) {
            verdict = "rejected";
            reason = `duplicate (similarity=${similarity.toFixed(3)})`;
          }
        }
        const validation: ValidationResult = { ...scores, verdict };
        emit({
          node: "validate",
          level: "info",
          event: "SANDWICH_VALIDATED",
          data: { name: assembled.name, verdict, overall_score: scores.overall_score, reason },
        });
        if (verdict === "rejected") {
          machine.transition("rejected", {
            outcome: "rejected",
            reason,
          } satisfies CheckpointDataByState["idle"]);
          return { validation, outcome: "rejected" };
        }
        machine.transition(verdict, {
          verdict,
          overall_score: scores.overall_score,
        } satisfies CheckpointDataByState["storing"]);
        return { validation };
      }),
    )
    .addNode(
      "store",
      guarded("store", async (state) => {
        const assembled = requireValue(state.assembled, "assembled sandwich");
        const validation = requireValue(state.validation, "validation");
        const selected = requireValue(state.selected, "selected candidate");
        const foraged = requireValue(state.foraged, "foraged content");
        const sandwich: StoredSandwich = {
          sandwich_id: randomUUID(),
          session_id: machine.sessionId,
          created_at: now().toISOString(),
          assembled,
          validation,
          selection: {
            final_score: selected.final_score,
            novelty_bonus: selected.novelty_bonus,
            diversity_bonus: selected.diversity_bonus,
          },
          source: {
            name: foraged.source_name,
            url: foraged.source_result.url,
            title: foraged.source_result.title,
            curiosity_prompt: foraged.curiosity_prompt,
          },
          embedding: state.embedding,
        };
        const saved = await store.save(sandwich);
        corpus.addSandwich(sandwich.embedding, assembled.structure_type);
        corpus.trackIngredients(sandwich);
        emit({
          node: "store",
          level: "info",
          event: "SANDWICH_STORED",
          data: { sandwich_id: sandwich.sandwich_id, name: assembled.name, path: saved.path },
        });
        machine.transition("stored", {
          outcome: "stored",
          sandwich_id: sandwich.sandwich_id,
        } satisfies CheckpointDataByState["idle"]);
        return { stored: sandwich, stored_path: saved.path, outcome: "stored" };
      }),
    )
    .addNode("recover", async (state: IterationState): Promise<IterationUpdate> => {
      const failure = state.failure ?? new OtherFailure("error_recovery entered without a recorded failure");
      const event = routeFailure(failure, deps.logger);
      if (event === "fatal") {
        machine.transition("fatal", { reason: failure.reason } satisfies CheckpointDataByState["session_end"]);
      } else {
        machine.transition("recovered", {
          outcome: "recovered",
          reason: failure.reason,
        } satisfies CheckpointDataByState["idle"]);
      }
      return { outcome: event };
    })
    .addEdge(START, "forage")
    .addConditionalEdges("forage", routeByMachineState)
    .addConditionalEdges("preprocess", routeByMachineState)
    .addConditionalEdges("identify", routeByMachineState)
    .addConditionalEdges("select", routeByMachineState)
    .addConditionalEdges("assemble", routeByMachineState)
    .addConditionalEdges("validate", routeByMachineState)
    .addConditionalEdges("store", routeByMachineState)
    .addConditionalEdges("recover", routeByMachineState)
    .compile();
}

export type IterationGraph = ReturnType<typeof createIterationGraph>;

export async function runIteration(
  graph: IterationGraph,
  recentTopics: string[],
  recursionLimit: number,
): Promise<IterationState> {
  return graph.invoke(initialIterationState(recentTopics), { recursionLimit });
}
