export const PIPELINE_STATES = [
  "idle",
  "foraging",
  "preprocessing",
  "identifying",
  "selecting",
  "assembling",
  "validating",
  "storing",
  "error_recovery",
  "session_end",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export const PIPELINE_EVENTS = [
  "start_foraging",
  "end_session",
  "content_found",
  "forage_failed",
  "content_accepted",
  "content_rejected",
  "candidates_found",
  "no_candidates",
  "candidate_selected",
  "none_viable",
  "assembly_complete",
  "accepted",
  "review",
  "rejected",
  "stored",
  "error",
  "recovered",
  "fatal",
] as const;

export type PipelineEvent = (typeof PIPELINE_EVENTS)[number];

export type CheckpointData = Record<string, unknown>;

/**
 * Payload each state's checkpoint carries. The log itself stores an open map;
 * pipeline nodes check their payloads against these shapes with `satisfies`.
 */
export interface CheckpointDataByState {
  idle: { outcome: string; reason?: string; sandwich_id?: string };
  foraging: { tier: number };
  preprocessing: { source_name: string; title: string | null; url: string | null; curiosity_prompt: string | null };
  identifying: { content_chars: number };
  selecting: { candidate_count: number };
  assembling: { structure_type: string; final_score: number; rationale: string };
  validating: { name: string };
  storing: { verdict: "accepted" | "review"; overall_score: number };
  error_recovery: { kind: string; reason: string; message: string; failed_in: PipelineState };
  session_end: { reason: string };
}

export interface Checkpoint {
  readonly checkpoint_id: string;
  readonly session_id: string;
  readonly state: PipelineState;
  readonly created_at: string;
  readonly data: Readonly<CheckpointData>;
  readonly transition_reason: string;
}

export interface CheckpointSink {
  append(checkpoint: Checkpoint): void;
  latest(sessionId: string): Checkpoint | null;
}

export interface SourceResult {
  content: string;
  url: string | null;
  title: string | null;
  content_type: string;
  metadata: Record<string, unknown>;
}

export interface ContentSource {
  readonly name: string;
  readonly tier: number;
  fetch(query?: string): Promise<SourceResult>;
  fetchRandom(): Promise<SourceResult>;
}

export interface ForagingResult {
  source_result: SourceResult;
  source_name: string;
  curiosity_prompt: string | null;
  log_id: string;
}

export interface CandidateStructure {
  readonly bread_top: string;
  readonly bread_bottom: string;
  readonly filling: string;
  readonly structure_type: string;
  readonly confidence: number;
  readonly rationale: string;
}

export interface SelectedCandidate {
  candidate: CandidateStructure;
  final_score: number;
  novelty_bonus: number;
  diversity_bonus: number;
  rationale: string;
}

export interface AssembledSandwich {
  name: string;
  description: string;
  bread_top: string;
  bread_bottom: string;
  filling: string;
  structure_type: string;
}

export type ValidationVerdict = "accepted" | "review" | "rejected";

export interface ValidationResult {
  bread_compat_score: number;
  containment_score: number;
  specificity_score: number;
  overall_score: number;
  verdict: ValidationVerdict;
  notes: string;
}

export interface StoredSandwich {
  sandwich_id: string;
  session_id: string;
  created_at: string;
  assembled: AssembledSandwich;
  validation: ValidationResult;
  selection: { final_score: number; novelty_bonus: number; diversity_bonus: number };
  source: { name: string; url: string | null; title: string | null; curiosity_prompt: string | null };
  embedding: number[] | null;
}

export interface SandwichLlm {
  generateCuriosity(recentTopics: string[]): Promise<string>;
  identifyCandidates(content: string): Promise<CandidateStructure[]>;
  assembleSandwich(selected: SelectedCandidate, content: string): Promise<AssembledSandwich>;
  validateSandwich(assembled: AssembledSandwich): Promise<Omit<ValidationResult, "verdict">>;
}

export interface EmbeddingService {
  embed(texts: string[]): Promise<number[][]>;
}

export interface CorpusView {
  embeddings(): number[][];
  typeFrequencies(): Record<string, number>;
}

export interface SandwichStore {
  save(sandwich: StoredSandwich): Promise<{ path: string }>;
}

export type EventLevel = "info" | "warn" | "error";

export interface SessionEvent {
  ts: string;
  session_id: string;
  node: string;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface SessionSummary {
  session_id: string;
  started_at: string;
  ended_at: string;
  final_state: PipelineState;
  stop_reason: string;
  iterations: number;
  foraging_attempts: number;
  sandwiches_made: number;
  sandwiches: Array<{ name: string; verdict: ValidationVerdict; overall_score: number; path: string }>;
  outcomes: Record<string, number>;
  forager: { current_tier: number; consecutive_successes: number; consecutive_failures: number };
  checkpoints: number;
}
