import type { SessionLogger } from "./logger";
import type { CandidateStructure, SelectedCandidate } from "./types";

export interface SelectionConfig {
  minConfidence: number;
  noveltyWeight: number;
  diversityWeight: number;
}

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  minConfidence: 0.4,
  noveltyWeight: 0.3,
  diversityWeight: 0.2,
};

export interface SelectCandidateOptions {
  /** Embeddings of sandwiches already in the corpus. */
  corpusEmbeddings?: number[][] | null;
  /** Parallel to the input `candidates` list. */
  candidateEmbeddings?: Array<number[] | null> | null;
  /** structure_type -> share of the corpus in [0, 1]. */
  typeFrequencies?: Record<string, number> | null;
  config?: Partial<SelectionConfig>;
  logger?: SessionLogger;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < length; i += 1) dot += a[i] * b[i];
  const normA = Math.sqrt(a.reduce((sum, x) => sum + x * x, 0));
  const normB = Math.sqrt(b.reduce((sum, x) => sum + x * x, 0));
  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (normA * normB);
  return Number.isFinite(similarity) ? similarity : 0;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function noveltyBonus(
  embedding: number[] | null | undefined,
  corpusEmbeddings: number[][] | null | undefined,
): number {
  if (!embedding || !corpusEmbeddings || corpusEmbeddings.length === 0) return 1;
  let maxSimilarity = -1;
  for (const other of corpusEmbeddings) {
    maxSimilarity = Math.max(maxSimilarity, cosineSimilarity(embedding, other));
  }
  return clamp01(1 - maxSimilarity);
}

export function diversityBonus(
  structureType: string,
  typeFrequencies: Record<string, number> | null | undefined,
): number {
  const frequency = typeFrequencies?.[structureType];
  if (frequency === undefined) return 1;
  return clamp01(1 - frequency);
}

function formatRationale(
  candidate: CandidateStructure,
  novelty: number,
  diversity: number,
  finalScore: number,
  config: SelectionConfig,
): string {
  return (
    `confidence=${candidate.confidence.toFixed(2)}, ` +
    `novelty_bonus=${novelty.toFixed(2)} (w=${config.noveltyWeight}), ` +
    `diversity_bonus=${diversity.toFixed(2)} (w=${config.diversityWeight}), ` +
    `final=${finalScore.toFixed(3)}`
  );
}

/**
 * final_score = confidence + noveltyWeight * novelty + diversityWeight * diversity,
 * over the candidates at or above minConfidence. Ties keep input order.
 */
export function selectCandidate(
  candidates: readonly CandidateStructure[],
  options: SelectCandidateOptions = {},
): SelectedCandidate | null {
  const config: SelectionConfig = { ...DEFAULT_SELECTION_CONFIG, ...options.config };
  const emit = options.logger?.log ?? (() => {});

  const viable = candidates
    .map((candidate, index) => ({ candidate, index }))
    .filter(({ candidate }) => candidate.confidence >= config.minConfidence);

  if (viable.length === 0) {
    emit({
      node: "selector",
      level: "info",
      event: "NO_VIABLE_CANDIDATES",
      data: { rejected: candidates.length, min_confidence: config.minConfidence },
    });
    return null;
  }

  let best: SelectedCandidate | null = null;
  for (const { candidate, index } of viable) {
    const novelty = noveltyBonus(options.candidateEmbeddings?.[index], options.corpusEmbeddings);
    const diversity = diversityBonus(candidate.structure_type, options.typeFrequencies);
    const finalScore =
      candidate.confidence + config.noveltyWeight * novelty + config.diversityWeight * diversity;

    if (!Number.isFinite(finalScore)) continue;
    if (best === null || finalScore > best.final_score) {
      best = {
        candidate,
        final_score: finalScore,
        novelty_bonus: novelty,
        diversity_bonus: diversity,
        rationale: formatRationale(candidate, novelty, diversity, finalScore, config),
      };
    }
  }

  if (best) {
    emit({
      node: "selector",
      level: "info",
      event: "CANDIDATE_SELECTED",
      data: {
        structure_type: best.candidate.structure_type,
        viable: viable.length,
        rationale: best.rationale,
      },
    });
  }
  return best;
}
