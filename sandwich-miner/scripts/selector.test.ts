import assert from "node:assert/strict";
import { createLogger } from "./logger";
import { cosineSimilarity, diversityBonus, noveltyBonus, selectCandidate } from "./selector";
import type { CandidateStructure } from "./types";

function candidate(confidence: number, overrides: Partial<CandidateStructure> = {}): CandidateStructure {
  return {
    bread_top: "upper bound",
    bread_bottom: "lower bound",
    filling: `limit at ${confidence}`,
    structure_type: "bound",
    confidence,
    rationale: "",
    ...overrides,
  };
}

async function run() {
  // highest confidence wins when there is no corpus context
  const three = [candidate(0.6), candidate(0.9), candidate(0.7)];
  const picked = selectCandidate(three);
  assert.ok(picked);
  assert.equal(picked.candidate, three[1]);
  assert.equal(picked.novelty_bonus, 1);
  assert.equal(picked.diversity_bonus, 1);
  assert.ok(Math.abs(picked.final_score - 1.4) < 1e-9);
  assert.equal(
    picked.rationale,
    "confidence=0.90, novelty_bonus=1.00 (w=0.3), diversity_bonus=1.00 (w=0.2), final=1.400",
  );

  // nothing at or above the floor
  const logger = createLogger("selector-test");
  assert.equal(selectCandidate([candidate(0.1), candidate(0.39)], { logger }), null);
  assert.equal(selectCandidate([]), null);
  const none = logger.getEvents()[0];
  assert.equal(none.event, "NO_VIABLE_CANDIDATES");
  assert.deepEqual(none.data, { rejected: 2, min_confidence: 0.4 });

  // the floor is inclusive
  const floor = selectCandidate([candidate(0.39), candidate(0.4)]);
  assert.equal(floor?.candidate.confidence, 0.4);

  // novelty can outweigh confidence
  const familiar = candidate(0.8, { filling: "familiar" });
  const fresh = candidate(0.7, { filling: "fresh" });
  const byNovelty = selectCandidate([familiar, fresh], {
    corpusEmbeddings: [[1, 0]],
    candidateEmbeddings: [
      [1, 0],
      [0, 1],
    ],
  });
  assert.equal(byNovelty?.candidate, fresh);
  assert.equal(byNovelty?.novelty_bonus, 1);

  // a missing candidate embedding counts as fully novel
  const partial = selectCandidate([familiar, fresh], {
    corpusEmbeddings: [[1, 0]],
    candidateEmbeddings: [[1, 0], null],
  });
  assert.equal(partial?.candidate, fresh);

  // diversity favours under-represented structure types
  const common = candidate(0.8, { structure_type: "bound" });
  const rare = candidate(0.7, { structure_type: "squeeze" });
  const byDiversity = selectCandidate([common, rare], { typeFrequencies: { bound: 0.75 } });
  assert.equal(byDiversity?.candidate, rare);

  // weights are configurable
  const confidenceOnly = selectCandidate([common, rare], {
    typeFrequencies: { bound: 0.75 },
    config: { diversityWeight: 0 },
  });
  assert.equal(confidenceOnly?.candidate, common);

  // ties keep input order
  const first = candidate(0.8, { filling: "first" });
  const second = candidate(0.8, { filling: "second" });
  assert.equal(selectCandidate([first, second])?.candidate, first);

  assert.equal(selectCandidate(three, { logger })?.candidate, three[1]);
  assert.equal(logger.getEvents()[1].event, "CANDIDATE_SELECTED");

  assert.equal(cosineSimilarity([1, 0], [1, 0]), 1);
  assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.equal(cosineSimilarity([0, 0], [1, 1]), 0);
  assert.equal(noveltyBonus(null, [[1, 0]]), 1);
  assert.equal(noveltyBonus([1, 0], []), 1);
  assert.equal(noveltyBonus([1, 0], [[1, 0]]), 0);
  assert.equal(cosineSimilarity([Number.NaN, 0], [1, 0]), 0);

  // a large corpus is scanned without spreading it into one call
  const bigCorpus = Array.from({ length: 200_000 }, () => [1, 0]);
  assert.equal(noveltyBonus([0, 1], bigCorpus), 1);
  bigCorpus.push([0, 1]);
  assert.equal(noveltyBonus([0, 1], bigCorpus), 0);

  // an unusable embedding cannot shadow a stronger candidate
  const weak = candidate(0.5, { filling: "weak" });
  const strong = candidate(0.9, { filling: "strong" });
  const pickedStrong = selectCandidate([weak, strong], {
    corpusEmbeddings: [[1, 0]],
    candidateEmbeddings: [
      [Number.NaN, 0],
      [0, 1],
    ],
  });
  assert.equal(pickedStrong?.candidate, strong);
  assert.equal(pickedStrong?.novelty_bonus, 1);
  assert.equal(diversityBonus("unseen", { bound: 1 }), 1);
  assert.equal(diversityBonus("bound", { bound: 1 }), 0);
  assert.equal(diversityBonus("bound", null), 1);
}

void run().then(() => console.log("selector.test.ts passed"));
