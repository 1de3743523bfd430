import assert from "node:assert/strict";
import { createCorpus } from "./corpus";
import type { StoredSandwich } from "./types";

function stored(id: string, structureType: string, embedding: number[] | null, filling = "limit"): StoredSandwich {
  return {
    sandwich_id: id,
    session_id: "corpus-test",
    created_at: "2026-01-02T03:04:05.000Z",
    assembled: {
      name: `Sandwich ${id}`,
      description: "",
      bread_top: "Upper Bound",
      bread_bottom: "lower bound",
      filling,
      structure_type: structureType,
    },
    validation: {
      bread_compat_score: 0.9,
      containment_score: 0.9,
      specificity_score: 0.9,
      overall_score: 0.9,
      verdict: "accepted",
      notes: "",
    },
    selection: { final_score: 1.2, novelty_bonus: 1, diversity_bonus: 1 },
    source: { name: "wikipedia", url: null, title: null, curiosity_prompt: null },
    embedding,
  };
}

async function run() {
  const empty = createCorpus();
  assert.equal(empty.isEmpty(), true);
  assert.deepEqual(empty.typeFrequencies(), {});
  assert.deepEqual(empty.embeddings(), []);
  assert.equal(empty.maxSimilarity([1, 0]), 0);

  const corpus = createCorpus([
    stored("s1", "bound", [1, 0]),
    stored("s2", "bound", null, "squeezed limit"),
    stored("s3", "bridge", [0, 1], "arch"),
    stored("s4", "stack", [], "layers"),
  ]);
  assert.equal(corpus.size(), 4);
  assert.deepEqual(corpus.typeFrequencies(), { bound: 0.5, bridge: 0.25, stack: 0.25 });
  // null and empty embeddings are not kept
  assert.deepEqual(corpus.embeddings(), [
    [1, 0],
    [0, 1],
  ]);
  assert.equal(corpus.maxSimilarity([1, 0]), 1);

  // a copy comes back, the corpus is unchanged
  corpus.embeddings()[0].push(9);
  assert.deepEqual(corpus.embeddings()[0], [1, 0]);

  corpus.addSandwich([1, 1], "bridge");
  assert.deepEqual(corpus.typeFrequencies(), { bound: 0.4, bridge: 0.4, stack: 0.2 });

  // breads are matched case-insensitively and counted once per use
  const ingredients = corpus.ingredients();
  const upper = ingredients.find((i) => i.text === "Upper Bound");
  assert.equal(upper?.ingredient_id, "bread-1");
  assert.equal(upper?.usage_count, 4);
  assert.equal(corpus.findMatchingIngredient("  upper bound ", "bread")?.ingredient_id, "bread-1");
  assert.equal(corpus.findMatchingIngredient("upper bound", "filling"), null);
  assert.equal(ingredients.filter((i) => i.role === "filling").length, 4);

  const tracked = corpus.trackIngredients(stored("s5", "bound", null, "arch"));
  assert.deepEqual(
    tracked.map((i) => [i.text, i.usage_count]),
    [
      ["Upper Bound", 5],
      ["lower bound", 5],
      ["arch", 2],
    ],
  );
  assert.equal(corpus.findMatchingIngredient("nothing like it", "filling", [1, 0]), null);
}

void run().then(() => console.log("corpus.test.ts passed"));
