import { cosineSimilarity } from "./selector";
import type { CorpusView, StoredSandwich } from "./types";

export type IngredientRole = "bread" | "filling";

export interface CorpusIngredient {
  ingredient_id: string;
  text: string;
  role: IngredientRole;
  embedding: number[] | null;
  usage_count: number;
}

/**
 * In-memory view of the sandwiches made so far. Feeds novelty and diversity
 * scoring; the pipeline core only reads it through `CorpusView`.
 */
export function createCorpus(seed: StoredSandwich[] = []) {
  const embeddings: number[][] = [];
  const typeCounts: Record<string, number> = {};
  const ingredients: CorpusIngredient[] = [];
  let total = 0;

  const addSandwich = (embedding: number[] | null, structureType: string): void => {
    if (embedding && embedding.length > 0) embeddings.push(embedding);
    typeCounts[structureType] = (typeCounts[structureType] ?? 0) + 1;
    total += 1;
  };

  const findMatchingIngredient = (
    text: string,
    role: IngredientRole,
    embedding?: number[] | null,
    similarityThreshold = 0.92,
  ): CorpusIngredient | null => {
    const needle = text.trim().toLowerCase();
    const exact = ingredients.find((i) => i.role === role && i.text.trim().toLowerCase() === needle);
    if (exact) return exact;
    if (!embedding) return null;

    let best: CorpusIngredient | null = null;
    let bestSimilarity = 0;
    for (const ingredient of ingredients) {
      if (ingredient.role !== role || !ingredient.embedding) continue;
      const similarity = cosineSimilarity(embedding, ingredient.embedding);
      if (similarity > bestSimilarity) {
        bestSimilarity = similarity;
        best = ingredient;
      }
    }
    return best && bestSimilarity >= similarityThreshold ? best : null;
  };

  /** Counts each ingredient of a stored sandwich, reusing known ones. */
  const trackIngredients = (sandwich: StoredSandwich): CorpusIngredient[] => {
    const parts: Array<[string, IngredientRole]> = [
      [sandwich.assembled.bread_top, "bread"],
      [sandwich.assembled.bread_bottom, "bread"],
      [sandwich.assembled.filling, "filling"],
    ];
    return parts.map(([text, role]) => {
      const known = findMatchingIngredient(text, role);
      if (known) {
        known.usage_count += 1;
        return { ...known };
      }
      const created: CorpusIngredient = {
        ingredient_id: `${role}-${ingredients.length + 1}`,
        text,
        role,
        embedding: null,
        usage_count: 1,
      };
      ingredients.push(created);
      return { ...created };
    });
  };

  for (const sandwich of seed) {
    addSandwich(sandwich.embedding, sandwich.assembled.structure_type);
    trackIngredients(sandwich);
  }

  const view: CorpusView = {
    embeddings() {
      return embeddings.map((e) => [...e]);
    },
    typeFrequencies() {
      if (total === 0) return {};
      const out: Record<string, number> = {};
      for (const [type, count] of Object.entries(typeCounts)) out[type] = count / total;
      return out;
    },
  };

  return {
    ...view,
    isEmpty(): boolean {
      return total === 0;
    },
    size(): number {
      return total;
    },
    maxSimilarity(embedding: number[]): number {
      let max = 0;
      for (const other of embeddings) max = Math.max(max, cosineSimilarity(embedding, other));
      return max;
    },
    addSandwich,
    findMatchingIngredient,
    trackIngredients,
    ingredients(): CorpusIngredient[] {
      return ingredients.map((i) => ({ ...i }));
    },
  };
}

export type SandwichCorpus = ReturnType<typeof createCorpus>;
