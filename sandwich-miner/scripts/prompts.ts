import { safeExcerpt } from "./preprocess";
import type { AssembledSandwich, SelectedCandidate } from "./types";

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export function buildCuriosityPrompts(recentTopics: string[]): PromptPair {
  const systemPrompt = [
    "You suggest one thing worth reading about next.",
    "Favour concrete subjects from mathematics, science, history, craft or culture",
    "that contain two bounding ideas with something held between them.",
    'Output JSON only: {"prompt": "<one search query, under 12 words>", "topic": "<short label>"}.',
  ].join(" ");

  const userPrompt = JSON.stringify(
    {
      task: "Propose a search query that is not about any recent topic.",
      recent_topics: recentTopics.slice(-20),
    },
    null,
    2,
  );
  return { systemPrompt, userPrompt };
}

export function buildIdentifyPrompts(content: string): PromptPair {
  const systemPrompt = [
    "You find sandwiches in text.",
    "A sandwich is two bounding concepts (bread_top, bread_bottom) that together constrain",
    "a third concept (filling) that sits between them.",
    "Return up to five candidates; confidence is in [0,1] and reflects how tightly the",
    "breads bound the filling. structure_type is a short snake_case label such as",
    "bound, squeeze, bridge, stack or temporal.",
    'Output JSON only: {"candidates": [{"bread_top", "bread_bottom", "filling", "structure_type", "confidence", "rationale"}]}.',
    'Return {"candidates": []} when the text holds no sandwich.',
  ].join(" ");

  const userPrompt = JSON.stringify({ text: content }, null, 2);
  return { systemPrompt, userPrompt };
}

export function buildAssemblePrompts(selected: SelectedCandidate, content: string): PromptPair {
  const systemPrompt = [
    "You name and describe a sandwich that has already been chosen.",
    "Keep the description to two or three sentences explaining how the breads hold the filling.",
    'Output JSON only: {"name": "<short evocative name>", "description": "<text>"}.',
  ].join(" ");

  const userPrompt = JSON.stringify(
    {
      candidate: selected.candidate,
      source_excerpt: safeExcerpt(content, 1500),
    },
    null,
    2,
  );
  return { systemPrompt, userPrompt };
}

export function buildValidatePrompts(assembled: AssembledSandwich): PromptPair {
  const systemPrompt = [
    "You grade a sandwich.",
    "bread_compat_score: do the two breads belong to the same frame of reference.",
    "containment_score: does the filling really sit between the breads.",
    "specificity_score: is the filling specific rather than generic.",
    "overall_score combines them. All scores are in [0,1].",
    'Output JSON only: {"bread_compat_score", "containment_score", "specificity_score", "overall_score", "notes"}.',
  ].join(" ");

  const userPrompt = JSON.stringify({ sandwich: assembled }, null, 2);
  return { systemPrompt, userPrompt };
}
