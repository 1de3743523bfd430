import { z } from "zod";
import { ParseError } from "./errors";

const Score = z.number().min(0).max(1);

export const CandidateSchema = z.object({
  bread_top: z.string().min(1),
  bread_bottom: z.string().min(1),
  filling: z.string().min(1),
  structure_type: z.string().min(1),
  confidence: Score,
  rationale: z.string().default(""),
});

export const CandidateListSchema = z.object({
  candidates: z.array(CandidateSchema),
});

export const CuriositySchema = z.object({
  prompt: z.string().min(1),
  topic: z.string().optional(),
});

export const AssembledSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
});

export const ValidationScoresSchema = z.object({
  bread_compat_score: Score,
  containment_score: Score,
  specificity_score: Score,
  overall_score: Score,
  notes: z.string().default(""),
});

export const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

function parseRaw(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    const firstBrace = value.indexOf("{");
    const lastBrace = value.lastIndexOf("}");
    if (firstBrace < 0 || lastBrace <= firstBrace) throw new ParseError("No JSON found in response", "no_json");
    try {
      return JSON.parse(value.slice(firstBrace, lastBrace + 1));
    } catch (error) {
      throw new ParseError("Response JSON could not be decoded", "invalid_json", { cause: error });
    }
  }
}

/** Decodes a model response and checks it against `schema`, raising ParseError on any mismatch. */
export function parseModelJson<T extends z.ZodTypeAny>(raw: string, schema: T, label: string): z.infer<T> {
  const parsed = schema.safeParse(parseRaw(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`${label} response failed validation: ${issues}`, "schema_mismatch");
  }
  return parsed.data;
}
