import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors";
import { LLM_PROVIDERS } from "./llm";

export const CONFIG_PATH = path.join("sandwich-miner", "config", "sandwich.config.json");

const Probability = z.number().min(0).max(1);

const SourceToggleSchema = (maxPerMinute: number) =>
  z
    .object({
      enabled: z.boolean().default(true),
      maxPerMinute: z.number().positive().default(maxPerMinute),
    })
    .default({});

export const SandwichConfigSchema = z
  .object({
    foraging: z
      .object({
        successesToPromote: z.number().int().min(1).default(5),
        failuresToDemote: z.number().int().min(1).default(3),
        curiosityProbability: Probability.default(0.5),
        recentTopicsWindow: z.number().int().min(0).default(20),
        wikipedia: SourceToggleSchema(30),
        webSearch: SourceToggleSchema(10),
      })
      .default({}),
    preprocess: z
      .object({
        minContentChars: z.number().int().min(0).default(200),
        maxContentChars: z.number().int().min(1).default(8000),
      })
      .default({}),
    selection: z
      .object({
        minConfidence: Probability.default(0.4),
        noveltyWeight: z.number().min(0).default(0.3),
        diversityWeight: z.number().min(0).default(0.2),
      })
      .default({}),
    validation: z
      .object({
        acceptThreshold: Probability.default(0.7),
        reviewThreshold: Probability.default(0.5),
        duplicateThreshold: Probability.default(0.95),
      })
      .default({}),
    llm: z
      .object({
        provider: z.enum(LLM_PROVIDERS).default("openai"),
        model: z.string().optional(),
        temperature: z.number().min(0).max(2).default(0.7),
        retries: z.number().int().min(0).default(2),
      })
      .default({}),
    embeddings: z
      .object({
        enabled: z.boolean().default(false),
        model: z.string().default("text-embedding-3-small"),
      })
      .default({}),
    session: z
      .object({
        maxSandwiches: z.number().int().min(1).nullable().default(null),
        maxDurationMinutes: z.number().positive().nullable().default(30),
        maxForagingAttempts: z.number().int().min(1).default(50),
        recursionLimit: z.number().int().min(10).default(50),
      })
      .default({}),
    output: z
      .object({
        sandwichesDir: z.string().default("sandwiches"),
        sessionsDir: z.string().default("sessions"),
        checkpointsDir: z.string().default("checkpoints"),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.validation.reviewThreshold > config.validation.acceptThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["validation", "reviewThreshold"],
        message: "reviewThreshold must not exceed acceptThreshold",
      });
    }
    if (config.preprocess.minContentChars > config.preprocess.maxContentChars) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["preprocess", "minContentChars"],
        message: "minContentChars must not exceed maxContentChars",
      });
    }
  });

export type SandwichConfig = z.infer<typeof SandwichConfigSchema>;

export function parseConfig(raw: unknown): SandwichConfig {
  const parsed = SandwichConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** A missing file yields the defaults; a malformed one is a ConfigurationError. */
export function loadConfig(configPath: string = CONFIG_PATH): SandwichConfig {
  if (!existsSync(configPath)) return parseConfig({});
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config at ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(raw);
}
