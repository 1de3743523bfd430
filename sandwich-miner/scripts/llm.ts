import { createHash } from "node:crypto";
import { errorForHttpStatus, FatalError, ParseError } from "./errors";
import type { SessionLogger } from "./logger";
import {
  buildAssemblePrompts,
  buildCuriosityPrompts,
  buildIdentifyPrompts,
  buildValidatePrompts,
  type PromptPair,
} from "./prompts";
import { isRetryableFailure, withRetry } from "./retry";
import {
  AssembledSchema,
  CandidateListSchema,
  CuriositySchema,
  ValidationScoresSchema,
  parseModelJson,
} from "./schemas";
import type { SandwichLlm } from "./types";

export const LLM_PROVIDERS = ["openai", "anthropic", "gemini", "qwen", "deepseek"] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

interface ProviderRuntimeConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

const PROVIDER_DEFAULTS: Record<LLMProvider, { env: string; baseUrl: string; model: string }> = {
  openai: { env: "OPENAI", baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini" },
  anthropic: { env: "ANTHROPIC", baseUrl: "https://api.anthropic.com/v1", model: "claude-3-5-sonnet-latest" },
  gemini: {
    env: "GEMINI",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta",
    model: "gemini-1.5-pro",
  },
  qwen: { env: "QWEN", baseUrl: "https://dashscope.aliyuncs.com/compatible-mode/v1", model: "qwen-max" },
  deepseek: { env: "DEEPSEEK", baseUrl: "https://api.deepseek.com/v1", model: "deepseek-chat" },
};

function isProvider(value: string | undefined): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function resolveProvider(input?: LLMProvider): LLMProvider {
  const envProvider = process.env.LLM_PROVIDER?.toLowerCase();
  if (isProvider(envProvider)) return envProvider;
  return input ?? "openai";
}

export function resolveProviderRuntimeConfig(params: {
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
}): ProviderRuntimeConfig {
  const provider = resolveProvider(params.provider);
  const defaults = PROVIDER_DEFAULTS[provider];
  const apiKey = process.env[`${defaults.env}_API_KEY`];
  if (!apiKey) {
    throw new FatalError(`${defaults.env}_API_KEY is required when provider=${provider}.`, "missing_api_key");
  }
  const baseUrl = process.env[`${defaults.env}_BASE_URL`] ?? defaults.baseUrl;
  return {
    provider,
    apiKey,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    model: process.env[`${defaults.env}_MODEL`] ?? process.env.LLM_MODEL ?? params.model ?? defaults.model,
    temperature: params.temperature ?? 0.7,
  };
}

function extractContent(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    return raw
      .map((item: unknown) => {
        if (typeof item === "string") return item;
        if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
          return item.text;
        }
        return "";
      })
      .join("");
  }
  return "";
}

async function postJson(url: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
  const response = await fetch(url, {
    method: "POST",
    headers: { ...headers, "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  if (!response.ok) {
    const text = await response.text();
    throw errorForHttpStatus(response.status, `LLM HTTP ${response.status} ${response.statusText}: ${text.slice(0, 300)}`);
  }
  return response.json();
}

async function callOpenAICompatible(config: ProviderRuntimeConfig, prompts: PromptPair): Promise<string> {
  const data = (await postJson(
    `${config.baseUrl}/chat/completions`,
    { Authorization: `Bearer ${config.apiKey}` },
    {
      model: config.model,
      temperature: config.temperature,
      messages: [
        { role: "system", content: `${prompts.systemPrompt}\nOutput JSON only.` },
        { role: "user", content: prompts.userPrompt },
      ],
    },
  )) as { choices?: Array<{ message?: { content?: unknown } }> };
  return extractContent(data.choices?.[0]?.message?.content ?? "");
}

async function callAnthropic(config: ProviderRuntimeConfig, prompts: PromptPair): Promise<string> {
  const data = (await postJson(
    `${config.baseUrl}/messages`,
    { "x-api-key": config.apiKey, "anthropic-version": "2023-06-01" },
    {
      model: config.model,
      max_tokens: 2048,
      temperature: config.temperature,
      system: `${prompts.systemPrompt}\nOutput JSON only.`,
      messages: [{ role: "user", content: prompts.userPrompt }],
    },
  )) as { content?: Array<{ type?: string; text?: string }> };
  return (data.content ?? [])
    .filter((part) => part.type === "text")
    .map((part) => part.text ?? "")
    .join("");
}

async function callGemini(config: ProviderRuntimeConfig, prompts: PromptPair): Promise<string> {
  const url = `${config.baseUrl}/models/${encodeURIComponent(config.model)}:generateContent?key=${encodeURIComponent(config.apiKey)}`;
  const data = (await postJson(url, {}, {
    contents: [
      {
        role: "user",
        parts: [{ text: `${prompts.systemPrompt}\n\n${prompts.userPrompt}\n\nOutput JSON only.` }],
      },
    ],
    generationConfig: { temperature: config.temperature },
  })) as { candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }> };
  return (data.candidates?.[0]?.content?.parts ?? []).map((part) => part.text ?? "").join("");
}

async function callProvider(config: ProviderRuntimeConfig, prompts: PromptPair): Promise<string> {
  if (config.provider === "anthropic") return callAnthropic(config, prompts);
  if (config.provider === "gemini") return callGemini(config, prompts);
  return callOpenAICompatible(config, prompts);
}

export interface ChatJSONRawParams {
  role: string;
  prompts: PromptPair;
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
  retries?: number;
  logger?: SessionLogger;
  sleep?: (ms: number) => Promise<void>;
}

export async function chatJSONRaw(
  params: ChatJSONRawParams,
): Promise<{ content: string; usageApprox: { promptChars: number; completionChars: number } }> {
  const startedAt = Date.now();
  const config = resolveProviderRuntimeConfig(params);
  const promptHash = createHash("sha256")
    .update(params.prompts.systemPrompt)
    .update("\n\n")
    .update(params.prompts.userPrompt)
    .digest("hex");
  const promptChars = params.prompts.systemPrompt.length + params.prompts.userPrompt.length;
  let retryCount = 0;

  const content = await withRetry(() => callProvider(config, params.prompts), {
    retries: params.retries ?? 2,
    baseDelayMs: 500,
    maxDelayMs: 4000,
    jitter: true,
    sleep: params.sleep,
    // fetch rejects with a TypeError on network failure
    retryOn: (err) => isRetryableFailure(err) || err instanceof TypeError,
    onRetry: () => {
      retryCount += 1;
    },
  });

  params.logger?.log({
    node: "llm",
    level: "info",
    event: "LLM_CALL",
    data: {
      role: params.role,
      provider: config.provider,
      model: config.model,
      prompt_hash: promptHash.slice(0, 16),
      prompt_chars: promptChars,
      completion_chars: content.length,
      retry_count: retryCount,
      duration_ms: Date.now() - startedAt,
    },
  });

  if (!content.trim()) throw new ParseError("LLM returned empty content.", "empty_completion");
  return { content, usageApprox: { promptChars, completionChars: content.length } };
}

export interface SandwichLlmOptions {
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
  retries?: number;
  logger?: SessionLogger;
}

export function createSandwichLlm(options: SandwichLlmOptions = {}): SandwichLlm {
  const ask = async (role: string, prompts: PromptPair): Promise<string> => {
    const out = await chatJSONRaw({ ...options, role, prompts });
    return out.content;
  };

  return {
    async generateCuriosity(recentTopics) {
      const raw = await ask("curiosity", buildCuriosityPrompts(recentTopics));
      return parseModelJson(raw, CuriositySchema, "curiosity").prompt.trim();
    },
    async identifyCandidates(content) {
      const raw = await ask("identifier", buildIdentifyPrompts(content));
      return parseModelJson(raw, CandidateListSchema, "identifier").candidates;
    },
    async assembleSandwich(selected, content) {
      const raw = await ask("assembler", buildAssemblePrompts(selected, content));
      const named = parseModelJson(raw, AssembledSchema, "assembler");
      return {
        name: named.name.trim(),
        description: named.description.trim(),
        bread_top: selected.candidate.bread_top,
        bread_bottom: selected.candidate.bread_bottom,
        filling: selected.candidate.filling,
        structure_type: selected.candidate.structure_type,
      };
    },
    async validateSandwich(assembled) {
      const raw = await ask("validator", buildValidatePrompts(assembled));
      return parseModelJson(raw, ValidationScoresSchema, "validator");
    },
  };
}
