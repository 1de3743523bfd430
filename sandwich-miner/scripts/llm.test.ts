import assert from "node:assert/strict";
import { FatalError, ParseError } from "./errors";
import { chatJSONRaw, createSandwichLlm, resolveProviderRuntimeConfig } from "./llm";
import { createLogger } from "./logger";
import type { SelectedCandidate } from "./types";

const ENV_KEYS = [
  "LLM_PROVIDER",
  "LLM_MODEL",
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "OPENAI_MODEL",
  "ANTHROPIC_API_KEY",
  "ANTHROPIC_BASE_URL",
  "ANTHROPIC_MODEL",
  "GEMINI_API_KEY",
  "GEMINI_BASE_URL",
  "GEMINI_MODEL",
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function openAiReply(content: string): Response {
  return jsonResponse({ choices: [{ message: { role: "assistant", content } }] });
}

const SELECTED: SelectedCandidate = {
  candidate: {
    bread_top: "upper bound",
    bread_bottom: "lower bound",
    filling: "limit of the squeezed function",
    structure_type: "bound",
    confidence: 0.9,
    rationale: "",
  },
  final_score: 1.4,
  novelty_bonus: 1,
  diversity_bonus: 1,
  rationale: "confidence=0.90",
};

async function run() {
  const originalFetch = global.fetch;
  const savedEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) delete process.env[key];
  const noSleep = async () => {};

  try {
    assert.throws(
      () => resolveProviderRuntimeConfig({}),
      (err: unknown) => err instanceof FatalError && err.reason === "missing_api_key",
    );

    process.env.OPENAI_API_KEY = "test-secret";
    assert.deepEqual(resolveProviderRuntimeConfig({ temperature: 0.2 }), {
      provider: "openai",
      apiKey: "test-secret",
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
      temperature: 0.2,
    });
    process.env.OPENAI_BASE_URL = "http://localhost:9999/v1/";
    assert.equal(resolveProviderRuntimeConfig({}).baseUrl, "http://localhost:9999/v1");
    delete process.env.OPENAI_BASE_URL;

    const seen: Array<{ url: string; auth: string | null; body: string }> = [];
    let reply = "";
    global.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
      seen.push({
        url: String(input),
        auth: new Headers(init?.headers).get("Authorization"),
        body: typeof init?.body === "string" ? init.body : "",
      });
      return openAiReply(reply);
    }) as typeof fetch;

    const logger = createLogger("llm-test");
    const llm = createSandwichLlm({ logger });

    reply = JSON.stringify({
      candidates: [
        {
          bread_top: "upper bound",
          bread_bottom: "lower bound",
          filling: "limit of the squeezed function",
          structure_type: "bound",
          confidence: 0.9,
        },
      ],
    });
    const candidates = await llm.identifyCandidates("The squeeze theorem bounds a function.");
    assert.equal(candidates.length, 1);
    assert.equal(candidates[0].rationale, "");
    assert.equal(candidates[0].confidence, 0.9);
    assert.equal(seen[0].url, "https://api.openai.com/v1/chat/completions");
    assert.equal(seen[0].auth, "Bearer test-secret");
    assert.ok(seen[0].body.includes('"model":"gpt-4o-mini"'));

    const call = logger.getEvents().find((event) => event.event === "LLM_CALL");
    assert.equal(call?.data?.role, "identifier");
    assert.equal(call?.data?.provider, "openai");
    assert.equal(call?.data?.retry_count, 0);
    assert.equal(call?.data?.completion_chars, reply.length);

    // JSON surrounded by prose is still found
    reply = 'Sure! {"prompt": "why do suspension bridges sag", "topic": "catenary"} Hope that helps.';
    assert.equal(await llm.generateCuriosity(["limits"]), "why do suspension bridges sag");

    reply = JSON.stringify({ name: "  The Squeeze  ", description: "Two bounds hold a limit in place." });
    assert.deepEqual(await llm.assembleSandwich(SELECTED, "source text"), {
      name: "The Squeeze",
      description: "Two bounds hold a limit in place.",
      bread_top: "upper bound",
      bread_bottom: "lower bound",
      filling: "limit of the squeezed function",
      structure_type: "bound",
    });

    reply = JSON.stringify({
      bread_compat_score: 0.9,
      containment_score: 0.8,
      specificity_score: 0.7,
      overall_score: 0.8,
    });
    assert.deepEqual(
      await llm.validateSandwich({
        name: "The Squeeze",
        description: "Two bounds hold a limit in place.",
        bread_top: "upper bound",
        bread_bottom: "lower bound",
        filling: "limit of the squeezed function",
        structure_type: "bound",
      }),
      { bread_compat_score: 0.9, containment_score: 0.8, specificity_score: 0.7, overall_score: 0.8, notes: "" },
    );

    // malformed model output is a ParseError
    reply = JSON.stringify({ candidates: [{ bread_top: "only one bread" }] });
    await assert.rejects(
      () => llm.identifyCandidates("text"),
      (err: unknown) => err instanceof ParseError && err.reason === "schema_mismatch",
    );
    reply = "I could not find anything.";
    await assert.rejects(
      () => llm.identifyCandidates("text"),
      (err: unknown) => err instanceof ParseError && err.reason === "no_json",
    );
    reply = "{ not really json }";
    await assert.rejects(
      () => llm.identifyCandidates("text"),
      (err: unknown) => err instanceof ParseError && err.reason === "invalid_json",
    );
    reply = "   ";
    await assert.rejects(
      () => llm.identifyCandidates("text"),
      (err: unknown) => err instanceof ParseError && err.reason === "empty_completion",
    );

    // 429 is retried, 401 ends the call at once
    let rateCalls = 0;
    global.fetch = (async () => {
      rateCalls += 1;
      return rateCalls === 1 ? jsonResponse({ error: "slow down" }, 429) : openAiReply('{"prompt":"tides"}');
    }) as typeof fetch;
    const retryLogger = createLogger("llm-retry");
    const out = await chatJSONRaw({
      role: "curiosity",
      prompts: { systemPrompt: "s", userPrompt: "u" },
      logger: retryLogger,
      sleep: noSleep,
    });
    assert.equal(out.content, '{"prompt":"tides"}');
    assert.deepEqual(out.usageApprox, { promptChars: 2, completionChars: 18 });
    assert.equal(rateCalls, 2);
    assert.equal(retryLogger.getEvents()[0].data?.retry_count, 1);

    let authCalls = 0;
    global.fetch = (async () => {
      authCalls += 1;
      return jsonResponse({ error: "bad key" }, 401);
    }) as typeof fetch;
    await assert.rejects(
      () => chatJSONRaw({ role: "curiosity", prompts: { systemPrompt: "s", userPrompt: "u" }, sleep: noSleep }),
      (err: unknown) => err instanceof FatalError && err.reason === "auth_rejected",
    );
    assert.equal(authCalls, 1);

    // other providers
    process.env.LLM_PROVIDER = "anthropic";
    process.env.ANTHROPIC_API_KEY = "test-secret";
    const anthropicSeen: Array<{ url: string; key: string | null }> = [];
    global.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
      anthropicSeen.push({ url: String(input), key: new Headers(init?.headers).get("x-api-key") });
      return jsonResponse({ content: [{ type: "text", text: '{"prompt":"glaciers"}' }] });
    }) as typeof fetch;
    assert.equal(await createSandwichLlm().generateCuriosity([]), "glaciers");
    assert.deepEqual(anthropicSeen, [{ url: "https://api.anthropic.com/v1/messages", key: "test-secret" }]);

    process.env.LLM_PROVIDER = "gemini";
    process.env.GEMINI_API_KEY = "test-secret";
    const geminiUrls: string[] = [];
    global.fetch = (async (input: string | URL | Request) => {
      geminiUrls.push(String(input));
      return jsonResponse({ candidates: [{ content: { parts: [{ text: '{"prompt":"volcanoes"}' }] } }] });
    }) as typeof fetch;
    assert.equal(await createSandwichLlm().generateCuriosity([]), "volcanoes");
    assert.equal(
      geminiUrls[0],
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-pro:generateContent?key=test-secret",
    );
  } finally {
    global.fetch = originalFetch;
    for (const [key, value] of savedEnv) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

void run().then(() => console.log("llm.test.ts passed"));
