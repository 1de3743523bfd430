import assert from "node:assert/strict";
import { candidateConcept, createEmbeddingClient } from "./embeddings";
import { FatalError, ParseError } from "./errors";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function run() {
  const originalFetch = global.fetch;
  const savedKey = process.env.OPENAI_API_KEY;
  delete process.env.OPENAI_API_KEY;
  try {
    assert.throws(
      () => createEmbeddingClient(),
      (err: unknown) => err instanceof FatalError && err.reason === "missing_api_key",
    );

    const batches: string[][] = [];
    global.fetch = (async (_input: string | URL | Request, init?: RequestInit) => {
      const body: { input: string[] } = JSON.parse(typeof init?.body === "string" ? init.body : "{}");
      batches.push(body.input);
      // answer out of order; the client sorts by index
      const data = body.input
        .map((text, index) => ({ index, embedding: [text.length, index] }))
        .reverse();
      return jsonResponse({ data });
    }) as typeof fetch;

    const client = createEmbeddingClient({ apiKey: "test-secret", batchSize: 2, concurrency: 1 });
    assert.deepEqual(await client.embed([]), []);
    const vectors = await client.embed(["a", "bb", "ccc"]);
    assert.deepEqual(batches, [["a", "bb"], ["ccc"]]);
    assert.deepEqual(vectors, [
      [1, 0],
      [2, 1],
      [3, 0],
    ]);

    global.fetch = (async () => jsonResponse({ data: [{ index: 0, embedding: [1] }] })) as typeof fetch;
    await assert.rejects(() => client.embed(["one", "two"]), ParseError);

    global.fetch = (async () => jsonResponse({ error: "nope" }, 403)) as typeof fetch;
    await assert.rejects(() => client.embed(["one"]), FatalError);

    assert.equal(
      candidateConcept({ bread_top: "upper bound", filling: "limit", bread_bottom: "lower bound" }),
      "upper bound | limit | lower bound",
    );
  } finally {
    global.fetch = originalFetch;
    if (savedKey === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = savedKey;
  }
}

void run().then(() => console.log("embeddings.test.ts passed"));
